import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join, resolve } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.site-health.yaml'

export interface LoadConfigOptions {
  /** Project directory searched for .site-health.yaml */
  cwd?: string
  /** Explicit config file; must exist */
  configPath?: string
  /** Home directory searched for the global config */
  home?: string
  env?: NodeJS.ProcessEnv
}

type RawConfig = Record<string, unknown>

/**
 * Find config paths (global + project). Global is the base, project overrides it.
 */
function findConfigPaths(cwd: string, home: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(home, CONFIG_FILENAME)
  const projectPath = join(cwd, CONFIG_FILENAME)

  // Same directory: load once
  const isHomeCwd = resolve(cwd) === resolve(home)

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load and validate the run configuration.
 *
 * Lookup: explicit --config path, else ~/.site-health.yaml merged with
 * ./.site-health.yaml. Environment overrides are applied before validation
 * so they go through the same schema. The result is frozen; nothing is cached
 * between calls.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const cwd = options.cwd ?? process.cwd()
  const home = options.home ?? homedir()
  const env = options.env ?? process.env

  let raw: RawConfig
  if (options.configPath) {
    const explicitPath = resolve(cwd, options.configPath)
    if (!existsSync(explicitPath)) {
      throw AppError.configNotFound(explicitPath)
    }
    logger.debug(`Loading config from ${explicitPath}`)
    raw = await parseYamlFile(explicitPath)
  } else {
    const { globalPath, projectPath } = findConfigPaths(cwd, home)
    const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
    const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
    if (!globalPath && !projectPath) {
      logger.debug('No config file found, using defaults')
    }
    raw = deepMergeConfig(globalRaw, projectRaw)
  }

  return parseConfig(applyEnvOverrides(raw, env))
}

/**
 * Validate a raw config object. Invalid thresholds or paths are fatal:
 * silently falling back to defaults would report against the wrong limits.
 */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const reason = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw AppError.configInvalid(reason)
  }
  return deepFreeze(result.data)
}

/**
 * Apply CLI-level overrides on top of a loaded config and re-validate.
 */
export function withOverrides(config: Config, overrides: RawConfig): Config {
  return parseConfig(deepMergeConfig(structuredClone(config), overrides))
}

/**
 * Parse YAML file, returning an empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<RawConfig> {
  const content = await readFile(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch (error) {
    throw AppError.configInvalid(`${filePath}: ${getErrorMessage(error)}`)
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isPlainObject(parsed)) {
    throw AppError.configInvalid(`${filePath}: top level must be a mapping`)
  }
  return parsed
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge config objects: override fields win, nested mappings merge.
 * Arrays are replaced, not merged.
 */
export function deepMergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMergeConfig(current, val)
    } else {
      result[key] = val
    }
  }
  return result
}

/**
 * SITE_HEALTH_SITE_CODE, SITE_HEALTH_PROVIDER, SITE_HEALTH_OUTPUT
 */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {}

  const site: RawConfig = {}
  if (env.SITE_HEALTH_SITE_CODE) site.code = env.SITE_HEALTH_SITE_CODE
  if (env.SITE_HEALTH_PROVIDER) site.providerMachine = env.SITE_HEALTH_PROVIDER
  if (Object.keys(site).length > 0) overrides.site = site

  if (env.SITE_HEALTH_OUTPUT) overrides.output = { path: env.SITE_HEALTH_OUTPUT }

  return deepMergeConfig(raw, overrides)
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

import { Command } from 'commander'
import chalk from 'chalk'
import { loadConfig, withOverrides, type LoadConfigOptions } from '../../config/loadConfig.js'
import type { Config } from '../../config/schema.js'
import type { ManagementConnection } from '../../connection/types.js'
import { exitCodeFor, generateReport } from '../../report/generateReport.js'
import { formatReportForTerminal, formatResultLine } from '../../report/formatTerminal.js'
import { printError } from '../../shared/error.js'
import { setLogLevel } from '../../shared/logger.js'
import { error, stepPrefix, success, warn } from '../output.js'

export interface RunOptions {
  config?: string
  siteCode?: string
  provider?: string
  output?: string
  format?: string
  snapshot?: string
  strict?: boolean
  verbose?: boolean
  /** Print each result as it finishes */
  progress?: boolean
}

export interface RunDependencies {
  cwd?: string
  home?: string
  env?: NodeJS.ProcessEnv
  connect?: (config: Config) => Promise<ManagementConnection>
  now?: () => Date
}

/**
 * CLI flags layered over the loaded config. Flags win over files and
 * environment; the result is validated again.
 */
export function buildOverrides(options: RunOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {}

  const site: Record<string, unknown> = {}
  if (options.siteCode) site.code = options.siteCode
  if (options.provider) site.providerMachine = options.provider
  if (Object.keys(site).length > 0) overrides.site = site

  const output: Record<string, unknown> = {}
  if (options.output) output.path = options.output
  if (options.format) output.format = options.format
  if (Object.keys(output).length > 0) overrides.output = output

  if (options.snapshot) {
    overrides.connection = { type: 'snapshot', snapshotPath: options.snapshot }
  }

  return overrides
}

/**
 * Resolve config, generate the report and map the outcome to an exit code.
 * Config errors print and return 1 without touching the output path.
 */
export async function executeRun(options: RunOptions, deps: RunDependencies = {}): Promise<number> {
  const loadOptions: LoadConfigOptions = {
    cwd: deps.cwd,
    configPath: options.config,
    home: deps.home,
    env: deps.env,
  }

  let config: Config
  try {
    config = withOverrides(await loadConfig(loadOptions), buildOverrides(options))
  } catch (err) {
    printError(err)
    return 1
  }

  const outcome = await generateReport({
    config,
    cwd: deps.cwd,
    connect: deps.connect,
    now: deps.now,
    onResult: options.progress
      ? (result, index, total) => console.log(`${stepPrefix(index, total)} ${formatResultLine(result)}`)
      : undefined,
  })

  if (outcome.kind === 'fatal') {
    printError(outcome.error)
    error(`Wrote error page to ${outcome.outputPath}`)
    return exitCodeFor(outcome, options.strict)
  }

  console.log()
  console.log(formatReportForTerminal(outcome.report))
  console.log()
  success(`Report written to ${chalk.cyan(outcome.outputPath)}`)

  const code = exitCodeFor(outcome, options.strict)
  if (code !== 0) {
    warn('Critical or unknown results present (--strict)')
  }
  return code
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Query the site, classify every check and write the report')
    .option('-c, --config <path>', 'Config file (default: ~/.site-health.yaml + ./.site-health.yaml)')
    .option('-s, --site-code <code>', 'Site code, e.g. PS1')
    .option('-p, --provider <host>', 'SMS provider machine')
    .option('-o, --output <path>', 'Report output path')
    .option('-f, --format <format>', 'Output format: html or json')
    .option('--snapshot <path>', 'Read recorded metrics from a snapshot file instead of the live site')
    .option('--strict', 'Exit with 2 when any check is critical or unknown')
    .option('-v, --verbose', 'Debug logging')
    .action(async (options: RunOptions) => {
      if (options.verbose) setLogLevel('debug')
      try {
        process.exitCode = await executeRun({ ...options, progress: true })
      } catch (err) {
        printError(err)
        process.exitCode = 1
      }
    })
}

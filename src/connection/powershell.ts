/**
 * PowerShell-backed management connection
 *
 * Every remote call runs in a fresh `pwsh -NonInteractive` process that
 * imports the ConfigurationManager module, switches to the site drive and
 * prints its result as JSON.
 */

import { execa, ExecaError } from 'execa'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { truncateText } from '../shared/truncateText.js'
import type { ConnectionConfig } from '../config/schema.js'
import { decodeJsonOutput, parseCallOutput } from './parseOutput.js'
import type { ManagementConnection, QueryOptions, RemoteCall, SiteTarget } from './types.js'

const logger = createLogger('connection')

export interface ScriptRunOptions {
  timeoutMs: number
  /** Kills the pwsh process when aborted */
  signal?: AbortSignal
}

/** Runs a PowerShell script and resolves with its stdout */
export type ScriptRunner = (script: string, options: ScriptRunOptions) => Promise<string>

export interface PowerShellConnectionOptions {
  siteCode: string
  providerMachine?: string
  connection: Pick<ConnectionConfig, 'pwshPath' | 'modulePath'>
  /** Upper bound for one pwsh process, the connection probe included */
  queryTimeoutMs: number
  runScript?: ScriptRunner
}

/** Single-quoted PowerShell literal */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

export function createExecaRunner(pwshPath: string): ScriptRunner {
  return async (script, { timeoutMs, signal }) => {
    const result = await execa(pwshPath, ['-NoProfile', '-NonInteractive', '-Command', script], {
      timeout: timeoutMs,
      stdin: 'ignore',
      ...(signal ? { cancelSignal: signal } : {}),
    })
    return result.stdout
  }
}

/**
 * Describe a failed pwsh invocation: prefer stderr (the actual PowerShell
 * error) over execa's message, which repeats the whole command line.
 */
export function toQueryError(error: unknown, callName: string, timeoutMs: number): AppError {
  if (error instanceof AppError) return error
  if (error instanceof ExecaError) {
    const execaError: ExecaError = error
    if (execaError.timedOut) return AppError.timeout(callName, timeoutMs)
    if (execaError.isCanceled) return AppError.cancelled(callName, execaError)
    const stderr = typeof execaError.stderr === 'string' ? execaError.stderr.trim() : ''
    const message = stderr
      ? `exit ${execaError.exitCode ?? '?'}: ${truncateText(stderr, 300)}`
      : execaError.shortMessage
    return AppError.queryFailed(callName, message, execaError)
  }
  return AppError.queryFailed(callName, getErrorMessage(error), error)
}

function importModuleLine(modulePath: string | undefined): string {
  return modulePath
    ? `Import-Module ${psQuote(modulePath)} -ErrorAction Stop`
    : 'Import-Module ConfigurationManager -ErrorAction Stop'
}

function buildPreamble(siteCode: string, modulePath: string | undefined): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    '$ProgressPreference = \'SilentlyContinue\'',
    importModuleLine(modulePath),
    `Set-Location ${psQuote(`${siteCode}:`)}`,
  ].join('\n')
}

/**
 * Wrap a call script so its output is one JSON document. `@(...)` keeps a
 * single object from being unwrapped differently than a list.
 */
export function buildCallScript(preamble: string, script: string): string {
  return `${preamble}\n$__result = @(${script})\nConvertTo-Json -InputObject $__result -Depth 5 -Compress`
}

function buildProbeScript(siteCode: string, modulePath: string | undefined): string {
  const importModule = importModuleLine(modulePath)
  return [
    "$ErrorActionPreference = 'Stop'",
    `try { ${importModule}; $module = $true } catch { $module = $false; $moduleError = $_.Exception.Message }`,
    `$drive = if ($module) { [bool](Get-PSDrive -Name ${psQuote(siteCode)} -PSProvider CMSite -ErrorAction SilentlyContinue) } else { $false }`,
    'ConvertTo-Json -Compress -InputObject @{ module = $module; moduleError = "$moduleError"; drive = $drive }',
  ].join('\n')
}

interface ProbeResult {
  module: boolean
  moduleError: string
  drive: boolean
}

function isProbeResult(value: unknown): value is ProbeResult {
  if (typeof value !== 'object' || value === null) return false
  return (
    'module' in value &&
    typeof value.module === 'boolean' &&
    'drive' in value &&
    typeof value.drive === 'boolean' &&
    'moduleError' in value &&
    typeof value.moduleError === 'string'
  )
}

/**
 * Establish the connection: pwsh must start, the module must load and the
 * site drive must exist. Any failure here is fatal for the run.
 */
export async function connectPowerShell(options: PowerShellConnectionOptions): Promise<ManagementConnection> {
  const { siteCode, connection, queryTimeoutMs } = options
  const runScript = options.runScript ?? createExecaRunner(connection.pwshPath)
  const target: SiteTarget = {
    siteCode,
    providerMachine: options.providerMachine ?? 'localhost',
  }

  logger.debug(`Probing site ${siteCode} via ${connection.pwshPath}`)

  let probeOutput: string
  try {
    probeOutput = await runScript(buildProbeScript(siteCode, connection.modulePath), {
      timeoutMs: queryTimeoutMs,
    })
  } catch (error) {
    const cause = toQueryError(error, 'connection probe', queryTimeoutMs)
    throw AppError.connectionFailed(cause.message, error)
  }

  const probe = decodeProbe(probeOutput)
  if (!probe.module) {
    throw AppError.moduleMissing(probe.moduleError || 'Import-Module failed')
  }
  if (!probe.drive) {
    throw AppError.siteNotFound(siteCode)
  }

  logger.info(`Connected to site ${siteCode} (${target.providerMachine})`)

  const preamble = buildPreamble(siteCode, connection.modulePath)

  return {
    kind: 'powershell',
    target,
    async query<T>(call: RemoteCall<T>, queryOptions: QueryOptions = {}): Promise<T> {
      const { signal } = queryOptions
      if (signal?.aborted) throw AppError.cancelled(call.name)
      logger.debug(`→ ${call.name}`)
      let stdout: string
      try {
        stdout = await runScript(buildCallScript(preamble, call.script), {
          timeoutMs: queryTimeoutMs,
          ...(signal ? { signal } : {}),
        })
      } catch (error) {
        if (signal?.aborted) throw AppError.cancelled(call.name, error)
        throw toQueryError(error, call.name, queryTimeoutMs)
      }
      return parseCallOutput(call, decodeJsonOutput(call.name, stdout))
    },
  }
}

function decodeProbe(stdout: string): ProbeResult {
  let decoded: unknown
  try {
    decoded = decodeJsonOutput('connection probe', stdout)
  } catch (error) {
    throw AppError.connectionFailed(getErrorMessage(error), error)
  }
  if (!isProbeResult(decoded)) {
    throw AppError.connectionFailed('connection probe printed an unexpected result')
  }
  return decoded
}

/**
 * One report generation: connect, run every check, render, write.
 *
 * A connection failure is fatal: no checks run and the output path receives
 * a minimal error document instead of a report.
 */

import type { Config } from '../config/schema.js'
import { openConnection } from '../connection/index.js'
import type { ManagementConnection } from '../connection/types.js'
import { buildDefaultRegistry } from '../healthcheck/checks/index.js'
import type { CheckRegistry } from '../healthcheck/registry.js'
import { runChecks } from '../healthcheck/runner.js'
import type { CheckResult, HealthReport } from '../healthcheck/types.js'
import { AppError } from '../shared/error.js'
import { createLogger, logError } from '../shared/logger.js'
import { renderFatalHtml, renderHtml } from './renderHtml.js'
import { renderJson } from './renderJson.js'
import { resolveStyles } from './styles.js'
import { writeReport } from './writeReport.js'

const logger = createLogger('generate')

export interface GenerateReportOptions {
  config: Config
  cwd?: string
  /** Defaults to openConnection(config) */
  connect?: (config: Config) => Promise<ManagementConnection>
  /** Defaults to the built-in catalogue */
  registry?: CheckRegistry
  now?: () => Date
  onResult?: (result: CheckResult, index: number, total: number) => void
}

export type GenerateOutcome =
  | { kind: 'report'; report: HealthReport; outputPath: string }
  | { kind: 'fatal'; error: AppError; outputPath: string }

export function renderReport(report: HealthReport, config: Config): string {
  if (config.output.format === 'json') {
    return renderJson(report)
  }
  return renderHtml(report, { title: config.output.title, styles: resolveStyles(config.style) })
}

function renderFatal(error: AppError, config: Config, generatedAt: Date): string {
  if (config.output.format === 'json') {
    const document = {
      generatedAt: generatedAt.toISOString(),
      target: { siteCode: config.site.code ?? null, providerMachine: config.site.providerMachine ?? null },
      error: { code: error.code, message: error.message },
    }
    return JSON.stringify(document, null, 2) + '\n'
  }
  return renderFatalHtml({
    title: config.output.title,
    error,
    generatedAt,
    target: { siteCode: config.site.code, providerMachine: config.site.providerMachine },
  })
}

export async function generateReport(options: GenerateReportOptions): Promise<GenerateOutcome> {
  const { config } = options
  const cwd = options.cwd ?? process.cwd()
  const now = options.now ?? (() => new Date())
  const connect = options.connect ?? ((c: Config) => openConnection(c, { cwd }))

  let connection: ManagementConnection
  try {
    connection = await connect(config)
  } catch (error) {
    const fatal = AppError.fromError(error)
    logError(logger, 'Could not establish the management connection', fatal)
    const outputPath = await writeReport(config.output.path, renderFatal(fatal, config, now()), cwd)
    return { kind: 'fatal', error: fatal, outputPath }
  }

  const registry = options.registry ?? buildDefaultRegistry()
  const report = await runChecks(registry, connection, {
    thresholds: config.thresholds,
    queryTimeoutMs: config.queryTimeoutMs,
    now,
    onResult: options.onResult,
  })

  const outputPath = await writeReport(config.output.path, renderReport(report, config), cwd)
  logger.info(`Report written to ${outputPath}`)
  return { kind: 'report', report, outputPath }
}

/**
 * 0: report produced (Critical rows included). 1: no report. 2: --strict and
 * the report has a critical or unknown row.
 */
export function exitCodeFor(outcome: GenerateOutcome, strict: boolean = false): number {
  if (outcome.kind === 'fatal') return 1
  if (strict && outcome.report.hasFailed) return 2
  return 0
}

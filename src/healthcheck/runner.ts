/**
 * Sequential check runner
 *
 * Every registered check yields exactly one result, in registration order.
 * A failing query or classifier becomes a critical/unknown row; it never
 * aborts the run or drops the row. No retries: the report is a point-in-time
 * snapshot. A query that times out is cancelled through its AbortSignal and
 * the next check starts only once it has settled.
 */

import { createLogger, logError } from '../shared/logger.js'
import { fromPromise, fromThrowable } from '../shared/result.js'
import { withTimeout } from '../shared/withTimeout.js'
import { truncateText } from '../shared/truncateText.js'
import { HEALTH_STATUSES, isFailureStatus, type FailureStatus, type HealthStatus } from '../types/healthStatus.js'
import type { ManagementConnection, QueryOptions, RemoteCall } from '../connection/types.js'
import type { CheckRegistry } from './registry.js'
import type { Check, CheckResult, HealthReport, ReportSection, StatusSummary, Thresholds } from './types.js'

const logger = createLogger('runner')

const MAX_ERROR_LENGTH = 300

const DEFAULT_CANCEL_GRACE_MS = 5_000

export interface RunChecksOptions {
  thresholds: Thresholds
  /** Bound on each check's remote call */
  queryTimeoutMs: number
  /** How long to wait for a cancelled query to stop before moving on */
  cancelGraceMs?: number
  /** Clock for the report timestamp */
  now?: () => Date
  /** Called after each check, e.g. for progress output */
  onResult?: (result: CheckResult, index: number, total: number) => void
}

function describeError(error: Error): string {
  const message = error.message.trim()
  return truncateText(message || error.name || 'unknown error', MAX_ERROR_LENGTH)
}

function failedResult(
  check: Check,
  status: FailureStatus,
  note: string,
  error: Error,
  startedAt: number
): CheckResult {
  return Object.freeze({
    section: check.section,
    name: check.name,
    status,
    note,
    error: describeError(error),
    durationMs: Date.now() - startedAt,
  })
}

/** Connection whose every query carries the check's abort signal */
function withSignal(connection: ManagementConnection, signal: AbortSignal): ManagementConnection {
  return {
    kind: connection.kind,
    target: connection.target,
    query<T>(call: RemoteCall<T>, options?: QueryOptions): Promise<T> {
      return connection.query(call, { ...options, signal })
    },
  }
}

async function waitForCancelled(pending: Promise<unknown>, check: Check, graceMs: number): Promise<void> {
  const settled = await fromPromise(
    withTimeout(
      pending.then(
        () => undefined,
        () => undefined
      ),
      graceMs,
      `${check.remoteCall} cancellation`
    )
  )
  if (!settled.ok) {
    logger.warn(`Query of "${check.name}" still running ${graceMs}ms after cancellation`)
  }
}

/**
 * Run one check inside its failure boundary
 */
export async function runCheck(
  check: Check,
  connection: ManagementConnection,
  options: Pick<RunChecksOptions, 'thresholds' | 'queryTimeoutMs' | 'cancelGraceMs'>
): Promise<CheckResult> {
  const startedAt = Date.now()
  const context = { section: check.section, check: check.name, remoteCall: check.remoteCall }
  const controller = new AbortController()

  // Promise.resolve().then() so a synchronous throw inside fetch is caught too
  const pending = Promise.resolve().then(() => check.fetch(withSignal(connection, controller.signal)))
  const fetched = await fromPromise(withTimeout(pending, options.queryTimeoutMs, check.remoteCall))
  if (!fetched.ok) {
    controller.abort(fetched.error)
    await waitForCancelled(pending, check, options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS)
    logError(logger, `Check "${check.name}" query failed`, fetched.error, context)
    return failedResult(check, 'critical', `${check.remoteCall} failed`, fetched.error, startedAt)
  }

  const classified = fromThrowable(() => fetched.value(options.thresholds))
  if (!classified.ok) {
    logError(logger, `Check "${check.name}" could not be classified`, classified.error, context)
    return failedResult(
      check,
      'unknown',
      `Result of ${check.remoteCall} could not be classified`,
      classified.error,
      startedAt
    )
  }

  const { status, note } = classified.value
  logger.debug(`${check.section} / ${check.name}: ${status}`)
  return Object.freeze({
    section: check.section,
    name: check.name,
    status,
    note,
    durationMs: Date.now() - startedAt,
  })
}

export function summarize(sections: readonly ReportSection[]): StatusSummary {
  const counts: Record<HealthStatus, number> = {
    healthy: 0,
    warning: 0,
    critical: 0,
    manual: 0,
    unknown: 0,
  }
  let total = 0
  for (const section of sections) {
    for (const result of section.results) {
      counts[result.status]++
      total++
    }
  }
  return Object.freeze({ ...counts, total })
}

/**
 * Run every registered check against the connection, one at a time.
 */
export async function runChecks(
  registry: CheckRegistry,
  connection: ManagementConnection,
  options: RunChecksOptions
): Promise<HealthReport> {
  const now = options.now ?? (() => new Date())
  const generatedAt = now()
  const total = registry.size
  const sections: ReportSection[] = []
  let index = 0

  logger.info(`Running ${total} check(s) against site ${connection.target.siteCode}`)

  for (const group of registry.sections()) {
    const results: CheckResult[] = []
    for (const check of group.checks) {
      const result = await runCheck(check, connection, options)
      results.push(result)
      index++
      options.onResult?.(result, index, total)
    }
    sections.push(Object.freeze({ name: group.name, results: Object.freeze(results) }))
  }

  const summary = summarize(sections)
  const hasFailed = HEALTH_STATUSES.some(status => isFailureStatus(status) && summary[status] > 0)

  logger.info(
    `Checks finished: ${summary.healthy} healthy, ${summary.warning} warning, ${summary.critical} critical, ${summary.manual} manual, ${summary.unknown} unknown`
  )

  return Object.freeze({
    generatedAt,
    target: connection.target,
    sections: Object.freeze(sections),
    summary,
    hasFailed,
    hasWarning: summary.warning > 0,
  })
}

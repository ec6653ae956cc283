/**
 * Health status values and helpers
 *
 * The status set is closed: renderers look every value up in an exhaustive
 * style table and reject anything outside it.
 */

export const HEALTH_STATUSES = ['healthy', 'warning', 'critical', 'manual', 'unknown'] as const

export type HealthStatus = (typeof HEALTH_STATUSES)[number]

/** Statuses a classifier may return; the others come only from failures */
export type ClassifiedStatus = Extract<HealthStatus, 'healthy' | 'warning' | 'manual'>

/** Statuses produced by the runner's failure boundary */
export type FailureStatus = Extract<HealthStatus, 'critical' | 'unknown'>

const FAILURE_STATUSES: readonly string[] = ['critical', 'unknown'] satisfies FailureStatus[]

export function isHealthStatus(value: unknown): value is HealthStatus {
  return typeof value === 'string' && (HEALTH_STATUSES as readonly string[]).includes(value)
}

/** Critical or unknown: the row reflects a failure rather than a measurement */
export function isFailureStatus(status: HealthStatus): status is FailureStatus {
  return FAILURE_STATUSES.includes(status)
}

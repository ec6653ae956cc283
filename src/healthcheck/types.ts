import type { ClassifiedStatus, HealthStatus } from '../types/healthStatus.js'
import type { ManagementConnection, SiteTarget } from '../connection/types.js'
import type { ThresholdsConfig } from '../config/schema.js'

export type Thresholds = Readonly<ThresholdsConfig>

export interface Classification {
  status: ClassifiedStatus
  note: string
}

/**
 * What a check is: where it sits in the report, which remote call it makes
 * and how the fetched value maps to a status.
 */
export interface CheckDefinition<M> {
  section: string
  name: string
  /** Remote call named in the row when the query fails */
  remoteCall: string
  query: (connection: ManagementConnection) => Promise<M>
  classify: (metric: M, thresholds: Thresholds) => Classification
}

/**
 * A registered check. The metric type is closed over: `fetch` performs the
 * query and hands back the classification step bound to the fetched value.
 */
export interface Check {
  readonly section: string
  readonly name: string
  readonly remoteCall: string
  /** No automatable signal; always classifies as manual */
  readonly manual: boolean
  fetch(connection: ManagementConnection): Promise<(thresholds: Thresholds) => Classification>
}

export interface CheckResult {
  readonly section: string
  readonly name: string
  readonly status: HealthStatus
  readonly note: string
  /** Set only when the query or the classifier failed */
  readonly error?: string
  readonly durationMs: number
}

export interface ReportSection {
  readonly name: string
  readonly results: readonly CheckResult[]
}

export type StatusSummary = Readonly<Record<HealthStatus, number>> & { readonly total: number }

export interface HealthReport {
  readonly generatedAt: Date
  readonly target: SiteTarget
  readonly sections: readonly ReportSection[]
  readonly summary: StatusSummary
  /** Any critical or unknown row */
  readonly hasFailed: boolean
  readonly hasWarning: boolean
}

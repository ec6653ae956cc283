import type { z } from 'zod'

/** Identifies the site a report was produced against */
export interface SiteTarget {
  siteCode: string
  /** SMS provider / site server host queried for machine metrics */
  providerMachine: string
}

/**
 * One remote call. `name` doubles as the failure label in the report and as
 * the key of recorded values in a snapshot.
 */
export interface RemoteCall<T> {
  name: string
  /** PowerShell pipeline; its output is serialized with ConvertTo-Json */
  script: string
  /** Shape the output must have; a mismatch is a query failure */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
}

export interface QueryOptions {
  /** Aborted by the runner when the check times out; the call must stop */
  signal?: AbortSignal
}

/**
 * Opaque handle to the management platform. The runner only ever calls
 * `query`; how the call reaches the site is the adapter's business.
 */
export interface ManagementConnection {
  readonly kind: 'powershell' | 'snapshot'
  readonly target: SiteTarget
  query<T>(call: RemoteCall<T>, options?: QueryOptions): Promise<T>
}

/**
 * Snapshot connection: replays recorded call outputs from a JSON file.
 *
 * Used for dry runs of the report layout and for reproducing a report from
 * values captured elsewhere. A recorded `{ "error": "..." }` entry replays a
 * failed call.
 */

import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { parseCallOutput } from './parseOutput.js'
import type { ManagementConnection, QueryOptions, RemoteCall } from './types.js'

const logger = createLogger('snapshot')

const recordedFailureSchema = z.object({ error: z.string().min(1) }).strict()

export const snapshotSchema = z.object({
  target: z.object({
    siteCode: z.string().min(1),
    providerMachine: z.string().min(1),
  }),
  /** Keyed by RemoteCall.name */
  calls: z.record(z.string(), z.unknown()),
})

export type Snapshot = z.infer<typeof snapshotSchema>

export function createSnapshotConnection(snapshot: Snapshot): ManagementConnection {
  const target = Object.freeze({ ...snapshot.target })

  return {
    kind: 'snapshot',
    target,
    async query<T>(call: RemoteCall<T>, options: QueryOptions = {}): Promise<T> {
      if (options.signal?.aborted) throw AppError.cancelled(call.name)
      if (!Object.hasOwn(snapshot.calls, call.name)) {
        throw AppError.queryFailed(call.name, 'no recorded value in snapshot')
      }
      const recorded = snapshot.calls[call.name]
      const failure = recordedFailureSchema.safeParse(recorded)
      if (failure.success) {
        throw AppError.queryFailed(call.name, failure.data.error)
      }
      return parseCallOutput(call, recorded)
    },
  }
}

/**
 * Load a snapshot file. A missing or malformed file is a connection failure.
 */
export async function connectSnapshot(path: string): Promise<ManagementConnection> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    throw AppError.connectionFailed(`cannot read snapshot ${path}: ${getErrorMessage(error)}`, error)
  }

  const result = snapshotSchema.safeParse(raw)
  if (!result.success) {
    throw AppError.connectionFailed(`snapshot ${path} is malformed: ${result.error.issues[0]?.message ?? 'invalid'}`)
  }

  logger.info(`Replaying snapshot ${path} for site ${result.data.target.siteCode}`)
  return createSnapshotConnection(result.data)
}

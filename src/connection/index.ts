/**
 * @entry Management connection
 *
 * openConnection() picks the adapter from config; the runner only sees
 * ManagementConnection.query().
 */

import { resolve } from 'path'
import type { Config } from '../config/schema.js'
import { AppError } from '../shared/error.js'
import { connectPowerShell, type ScriptRunner } from './powershell.js'
import { connectSnapshot } from './snapshot.js'
import type { ManagementConnection } from './types.js'

export type { ManagementConnection, QueryOptions, RemoteCall, SiteTarget } from './types.js'
export {
  connectPowerShell,
  createExecaRunner,
  buildCallScript,
  psQuote,
  toQueryError,
  type ScriptRunner,
  type PowerShellConnectionOptions,
} from './powershell.js'
export { connectSnapshot, createSnapshotConnection, snapshotSchema, type Snapshot } from './snapshot.js'
export { parseCallOutput, decodeJsonOutput } from './parseOutput.js'

export interface OpenConnectionOptions {
  cwd?: string
  runScript?: ScriptRunner
}

/**
 * Establish the connection described by the config. Throws AppError on any
 * failure; callers treat that as fatal.
 */
export async function openConnection(
  config: Config,
  options: OpenConnectionOptions = {}
): Promise<ManagementConnection> {
  const { connection } = config

  if (connection.type === 'snapshot') {
    if (!connection.snapshotPath) {
      throw AppError.configInvalid('connection.snapshotPath is required for snapshot connections')
    }
    return connectSnapshot(resolve(options.cwd ?? process.cwd(), connection.snapshotPath))
  }

  if (!config.site.code) {
    throw AppError.configInvalid('site.code is required')
  }

  return connectPowerShell({
    siteCode: config.site.code,
    providerMachine: config.site.providerMachine,
    connection,
    queryTimeoutMs: config.queryTimeoutMs,
    runScript: options.runScript,
  })
}

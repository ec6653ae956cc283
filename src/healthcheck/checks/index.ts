/**
 * Built-in check catalogue, in report order
 */

import { CheckRegistry } from '../registry.js'
import type { Check } from '../types.js'
import { siteServerChecks } from './siteServer.js'
import { siteDatabaseChecks } from './siteDatabase.js'
import { siteComponentChecks } from './siteComponents.js'
import { distributionPointChecks } from './distributionPoints.js'
import { clientHealthChecks } from './clientHealth.js'
import { collectionChecks } from './collections.js'
import { softwareUpdateChecks } from './softwareUpdates.js'
import { siteBackupChecks } from './siteBackup.js'
import { boundaryChecks } from './boundaries.js'

export const DEFAULT_CHECKS: readonly Check[] = [
  ...siteServerChecks,
  ...siteDatabaseChecks,
  ...siteComponentChecks,
  ...distributionPointChecks,
  ...clientHealthChecks,
  ...collectionChecks,
  ...softwareUpdateChecks,
  ...siteBackupChecks,
  ...boundaryChecks,
]

export function buildDefaultRegistry(): CheckRegistry {
  return new CheckRegistry().registerAll(DEFAULT_CHECKS)
}

import { z } from 'zod'
import { defineCheck } from '../registry.js'
import type { Check } from '../types.js'

export const SOFTWARE_UPDATES = 'Software Updates'

const SYNC_STATUS_CALL = 'Get-CMSoftwareUpdateSyncStatus'

/** SMS_SUPSyncStatus.LastSyncState for a completed synchronization */
const SYNC_STATE_COMPLETED = 6702

const syncStatusSchema = z.array(
  z.object({
    WSUSServerName: z.string(),
    LastSyncState: z.number().int(),
    LastSyncErrorCode: z.number().int().nullable(),
  })
)

export const updatePointSyncCheck = defineCheck({
  section: SOFTWARE_UPDATES,
  name: 'Update point sync',
  remoteCall: SYNC_STATUS_CALL,
  query: connection =>
    connection.query({
      name: SYNC_STATUS_CALL,
      script: 'Get-CMSoftwareUpdateSyncStatus | Select-Object WSUSServerName, LastSyncState, LastSyncErrorCode',
      schema: syncStatusSchema,
    }),
  classify: points => {
    if (points.length === 0) {
      return { status: 'warning', note: 'No software update point reported a sync status' }
    }
    const failed = points.filter(p => p.LastSyncState !== SYNC_STATE_COMPLETED)
    if (failed.length > 0) {
      return {
        status: 'warning',
        note: failed
          .map(p => `${p.WSUSServerName}: last sync state ${p.LastSyncState}${p.LastSyncErrorCode ? ` (error ${p.LastSyncErrorCode})` : ''}`)
          .join(', '),
      }
    }
    return {
      status: 'healthy',
      note: `${points.map(p => p.WSUSServerName).join(', ')} synchronized`,
    }
  },
})

export const softwareUpdateChecks: Check[] = [updatePointSyncCheck]

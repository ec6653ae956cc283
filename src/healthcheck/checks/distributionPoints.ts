import { z } from 'zod'
import { defineCheck } from '../registry.js'
import { aboveThreshold } from '../classify.js'
import type { Check } from '../types.js'
import { cimQuery, siteNamespace } from './remote.js'

export const DISTRIBUTION_POINTS = 'Distribution Points'

const DP_STATUS_CALL = 'Get-CimInstance SMS_DPStatusInfo'
const CONTENT_STATUS_CALL = 'Get-CimInstance SMS_PackageStatusDistPointsSummarizer'

/** SMS_DPStatusInfo.MessageState: 1 success, 2 in progress, 3 unknown, 4 error */
const DP_STATE_SUCCESS = 1

/** SMS_PackageStatusDistPointsSummarizer.State: 0 installed */
const CONTENT_STATE_INSTALLED = 0

const dpStatusSchema = z.array(z.object({ Name: z.string(), MessageState: z.number().int() }))

const contentStatusSchema = z.array(
  z.object({ PackageID: z.string(), ServerNALPath: z.string(), State: z.number().int() })
)

const DP_STATE_LABELS: Record<number, string> = {
  2: 'in progress',
  3: 'unknown',
  4: 'error',
}

export const distributionPointStatusCheck = defineCheck({
  section: DISTRIBUTION_POINTS,
  name: 'Distribution point status',
  remoteCall: DP_STATUS_CALL,
  query: connection =>
    connection.query({
      name: DP_STATUS_CALL,
      script: cimQuery(connection.target.providerMachine, {
        namespace: siteNamespace(connection.target),
        className: 'SMS_DPStatusInfo',
        select: ['Name', 'MessageState'],
      }),
      schema: dpStatusSchema,
    }),
  classify: points => {
    if (points.length === 0) {
      return { status: 'warning', note: 'No distribution points reported' }
    }
    const unhealthy = points.filter(p => p.MessageState !== DP_STATE_SUCCESS)
    if (unhealthy.length > 0) {
      return {
        status: 'warning',
        note: unhealthy
          .map(p => `${p.Name}: ${DP_STATE_LABELS[p.MessageState] ?? `state ${p.MessageState}`}`)
          .join(', '),
      }
    }
    return { status: 'healthy', note: `${points.length} distribution point(s) healthy` }
  },
})

export const contentPendingCheck = defineCheck({
  section: DISTRIBUTION_POINTS,
  name: 'Content pending',
  remoteCall: CONTENT_STATUS_CALL,
  query: async connection => {
    const rows = await connection.query({
      name: CONTENT_STATUS_CALL,
      script: cimQuery(connection.target.providerMachine, {
        namespace: siteNamespace(connection.target),
        className: 'SMS_PackageStatusDistPointsSummarizer',
        filter: `State<>${CONTENT_STATE_INSTALLED}`,
        select: ['PackageID', 'ServerNALPath', 'State'],
      }),
      schema: contentStatusSchema,
    })
    return rows.filter(row => row.State !== CONTENT_STATE_INSTALLED)
  },
  classify: (pending, thresholds) => {
    const status = aboveThreshold(pending.length, thresholds.pendingContentCount)
    if (pending.length === 0) {
      return { status, note: 'All content installed on distribution points' }
    }
    const packages = new Set(pending.map(row => row.PackageID))
    return {
      status,
      note: `${pending.length} package/distribution point pair(s) not installed across ${packages.size} package(s) (threshold ${thresholds.pendingContentCount})`,
    }
  },
})

export const distributionPointChecks: Check[] = [distributionPointStatusCheck, contentPendingCheck]

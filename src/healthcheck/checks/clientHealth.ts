import { z } from 'zod'
import { defineCheck, defineManualCheck } from '../registry.js'
import { belowThreshold, formatPercent, percentOf } from '../classify.js'
import type { Check } from '../types.js'
import { psQuote } from '../../connection/powershell.js'
import { siteNamespace } from './remote.js'

export const CLIENT_HEALTH = 'Client Health'

const CLIENT_SUMMARY_CALL = 'Get-CimInstance SMS_CH_ClientSummary'

const clientSummarySchema = z.tuple([
  z.object({ Total: z.number().int().nonnegative(), Active: z.number().int().nonnegative() }),
])

export interface ClientActivity {
  total: number
  active: number
}

export const activeClientsCheck = defineCheck({
  section: CLIENT_HEALTH,
  name: 'Active clients',
  remoteCall: CLIENT_SUMMARY_CALL,
  query: async (connection): Promise<ClientActivity> => {
    const { target } = connection
    const [summary] = await connection.query({
      name: CLIENT_SUMMARY_CALL,
      script: [
        `$clients = @(Get-CimInstance -ComputerName ${psQuote(target.providerMachine)} -Namespace ${psQuote(siteNamespace(target))} -ClassName SMS_CH_ClientSummary)`,
        "[pscustomobject]@{ Total = $clients.Count; Active = @($clients | Where-Object ClientActiveStatus -eq 1).Count }",
      ].join('\n'),
      schema: clientSummarySchema,
    })
    return { total: summary.Total, active: summary.Active }
  },
  classify: ({ total, active }, thresholds) => {
    if (total === 0) {
      return { status: 'warning', note: 'No clients reported by client health summarization' }
    }
    const activePercent = percentOf(active, total)
    return {
      status: belowThreshold(activePercent, thresholds.activeClientPercent),
      note: `${active} of ${total} clients active (${formatPercent(activePercent)}, threshold ${thresholds.activeClientPercent}%)`,
    }
  },
})

export const clientPushAccountCheck = defineManualCheck({
  section: CLIENT_HEALTH,
  name: 'Client push account',
  instruction: 'Confirm the client push installation account is valid and its password has not expired',
})

export const clientHealthChecks: Check[] = [activeClientsCheck, clientPushAccountCheck]

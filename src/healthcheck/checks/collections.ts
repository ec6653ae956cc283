import { z } from 'zod'
import { defineCheck } from '../registry.js'
import { aboveThreshold } from '../classify.js'
import type { Check } from '../types.js'
import { sqlServerHost } from './remote.js'

export const COLLECTIONS = 'Collections'

const EVALUATION_CALL = 'Invoke-Sqlcmd Collections_L evaluation length'

const evaluationSchema = z.array(z.object({ CollectionName: z.string(), Seconds: z.number().nonnegative() }))

export const evaluationTimeCheck = defineCheck({
  section: COLLECTIONS,
  name: 'Evaluation time',
  remoteCall: EVALUATION_CALL,
  query: connection => {
    const { siteCode } = connection.target
    const sql = [
      'SELECT TOP 5 cg.CollectionName, CAST(cl.EvaluationLength AS float) / 1000 AS Seconds',
      'FROM Collections_L cl INNER JOIN Collections_G cg ON cg.CollectionID = cl.CollectionID',
      'ORDER BY cl.EvaluationLength DESC',
    ].join(' ')
    return connection.query({
      name: EVALUATION_CALL,
      script: [
        `$sqlHost = ${sqlServerHost(connection.target)}`,
        `Invoke-Sqlcmd -ServerInstance $sqlHost -Database 'CM_${siteCode}' -Query '${sql}' |`,
        '  Select-Object CollectionName, Seconds',
      ].join('\n'),
      schema: evaluationSchema,
    })
  },
  classify: (collections, thresholds) => {
    if (collections.length === 0) {
      return { status: 'healthy', note: 'No collection evaluations recorded' }
    }
    // Rows arrive longest first
    const slow = collections.filter(c => aboveThreshold(c.Seconds, thresholds.evaluationSeconds) === 'warning')
    if (slow.length > 0) {
      return {
        status: 'warning',
        note: `Slow full evaluation: ${slow.map(c => `${c.CollectionName} ${c.Seconds}s`).join(', ')} (threshold ${thresholds.evaluationSeconds}s)`,
      }
    }
    const longest = Math.max(...collections.map(c => c.Seconds))
    return {
      status: 'healthy',
      note: `Longest full evaluation ${longest}s (threshold ${thresholds.evaluationSeconds}s)`,
    }
  },
})

export const collectionChecks: Check[] = [evaluationTimeCheck]

import { z } from 'zod'
import { defineCheck, defineManualCheck } from '../registry.js'
import { aboveThreshold } from '../classify.js'
import type { Check } from '../types.js'
import { cimQuery, siteNamespace } from './remote.js'

export const SITE_COMPONENTS = 'Site Components'

const COMPONENT_SUMMARY_CALL = 'Get-CimInstance SMS_ComponentSummarizer'

/** SMS_ComponentSummarizer.Status: 0 OK, 1 warning, 2 critical */
const COMPONENT_STATUS_CRITICAL = 2

const componentSchema = z.array(z.object({ ComponentName: z.string(), Status: z.number().int() }))

export const componentStatusCheck = defineCheck({
  section: SITE_COMPONENTS,
  name: 'Component status',
  remoteCall: COMPONENT_SUMMARY_CALL,
  query: connection =>
    connection.query({
      name: COMPONENT_SUMMARY_CALL,
      script: cimQuery(connection.target.providerMachine, {
        namespace: siteNamespace(connection.target),
        className: 'SMS_ComponentSummarizer',
        // TallyInterval for "since site installation"
        filter: `TallyInterval='0001128000100008' AND SiteCode='${connection.target.siteCode}'`,
        select: ['ComponentName', 'Status'],
      }),
      schema: componentSchema,
    }),
  classify: (components, thresholds) => {
    const failing = components.filter(c => c.Status >= COMPONENT_STATUS_CRITICAL)
    const status = aboveThreshold(failing.length, thresholds.componentErrorCount)
    if (failing.length === 0) {
      return { status, note: `${components.length} component(s), none in error` }
    }
    return {
      status,
      note: `${failing.length} of ${components.length} component(s) in error: ${failing.map(c => c.ComponentName).join(', ')}`,
    }
  },
})

export const componentLogReviewCheck = defineManualCheck({
  section: SITE_COMPONENTS,
  name: 'Component log review',
  instruction: 'Review sitecomp.log, smsexec.log and hman.log on the site server for recurring errors',
})

export const siteComponentChecks: Check[] = [componentStatusCheck, componentLogReviewCheck]

import { z } from 'zod'
import { defineCheck } from '../registry.js'
import { aboveThreshold } from '../classify.js'
import type { Check } from '../types.js'
import { psQuote } from '../../connection/powershell.js'
import { siteNamespace } from './remote.js'

export const SITE_BACKUP = 'Site Backup'

const BACKUP_STATUS_CALL = 'Get-CimInstance SMS_SQLTaskStatus (backup)'

const backupSchema = z.array(
  z.object({
    TaskName: z.string(),
    /** Hours since the last completion, computed on the remote side; null if never run */
    AgeHours: z.number().nullable(),
    /** 0 success */
    CompletionStatus: z.number().int(),
  })
)

export const lastBackupCheck = defineCheck({
  section: SITE_BACKUP,
  name: 'Last backup',
  remoteCall: BACKUP_STATUS_CALL,
  query: connection => {
    const { target } = connection
    return connection.query({
      name: BACKUP_STATUS_CALL,
      script: [
        `Get-CimInstance -ComputerName ${psQuote(target.providerMachine)} -Namespace ${psQuote(siteNamespace(target))} -ClassName SMS_SQLTaskStatus -Filter "TaskName='Backup SMS Site Server'" |`,
        "  Select-Object TaskName, CompletionStatus, @{ n = 'AgeHours'; e = { if ($_.LastCompletionTime) { [math]::Round(((Get-Date) - $_.LastCompletionTime).TotalHours, 1) } else { $null } } }",
      ].join('\n'),
      schema: backupSchema,
    })
  },
  classify: (tasks, thresholds) => {
    const [task] = tasks
    if (!task) {
      return { status: 'warning', note: 'Backup maintenance task not found' }
    }
    if (task.AgeHours === null) {
      return { status: 'warning', note: 'Site backup has never completed' }
    }
    if (task.CompletionStatus !== 0) {
      return {
        status: 'warning',
        note: `Last backup finished ${task.AgeHours}h ago with status ${task.CompletionStatus}`,
      }
    }
    return {
      status: aboveThreshold(task.AgeHours, thresholds.backupAgeHours),
      note: `Last successful backup ${task.AgeHours}h ago (threshold ${thresholds.backupAgeHours}h)`,
    }
  },
})

export const siteBackupChecks: Check[] = [lastBackupCheck]

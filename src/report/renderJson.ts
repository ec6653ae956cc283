import { AppError } from '../shared/error.js'
import { isHealthStatus } from '../types/healthStatus.js'
import type { HealthReport } from '../healthcheck/types.js'

/**
 * Machine-readable report. Rejects unknown statuses the same way the HTML
 * renderer does.
 */
export function renderJson(report: HealthReport): string {
  const sections = report.sections.map(section => ({
    name: section.name,
    results: section.results.map(result => {
      if (!isHealthStatus(result.status)) {
        throw AppError.unmappedStatus(String(result.status), result.name)
      }
      return {
        name: result.name,
        status: result.status,
        note: result.note,
        ...(result.error ? { error: result.error } : {}),
        durationMs: result.durationMs,
      }
    }),
  }))

  const document = {
    generatedAt: report.generatedAt.toISOString(),
    target: report.target,
    summary: report.summary,
    sections,
  }
  return JSON.stringify(document, null, 2) + '\n'
}

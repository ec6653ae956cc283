/**
 * HTML report renderer
 *
 * Produces one self-contained document (inline CSS, no scripts). Every piece
 * of free text is escaped; styling comes only from the status table.
 */

import { formatTimestamp } from '../shared/formatTime.js'
import { HEALTH_STATUSES } from '../types/healthStatus.js'
import type { SiteTarget } from '../connection/types.js'
import type { CheckResult, HealthReport, ReportSection } from '../healthcheck/types.js'
import type { AppError } from '../shared/error.js'
import { escapeHtml } from './escapeHtml.js'
import { DEFAULT_STATUS_STYLES, styleFor, type StatusStyleTable } from './styles.js'

export interface RenderOptions {
  title: string
  styles?: StatusStyleTable
}

const BASE_CSS = `
body { font-family: "Segoe UI", Arial, sans-serif; margin: 24px; color: #212529; }
h1 { font-size: 22px; margin-bottom: 4px; }
h2 { font-size: 17px; margin: 24px 0 8px; border-bottom: 1px solid #dee2e6; padding-bottom: 4px; }
.provenance { color: #6c757d; margin-top: 0; }
.summary span { display: inline-block; margin-right: 8px; padding: 2px 8px; border-radius: 10px; font-size: 13px; }
table { border-collapse: collapse; width: 100%; }
th, td { text-align: left; padding: 6px 10px; border-bottom: 1px solid #dee2e6; vertical-align: top; font-size: 14px; }
th { background: #f8f9fa; }
td.check { width: 24%; }
td.status { width: 12%; }
.badge { display: inline-block; padding: 2px 8px; border-radius: 4px; font-weight: 600; font-size: 12px; }
.error { margin-top: 4px; font-family: Consolas, monospace; font-size: 12px; color: #721c24; }
`.trim()

function statusCss(styles: StatusStyleTable): string {
  return HEALTH_STATUSES.map(status => {
    const style = styleFor(styles, status, 'style table')
    return `.${style.className} { color: ${style.color}; background: ${style.background}; }`
  }).join('\n')
}

function renderHead(title: string, styles: StatusStyleTable): string {
  return [
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>\n${BASE_CSS}\n${statusCss(styles)}\n</style>`,
    '</head>',
  ].join('\n')
}

function renderProvenance(target: SiteTarget, generatedAt: Date): string {
  return `<p class="provenance">Site <strong>${escapeHtml(target.siteCode)}</strong> on ${escapeHtml(target.providerMachine)} &middot; generated ${escapeHtml(formatTimestamp(generatedAt))}</p>`
}

function renderSummary(report: HealthReport, styles: StatusStyleTable): string {
  const chips = HEALTH_STATUSES.filter(status => report.summary[status] > 0).map(status => {
    const style = styleFor(styles, status, 'summary')
    return `<span class="${style.className}">${escapeHtml(style.label)}: ${report.summary[status]}</span>`
  })
  return `<p class="summary">${report.summary.total} check(s) ${chips.join('')}</p>`
}

function renderRow(result: CheckResult, styles: StatusStyleTable): string {
  const style = styleFor(styles, result.status, result.name)
  const error = result.error ? `<div class="error">${escapeHtml(result.error)}</div>` : ''
  return [
    `<tr class="${style.className}">`,
    `<td class="check">${escapeHtml(result.name)}</td>`,
    `<td class="status"><span class="badge ${style.className}">${escapeHtml(style.label)}</span></td>`,
    `<td class="note">${escapeHtml(result.note)}${error}</td>`,
    '</tr>',
  ].join('')
}

function renderSection(section: ReportSection, styles: StatusStyleTable): string {
  const rows = section.results.map(result => renderRow(result, styles))
  return [
    '<section class="report-section">',
    `<h2>${escapeHtml(section.name)}</h2>`,
    '<table>',
    '<thead><tr><th>Check</th><th>Status</th><th>Details</th></tr></thead>',
    '<tbody>',
    ...rows,
    '</tbody>',
    '</table>',
    '</section>',
  ].join('\n')
}

/**
 * Render the full report. Throws RENDER_UNMAPPED_STATUS before producing any
 * output if a row carries a status the style table does not know.
 */
export function renderHtml(report: HealthReport, options: RenderOptions): string {
  const styles = options.styles ?? DEFAULT_STATUS_STYLES

  // Validate every row first so a bad status never yields a partial document
  for (const section of report.sections) {
    for (const result of section.results) {
      styleFor(styles, result.status, result.name)
    }
  }

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    renderHead(options.title, styles),
    '<body>',
    '<header>',
    `<h1>${escapeHtml(options.title)}</h1>`,
    renderProvenance(report.target, report.generatedAt),
    renderSummary(report, styles),
    '</header>',
    ...report.sections.map(section => renderSection(section, styles)),
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

export interface FatalReportInput {
  title: string
  error: AppError
  generatedAt: Date
  /** Whatever is known about the target; the connection may never have opened */
  target?: Partial<SiteTarget>
}

/**
 * Minimal document written when no report can be produced. It has no check
 * rows, so a stale report at the same path is never mistaken for a fresh one.
 */
export function renderFatalHtml(input: FatalReportInput): string {
  const target: SiteTarget = {
    siteCode: input.target?.siteCode ?? 'unknown site',
    providerMachine: input.target?.providerMachine ?? 'unknown host',
  }
  const suggestion = input.error.suggestion
    ? `<p class="suggestion">${escapeHtml(input.error.suggestion)}</p>`
    : ''

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(input.title)}: report not generated</title>`,
    `<style>\n${BASE_CSS}\n.fatal { color: #721c24; background: #f8d7da; padding: 12px; border-radius: 4px; }\n</style>`,
    '</head>',
    '<body>',
    `<h1>${escapeHtml(input.title)}</h1>`,
    renderProvenance(target, input.generatedAt),
    '<div class="fatal">',
    '<p><strong>The report could not be generated.</strong> No checks were run.</p>',
    `<p class="error">${escapeHtml(input.error.code)}: ${escapeHtml(input.error.message)}</p>`,
    suggestion,
    '</div>',
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

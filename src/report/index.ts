/**
 * @entry Report module - HTML/JSON/terminal renderers and the writer
 */

export { renderHtml, renderFatalHtml, type RenderOptions, type FatalReportInput } from './renderHtml.js'
export { renderJson } from './renderJson.js'
export { formatReportForTerminal, formatResultLine } from './formatTerminal.js'
export { writeReport } from './writeReport.js'
export { escapeHtml } from './escapeHtml.js'
export {
  DEFAULT_STATUS_STYLES,
  resolveStyles,
  styleFor,
  type StatusStyle,
  type StatusStyleTable,
} from './styles.js'
export {
  generateReport,
  renderReport,
  exitCodeFor,
  type GenerateReportOptions,
  type GenerateOutcome,
} from './generateReport.js'

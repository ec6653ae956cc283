/**
 * @entry Healthcheck module - check registry, runner and built-in catalogue
 */

export type {
  Check,
  CheckDefinition,
  CheckResult,
  Classification,
  HealthReport,
  ReportSection,
  StatusSummary,
  Thresholds,
} from './types.js'
export {
  CheckRegistry,
  defineCheck,
  defineManualCheck,
  MANUAL_REMOTE_CALL,
  type ManualCheckDefinition,
} from './registry.js'
export { runChecks, runCheck, summarize, type RunChecksOptions } from './runner.js'
export { aboveThreshold, belowThreshold, manualCheck, percentOf, formatPercent } from './classify.js'
export { DEFAULT_CHECKS, buildDefaultRegistry } from './checks/index.js'

/**
 * Status → style table
 *
 * Class names are fixed per status and never built from input. Labels and
 * colours can be overridden from config (colours are validated as hex).
 */

import { AppError } from '../shared/error.js'
import { isHealthStatus, type HealthStatus } from '../types/healthStatus.js'
import type { StyleConfig } from '../config/schema.js'

export interface StatusStyle {
  label: string
  className: string
  color: string
  background: string
}

export type StatusStyleTable = Readonly<Record<HealthStatus, Readonly<StatusStyle>>>

export const DEFAULT_STATUS_STYLES: StatusStyleTable = {
  healthy: { label: 'Healthy', className: 'status-healthy', color: '#155724', background: '#d4edda' },
  warning: { label: 'Warning', className: 'status-warning', color: '#856404', background: '#fff3cd' },
  critical: { label: 'Critical', className: 'status-critical', color: '#721c24', background: '#f8d7da' },
  manual: { label: 'Manual Check', className: 'status-manual', color: '#0c5460', background: '#d1ecf1' },
  unknown: { label: 'Unknown', className: 'status-unknown', color: '#383d41', background: '#e2e3e5' },
}

export function resolveStyles(overrides: StyleConfig = {}, base: StatusStyleTable = DEFAULT_STATUS_STYLES): StatusStyleTable {
  const merge = (status: HealthStatus): StatusStyle => {
    const override = overrides[status]
    return {
      ...base[status],
      ...(override?.label ? { label: override.label } : {}),
      ...(override?.color ? { color: override.color } : {}),
      ...(override?.background ? { background: override.background } : {}),
    }
  }
  return Object.freeze({
    healthy: merge('healthy'),
    warning: merge('warning'),
    critical: merge('critical'),
    manual: merge('manual'),
    unknown: merge('unknown'),
  })
}

/**
 * Look up the style for a status. Anything outside the table throws: a
 * typo'd status must not render as an unstyled row.
 */
export function styleFor(table: StatusStyleTable, status: string, checkName: string): StatusStyle {
  // hasOwn: tables built at runtime may be missing entries the type promises
  const style = isHealthStatus(status) && Object.hasOwn(table, status) ? table[status] : undefined
  if (!style) {
    throw AppError.unmappedStatus(status, checkName)
  }
  return style
}

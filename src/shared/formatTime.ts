/**
 * Time helpers on top of date-fns
 */

import { format } from 'date-fns'

export const REPORT_TIME_PATTERN = 'yyyy-MM-dd HH:mm:ss'

/** Local wall-clock timestamp shown in report headers */
export function formatTimestamp(date: Date, pattern: string = REPORT_TIME_PATTERN): string {
  return format(date, pattern)
}

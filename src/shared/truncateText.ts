/**
 * Truncate text with ellipsis
 *
 * Report notes: 160, error causes: 300
 */
export function truncateText(text: string, maxLength: number = 160, suffix: string = '...'): string {
  if (text.length <= maxLength) return text
  return text.slice(0, maxLength - suffix.length) + suffix
}

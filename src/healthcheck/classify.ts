/**
 * Threshold classifiers
 *
 * Comparisons are strict: a value equal to its threshold is healthy.
 */

import type { ClassifiedStatus } from '../types/healthStatus.js'
import type { Classification } from './types.js'

/** Warning when the value exceeds the threshold (CPU, memory, durations, counts) */
export function aboveThreshold(value: number, threshold: number): ClassifiedStatus {
  return value > threshold ? 'warning' : 'healthy'
}

/** Warning when the value falls short of the threshold (free space, active share) */
export function belowThreshold(value: number, threshold: number): ClassifiedStatus {
  return value < threshold ? 'warning' : 'healthy'
}

/** Constant classifier for checks a human has to verify */
export function manualCheck(note: string): () => Classification {
  return () => ({ status: 'manual', note })
}

/** Percentage computed multiply-first so exact ratios stay exact */
export function percentOf(part: number, whole: number): number {
  return (part * 100) / whole
}

export function formatPercent(value: number): string {
  return `${Number.isInteger(value) ? value : value.toFixed(1)}%`
}

import { defineManualCheck } from '../registry.js'
import type { Check } from '../types.js'

export const BOUNDARIES = 'Boundaries'

export const boundaryGroupCoverageCheck = defineManualCheck({
  section: BOUNDARIES,
  name: 'Boundary group coverage',
  instruction: 'Verify every site subnet or IP range belongs to a boundary group with a site system assigned',
})

export const boundaryChecks: Check[] = [boundaryGroupCoverageCheck]

import { AppError } from '../shared/error.js'
import { manualCheck } from './classify.js'
import type { ManagementConnection } from '../connection/types.js'
import type { Check, CheckDefinition, Thresholds } from './types.js'

/**
 * Turn a definition into a registered check, binding its metric type.
 */
export function defineCheck<M>(definition: CheckDefinition<M>): Check {
  const { section, name, remoteCall, query, classify } = definition
  return Object.freeze({
    section,
    name,
    remoteCall,
    manual: false,
    async fetch(connection: ManagementConnection) {
      const metric = await query(connection)
      return (thresholds: Thresholds) => classify(metric, thresholds)
    },
  } satisfies Check)
}

/** Shown where a manual check's remote call would be */
export const MANUAL_REMOTE_CALL = 'none'

export interface ManualCheckDefinition {
  section: string
  name: string
  /** What the reviewer has to look at */
  instruction: string
}

/**
 * A check with no automatable signal. It makes no remote call and always
 * classifies as manual, so the section still shows up in the report.
 */
export function defineManualCheck(definition: ManualCheckDefinition): Check {
  const check = defineCheck<null>({
    section: definition.section,
    name: definition.name,
    remoteCall: MANUAL_REMOTE_CALL,
    query: async () => null,
    classify: manualCheck(definition.instruction),
  })
  return Object.freeze({ ...check, manual: true })
}

/**
 * Ordered set of checks. Registration order is report order; sections appear
 * in the order their first check was registered.
 */
export class CheckRegistry {
  readonly #checks: Check[] = []
  readonly #keys = new Set<string>()

  register(check: Check): this {
    if (!check.section.trim()) throw AppError.checkInvalid('section must not be empty')
    if (!check.name.trim()) throw AppError.checkInvalid(`check in ${check.section} has no name`)

    const key = `${check.section}\u0000${check.name}`
    if (this.#keys.has(key)) {
      throw AppError.checkInvalid(`duplicate check "${check.name}" in section "${check.section}"`)
    }
    this.#keys.add(key)
    this.#checks.push(check)
    return this
  }

  registerAll(checks: readonly Check[]): this {
    for (const check of checks) this.register(check)
    return this
  }

  get size(): number {
    return this.#checks.length
  }

  list(): readonly Check[] {
    return [...this.#checks]
  }

  sections(): Array<{ name: string; checks: Check[] }> {
    const grouped = new Map<string, Check[]>()
    for (const check of this.#checks) {
      const group = grouped.get(check.section)
      if (group) {
        group.push(check)
      } else {
        grouped.set(check.section, [check])
      }
    }
    return [...grouped].map(([name, checks]) => ({ name, checks }))
  }
}

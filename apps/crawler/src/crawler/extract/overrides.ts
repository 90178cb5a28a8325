/**
 * Estate and district corrections from overrides.json, applied after
 * extraction and before the hierarchy is canonicalized.
 */

import { OVERRIDE_RULES, type OverrideField, type OverrideRule } from '../data/index.js'
import type { ResolvedFields } from '../types.js'

const OVERRIDE_FIELDS: readonly OverrideField[] = ['district', 'districtLevel2', 'subDistrict', 'estateName']

export interface OverrideResult {
  fields: ResolvedFields
  /** Descriptions of the rules that matched */
  applied: string[]
}

function matches(fields: ResolvedFields, rule: OverrideRule): boolean {
  return rule.match.fields.some(field => fields[field] === rule.match.equals)
}

export function applyOverrides(
  fields: ResolvedFields,
  rules: readonly OverrideRule[] = OVERRIDE_RULES
): OverrideResult {
  let current = fields
  const applied: string[] = []

  for (const rule of rules) {
    if (!matches(current, rule)) continue

    const next: ResolvedFields = { ...current }
    for (const field of OVERRIDE_FIELDS) {
      const value = rule.set[field]
      if (value !== undefined) next[field] = value
    }
    current = next
    applied.push(rule.description)
  }

  return { fields: current, applied }
}

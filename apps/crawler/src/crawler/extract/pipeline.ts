/**
 * Extraction Pipeline
 *
 * Resolves every field of a detail page by running the site's ordered
 * strategy chain; the first candidate that passes the field rule wins.
 * Fields resolve in a fixed order so later chains can read earlier results.
 *
 * No clock, network or randomness: the same HTML, URL and profile always
 * give the same fields.
 */

import type {
  ExtractResult,
  FieldName,
  FieldStrategy,
  FieldValueMap,
  HierarchyField,
  RawExtraction,
  ResolvedFields,
  SiteProfile,
  StrategyIds,
  StrategyInput,
} from '../types.js'
import { hierarchyFromPath } from './breadcrumb.js'
import { createPageDocument } from './document.js'
import { validateField } from './field-rules.js'
import { STRATEGY_CATALOG } from './strategies/index.js'

/** Resolution order after the breadcrumb path */
export const FIELD_ORDER: readonly Exclude<FieldName, 'breadcrumbPath'>[] = [
  'district',
  'estateName',
  'street',
  'address',
  'title',
  'price',
  'area',
  'monthlyMortgagePayment',
  'propertyType',
  'bedrooms',
  'bathrooms',
  'floor',
  'buildingAge',
  'orientation',
  'updateDate',
  'description',
  'images',
  'facilities',
]

const SEEDED_FIELDS: readonly HierarchyField[] = ['category', 'region', 'districtLevel2', 'subDistrict', 'estateName']

export interface ExtractOptions {
  /** Category label of the list the URL came from, used to anchor partial paths */
  categoryLabel?: string | null
}

function resolveField<K extends FieldName>(
  field: K,
  input: StrategyInput
): RawExtraction<K> | null {
  const ids: readonly StrategyIds[K][] = input.profile.fieldStrategies[field] ?? []
  const chain: Readonly<Record<StrategyIds[K], FieldStrategy<K>>> = STRATEGY_CATALOG[field]

  for (const [rank, id] of ids.entries()) {
    const strategy: FieldStrategy<K> = chain[id]
    const value = strategy(input)
    if (value !== null && validateField(field, value)) {
      return { fieldName: field, value, strategyId: id, strategyRank: rank }
    }
  }
  return null
}

function record<K extends FieldName>(
  resolved: ResolvedFields,
  extractions: RawExtraction[],
  extraction: RawExtraction<K>
): void {
  const value: FieldValueMap[K] = extraction.value
  resolved[extraction.fieldName] = value
  extractions.push(extraction)
}

/**
 * Fill category, region, districtLevel2, subDistrict and estateName from the
 * winning breadcrumb path.
 */
function seedFromPath(
  resolved: ResolvedFields,
  extractions: RawExtraction[],
  path: RawExtraction<'breadcrumbPath'>
): void {
  const hierarchy = hierarchyFromPath(path.value)
  for (const field of SEEDED_FIELDS) {
    const value = hierarchy[field]
    if (value === null || !validateField(field, value)) continue
    record(resolved, extractions, {
      fieldName: field,
      value,
      strategyId: `breadcrumbPath:${path.strategyId}`,
      strategyRank: path.strategyRank,
    })
  }
}

export function extractFields(
  html: string,
  url: string,
  profile: SiteProfile,
  options: ExtractOptions = {}
): ExtractResult {
  const parsed = createPageDocument(html)
  if (!parsed.ok) {
    return { ok: false, reason: parsed.reason, details: parsed.details }
  }

  const resolved: ResolvedFields = {}
  const extractions: RawExtraction[] = []
  const input: StrategyInput = {
    doc: parsed.doc,
    url,
    profile,
    resolved,
    categoryLabel: options.categoryLabel ?? null,
  }

  const path = resolveField('breadcrumbPath', input)
  if (path) {
    record(resolved, extractions, path)
    seedFromPath(resolved, extractions, path)
  }

  for (const field of FIELD_ORDER) {
    // estateName may already be seeded from the path
    if (resolved[field] !== undefined) continue
    const extraction = resolveField(field, input)
    if (extraction) record(resolved, extractions, extraction)
  }

  return { ok: true, fields: resolved, extractions }
}

/**
 * Breadcrumb Canonicalizer
 *
 * Two passes plus a combinator:
 * 1. assembleBreadcrumbPath: hierarchy fields -> path
 * 2. joinBreadcrumb / deriveHierarchy: path <-> breadcrumb string
 * 3. canonicalizeHierarchy: rewrites the hierarchy fields from the breadcrumb
 *
 * After canonicalization, deriveHierarchy(record.breadcrumb) reproduces the
 * record's category, region, districtLevel2, subDistrict and estateName.
 */

import { HOME_SENTINELS } from '../data/index.js'
import type { Hierarchy, HierarchyField, ResolvedFields } from '../types.js'
import { isDesignator } from './field-rules.js'
import { collapseWhitespace } from './kit/html.js'

export const BREADCRUMB_SEPARATOR = ' > '
export const HOME_LABEL = '主頁'

/** Parts before this index are category, region and districtLevel2 */
const ESTATE_MIN_INDEX = 3
/** Index of subDistrict; in a four-part path it is also the estate */
const SUB_DISTRICT_INDEX = 3

type PathFields = Partial<Record<HierarchyField | 'district', string | null>>

function cleanPart(value: string): string {
  return collapseWhitespace(value.replace(/>/g, ' '))
}

/**
 * Ordered hierarchy path without the home sentinel. `district` shares the
 * districtLevel2 slot and is only used when districtLevel2 is missing.
 */
export function assembleBreadcrumbPath(fields: PathFields): string[] {
  const slots = [
    HOME_LABEL,
    fields.category,
    fields.region,
    fields.districtLevel2 ? null : fields.district,
    fields.districtLevel2,
    fields.subDistrict,
    fields.estateName,
  ]

  const path: string[] = []
  for (const slot of slots) {
    if (!slot) continue
    const part = cleanPart(slot)
    if (part === '') continue
    if (path.length === 0 && HOME_SENTINELS.has(part)) continue
    if (path[path.length - 1] === part) continue
    path.push(part)
  }
  return path
}

/** `主頁 > a > b`, or null when there is no hierarchy to speak of */
export function joinBreadcrumb(path: readonly string[]): string | null {
  if (path.length < 2) return null
  return [HOME_LABEL, ...path].join(BREADCRUMB_SEPARATOR)
}

export function splitBreadcrumb(breadcrumb: string): string[] {
  const parts = breadcrumb
    .split(BREADCRUMB_SEPARATOR)
    .map(part => part.trim())
    .filter(part => part !== '')
  while (parts.length > 0 && HOME_SENTINELS.has(parts[0])) parts.shift()
  return parts
}

function pickEstate(parts: readonly string[]): string | null {
  if (parts.length <= ESTATE_MIN_INDEX) return null
  for (let i = parts.length - 1; i >= ESTATE_MIN_INDEX; i--) {
    if (!isDesignator(parts[i])) return parts[i]
  }
  return parts[parts.length - 1]
}

/** Positional reading of a path (home sentinel already removed) */
export function hierarchyFromPath(parts: readonly string[]): Hierarchy {
  return {
    category: parts[0] ?? null,
    region: parts[1] ?? null,
    districtLevel2: parts[2] ?? null,
    subDistrict: parts[SUB_DISTRICT_INDEX] ?? null,
    estateName: pickEstate(parts),
  }
}

export function deriveHierarchy(breadcrumb: string | null): Hierarchy {
  return hierarchyFromPath(breadcrumb ? splitBreadcrumb(breadcrumb) : [])
}

export interface CanonicalHierarchy {
  fields: ResolvedFields
  breadcrumb: string | null
}

/**
 * Assemble, join and re-derive. The derived hierarchy replaces the five
 * hierarchy fields; district keeps its resolved value. Without a breadcrumb
 * the fields are returned unchanged.
 */
export function canonicalizeHierarchy(fields: ResolvedFields): CanonicalHierarchy {
  const breadcrumb = joinBreadcrumb(assembleBreadcrumbPath(fields))
  if (breadcrumb === null) {
    return { fields, breadcrumb }
  }

  const derived = deriveHierarchy(breadcrumb)
  return {
    breadcrumb,
    fields: {
      ...fields,
      category: derived.category ?? undefined,
      region: derived.region ?? undefined,
      districtLevel2: derived.districtLevel2 ?? undefined,
      subDistrict: derived.subDistrict ?? undefined,
      estateName: derived.estateName ?? undefined,
    },
  }
}

/**
 * Region filter applied to a run's records after scheduling.
 *
 * Traditional and simplified spellings from regions.json are equivalent;
 * `新界` also covers 新界東 and 新界西.
 */

import { REGION_VARIANTS } from '../data/index.js'
import type { ListingRecord } from '../types.js'

/** Accepted spellings for `region`; the narrowest group that names it wins */
export function regionVariants(region: string): string[] {
  const wanted = region.trim()
  const exact = REGION_VARIANTS[wanted]
  if (exact) return exact

  const groups = Object.values(REGION_VARIANTS)
    .filter(variants => variants.includes(wanted))
    .sort((a, b) => a.length - b.length)
  return groups[0] ?? [wanted]
}

export function matchesRegion(record: ListingRecord, variants: readonly string[]): boolean {
  if (record.region !== null && variants.includes(record.region)) return true
  const { districtLevel2 } = record
  return districtLevel2 !== null && variants.some(variant => districtLevel2.includes(variant))
}

export function filterByRegion(records: readonly ListingRecord[], region: string): ListingRecord[] {
  const variants = regionVariants(region)
  return records.filter(record => matchesRegion(record, variants))
}

/**
 * Record Validator/Assembler (Fail-Closed)
 *
 * Final gate between resolved fields and an exported record. A record without
 * a resolvable title or a usable URL is rejected, never written.
 */

import type { AssembleResult, ListingRecord, ResolvedFields } from '../types.js'
import { isBoilerplate } from '../extract/field-rules.js'
import { canonicalizeUrl, hashUrl, parseUrlSlug } from '../utils/url.js'

export interface AssembleInput {
  url: string
  source: string
  fields: ResolvedFields
  /** Canonical breadcrumb, or null when the page had no hierarchy */
  breadcrumb: string | null
  crawledAt: Date
}

/**
 * Resolved title unless it is boilerplate, then the estate name, then the
 * URL slug text.
 */
export function resolveTitle(fields: ResolvedFields, url: string): string | null {
  const candidates = [fields.title, fields.estateName, parseUrlSlug(url)?.tokens.join(' ')]
  for (const candidate of candidates) {
    const trimmed = candidate?.trim()
    if (trimmed && !isBoilerplate(trimmed)) return trimmed
  }
  return null
}

export function assembleRecord(input: AssembleInput): AssembleResult {
  const { fields } = input

  const url = canonicalizeUrl(input.url)
  if (url === null) {
    return { status: 'reject', reason: 'INVALID_URL', details: `Not an http(s) URL: ${input.url}` }
  }

  const title = resolveTitle(fields, url)
  if (title === null) {
    return { status: 'reject', reason: 'TITLE_UNRESOLVED', details: `No usable title for ${url}` }
  }

  const record: ListingRecord = {
    propertyId: hashUrl(url),
    source: input.source,
    url,
    title,
    price: fields.price?.value ?? null,
    priceDisplay: fields.price?.display ?? null,
    monthlyMortgagePayment: fields.monthlyMortgagePayment?.value ?? null,
    area: fields.area?.value ?? null,
    areaDisplay: fields.area?.display ?? null,
    district: fields.district ?? null,
    street: fields.street ?? null,
    address: fields.address ?? null,
    category: fields.category ?? null,
    region: fields.region ?? null,
    districtLevel2: fields.districtLevel2 ?? null,
    subDistrict: fields.subDistrict ?? null,
    estateName: fields.estateName ?? null,
    breadcrumb: input.breadcrumb,
    propertyType: fields.propertyType ?? null,
    bedrooms: fields.bedrooms ?? null,
    bathrooms: fields.bathrooms ?? null,
    floor: fields.floor ?? null,
    buildingAge: fields.buildingAge ?? null,
    orientation: fields.orientation ?? null,
    description: fields.description ?? null,
    images: fields.images ?? [],
    facilities: fields.facilities ?? [],
    updateDate: fields.updateDate ?? null,
    crawledAt: input.crawledAt.toISOString(),
  }

  return { status: 'ok', record }
}

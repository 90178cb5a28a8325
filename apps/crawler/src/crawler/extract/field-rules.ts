/**
 * Field validation rules.
 *
 * A strategy candidate is only accepted when its field's rule passes. Text
 * rules reject boilerplate (login, cookie, menu and marketing labels) and
 * implausible lengths; numeric rules check parse results and ranges.
 */

import { CATEGORY_NAMES, STOPLIST_EXACT, STOPLIST_KEYWORDS } from '../data/index.js'
import type { FieldName, FieldValueMap, Measured } from '../types.js'
import { AREA_RANGE, inRange, PRICE_RANGE } from './kit/numbers.js'

/** Exact stoplist entry */
export function isStoplisted(value: string): boolean {
  return STOPLIST_EXACT.has(value.trim())
}

/** Exact stoplist entry, or contains a stoplist keyword */
export function isBoilerplate(value: string): boolean {
  const trimmed = value.trim()
  return isStoplisted(trimmed) || STOPLIST_KEYWORDS.some(keyword => trimmed.includes(keyword))
}

/**
 * Bare block/unit designators: `A座`, `2座`, `3期`, `B`, `12`, `H室`.
 * These end slugs and breadcrumbs but never name an estate.
 */
export function isDesignator(value: string): boolean {
  return /^(?:[A-Za-z]{1,2}|\d{1,3}|[A-Za-z0-9]{1,3}\s*[座期室樓層])$/.test(value.trim())
}

function textWithin(value: string, min: number, max: number): boolean {
  const trimmed = value.trim()
  return trimmed.length >= min && trimmed.length <= max
}

/** Short labels: names, hierarchy parts */
function isPlainLabel(value: string, min = 1, max = 40): boolean {
  return textWithin(value, min, max) && !isBoilerplate(value) && !value.includes('>')
}

function isMeasured(value: Measured, range: { min: number; max: number }): boolean {
  return Number.isFinite(value.value) && inRange(value.value, range) && value.display.trim() !== ''
}

function isCount(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

type FieldRules = { [K in FieldName]: (value: FieldValueMap[K]) => boolean }

export const FIELD_RULES: FieldRules = {
  breadcrumbPath: parts =>
    parts.length >= 2 &&
    parts.length <= 7 &&
    CATEGORY_NAMES.has(parts[0] ?? '') &&
    parts.every(part => isPlainLabel(part)),
  category: value => isPlainLabel(value),
  region: value => isPlainLabel(value),
  district: value => isPlainLabel(value, 2, 20),
  districtLevel2: value => isPlainLabel(value),
  subDistrict: value => isPlainLabel(value, 2),
  estateName: value => isPlainLabel(value, 1, 60) && !isDesignator(value),
  street: value => isPlainLabel(value, 2, 60),
  address: value => textWithin(value, 2, 200) && !isBoilerplate(value),
  title: value => textWithin(value, 2, 200) && !isBoilerplate(value),
  price: value => isMeasured(value, PRICE_RANGE),
  area: value => isMeasured(value, AREA_RANGE),
  monthlyMortgagePayment: value => isMeasured(value, { min: 1, max: 10_000_000 }),
  propertyType: value => isPlainLabel(value, 1, 20),
  bedrooms: value => isCount(value, 20),
  bathrooms: value => isCount(value, 20),
  floor: value => textWithin(value, 1, 12),
  buildingAge: value => isCount(value, 100),
  orientation: value => textWithin(value, 1, 4),
  updateDate: value => DATE_PATTERN.test(value),
  description: value => textWithin(value, 4, 5000) && !isStoplisted(value),
  images: value => value.length > 0,
  facilities: value => value.length > 0 && value.every(item => !isStoplisted(item)),
}

export function validateField<K extends FieldName>(field: K, value: FieldValueMap[K]): boolean {
  const rule: (value: FieldValueMap[K]) => boolean = FIELD_RULES[field]
  return rule(value)
}

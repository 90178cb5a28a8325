/**
 * Numeric parsing for prices and areas as written on Hong Kong listing pages.
 */

import type { Measured } from '../../types.js'

/** 萬 / 万 = ten thousand */
export const TEN_THOUSAND_UNITS = new Set(['萬', '万'])

/** Plausible sale or monthly rent range, in HKD */
export const PRICE_RANGE = { min: 100, max: 5_000_000_000 } as const

/** Plausible saleable / gross area, in square feet */
export const AREA_RANGE = { min: 50, max: 100_000 } as const

export function parseNumber(value: string): number | null {
  const cleaned = value.replace(/,/g, '').trim()
  if (!/^\d+(?:\.\d+)?$/.test(cleaned)) return null
  const parsed = Number.parseFloat(cleaned)
  return Number.isFinite(parsed) ? parsed : null
}

export function inRange(value: number, range: { min: number; max: number }): boolean {
  return value >= range.min && value <= range.max
}

const PRICE_PATTERN = /(?:HK\$|\$)\s*([\d,]+(?:\.\d+)?)\s*(萬|万)?|([\d,]+(?:\.\d+)?)\s*(萬|万)/g

/**
 * Every price mentioned in `text`, unit scaling applied. Amounts with a
 * dollar sign may carry a 萬 unit; bare numbers count only with one.
 */
export function findPrices(text: string): Measured[] {
  const prices: Measured[] = []
  for (const match of text.matchAll(PRICE_PATTERN)) {
    const digits = match[1] ?? match[3]
    const unit = match[2] ?? match[4]
    if (digits === undefined) continue

    const amount = parseNumber(digits)
    if (amount === null) continue

    const value = unit && TEN_THOUSAND_UNITS.has(unit) ? Math.round(amount * 10_000) : amount
    prices.push({ value, display: match[0].trim() })
  }
  return prices
}

/**
 * The largest plausible price in `text`. Teaser amounts such as "$0" or a
 * deposit fall below the winner.
 */
export function parsePrice(text: string): Measured | null {
  let best: Measured | null = null
  for (const price of findPrices(text)) {
    if (!inRange(price.value, PRICE_RANGE)) continue
    if (!best || price.value > best.value) best = price
  }
  return best
}

const LABELLED_AREA_PATTERN = /(實用面積|建築面積)\s*[:：]?\s*([\d,]+(?:\.\d+)?)\s*(平方呎|呎|ft²|sqft)/
const AREA_PATTERN = /([\d,]+(?:\.\d+)?)\s*(平方呎|呎|ft²|sqft)/g

/**
 * Area in square feet. A labelled saleable/gross area wins over any other
 * number followed by an area unit.
 */
export function parseArea(text: string): Measured | null {
  const labelled = LABELLED_AREA_PATTERN.exec(text)
  if (labelled?.[2] !== undefined) {
    const value = parseNumber(labelled[2])
    if (value !== null && inRange(value, AREA_RANGE)) {
      return { value, display: labelled[0].trim() }
    }
  }

  for (const match of text.matchAll(AREA_PATTERN)) {
    if (match[1] === undefined) continue
    const value = parseNumber(match[1])
    if (value !== null && inRange(value, AREA_RANGE)) {
      return { value, display: match[0].trim() }
    }
  }
  return null
}

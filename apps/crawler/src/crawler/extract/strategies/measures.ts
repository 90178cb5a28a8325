/**
 * Price, area and mortgage strategies.
 */

import type { FieldStrategy, Measured, StrategyIds } from '../../types.js'
import { allTexts } from '../kit/html.js'
import { asString, isRecord } from '../kit/json.js'
import { inRange, parseArea, parseNumber, parsePrice, PRICE_RANGE } from '../kit/numbers.js'

const MORTGAGE_PATTERN = /(?:月供|按揭)\s*[:：]?\s*(?:HK\$|\$)?\s*([\d,]+)/

const priceElement: FieldStrategy<'price'> = ({ doc, profile }) => {
  for (const text of allTexts(doc.$, profile.selectors.price)) {
    const price = parsePrice(text)
    if (price) return price
  }
  return null
}

const pricePageText: FieldStrategy<'price'> = ({ doc }) => parsePrice(doc.text)

function offerPrice(offer: unknown): Measured | null {
  if (!isRecord(offer)) return null
  for (const key of ['price', 'lowPrice']) {
    const raw = asString(offer[key])
    const value = raw === undefined ? null : parseNumber(raw)
    if (raw !== undefined && value !== null && inRange(value, PRICE_RANGE)) {
      const currency = asString(offer['priceCurrency'])
      return { value, display: currency ? `${currency} ${raw}` : raw }
    }
  }
  return null
}

/** JSON-LD `offers.price` (single offer or a list) */
const priceStructured: FieldStrategy<'price'> = ({ doc }) => {
  for (const node of doc.jsonLd) {
    const offers = node['offers']
    for (const offer of Array.isArray(offers) ? offers : [offers]) {
      const price = offerPrice(offer)
      if (price) return price
    }
  }
  return null
}

const areaElement: FieldStrategy<'area'> = ({ doc, profile }) => {
  for (const text of allTexts(doc.$, profile.selectors.area)) {
    const area = parseArea(text)
    if (area) return area
  }
  return null
}

const areaPageText: FieldStrategy<'area'> = ({ doc }) => parseArea(doc.text)

const mortgagePageText: FieldStrategy<'monthlyMortgagePayment'> = ({ doc }) => {
  const match = MORTGAGE_PATTERN.exec(doc.text)
  if (!match?.[1]) return null
  const value = parseNumber(match[1])
  return value === null ? null : { value, display: match[0].trim() }
}

export const PRICE_STRATEGIES: Record<StrategyIds['price'], FieldStrategy<'price'>> = {
  element: priceElement,
  pageText: pricePageText,
  structuredData: priceStructured,
}

export const AREA_STRATEGIES: Record<StrategyIds['area'], FieldStrategy<'area'>> = {
  element: areaElement,
  pageText: areaPageText,
}

export const MORTGAGE_STRATEGIES: Record<
  StrategyIds['monthlyMortgagePayment'],
  FieldStrategy<'monthlyMortgagePayment'>
> = {
  pageText: mortgagePageText,
}

/**
 * Street and address strategies.
 */

import type { FieldStrategy, StrategyIds } from '../../types.js'
import { isBoilerplate } from '../field-rules.js'
import { asString, isRecord } from '../kit/json.js'
import { firstAcceptedText, labelledText, unique } from './shared.js'

const STREET_NUMBER_PATTERN = /(\p{Script=Han}{1,12}(?:道|路|街|里|徑))\s*(\d+(?:[-–]\d+)?號)/u
const ADDRESS_LABEL = /^(?:地址|Address)\s*[:：]\s*/i

const streetLabelled: FieldStrategy<'street'> = ({ doc }) => labelledText(doc.lines, ['街道', '街名'])

/** `楊屋道1號` style street plus number */
const addressPattern: FieldStrategy<'street'> = ({ doc }) => {
  for (const line of doc.lines) {
    const match = STREET_NUMBER_PATTERN.exec(line)
    if (match) return `${match[1]}${match[2]}`
  }
  return null
}

const addressElement: FieldStrategy<'address'> = ({ doc, profile }) => {
  const text = firstAcceptedText(doc.$, profile.selectors.address, value => !isBoilerplate(value))
  return text ? text.replace(ADDRESS_LABEL, '').trim() || null : null
}

function postalAddress(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null
  if (!isRecord(value)) return null
  const parts = [value['addressRegion'], value['addressLocality'], value['streetAddress']]
    .map(asString)
    .filter((part): part is string => part !== undefined)
  return parts.length > 0 ? unique(parts).join(' ') : null
}

/** JSON-LD `address`, as a string or a PostalAddress */
const addressStructured: FieldStrategy<'address'> = ({ doc }) => {
  for (const node of doc.jsonLd) {
    const direct = postalAddress(node['address'])
    if (direct) return direct
    const place = node['itemOffered'] ?? node['containedInPlace']
    if (isRecord(place)) {
      const nested = postalAddress(place['address'])
      if (nested) return nested
    }
  }
  return null
}

/** Built from the fields resolved so far, broadest first */
const addressComposed: FieldStrategy<'address'> = ({ resolved }) => {
  const parts = [resolved.region, resolved.district, resolved.estateName, resolved.street].filter(
    (part): part is string => part !== undefined && part !== ''
  )
  const distinct = unique(parts)
  return distinct.length >= 2 ? distinct.join(' ') : null
}

export const STREET_STRATEGIES: Record<StrategyIds['street'], FieldStrategy<'street'>> = {
  labelledText: streetLabelled,
  addressPattern,
}

export const ADDRESS_STRATEGIES: Record<StrategyIds['address'], FieldStrategy<'address'>> = {
  element: addressElement,
  structuredData: addressStructured,
  composed: addressComposed,
}

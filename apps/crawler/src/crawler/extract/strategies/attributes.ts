/**
 * Listing attribute strategies: type, rooms, floor, age, orientation and
 * the listing's update date. All read the page text.
 */

import { VOCABULARY } from '../../data/index.js'
import type { FieldStrategy, StrategyIds } from '../../types.js'
import { validateField } from '../field-rules.js'
import { labelledText } from './shared.js'

const BEDROOM_PATTERN = /(\d+)\s*(?:睡房|房)/g
const BATHROOM_PATTERN = /(\d+)\s*(?:浴室|洗手間|廁)/g
const FLOOR_PATTERN = /(高層|中層|低層|\d+\s*樓(?![盤宇齡層])|\d+\s*層)/
const AGE_PATTERNS = [/樓齡\s*[:：]?\s*(\d+)/g, /屋齡\s*[:：]?\s*(\d+)/g, /(\d+)\s*年樓齡/g]
const MAX_BUILDING_AGE = 100
const ORIENTATION_LABELLED = /座向\s*[:：]?\s*([東南西北]{1,2})/
const ORIENTATION_SUFFIX = /(?:^|\s)([東南西北]{1,2})向(?=\s|$)/m
const UPDATE_DATE_PATTERN = /更新日期\s*[:：]\s*(\d{4})[-/](\d{1,2})[-/](\d{1,2})/

const propertyTypeLabelled: FieldStrategy<'propertyType'> = ({ doc }) =>
  labelledText(doc.lines, ['物業類型', '樓宇類型', '類型'])

/** First known type named anywhere on the page, vocabulary order */
const propertyTypeVocabulary: FieldStrategy<'propertyType'> = ({ doc }) =>
  VOCABULARY.propertyTypes.find(type => doc.text.includes(type)) ?? null

/** First count the field rule accepts; `3200房間單位` does not hide a later `2房` */
function firstPlausibleCount(field: 'bedrooms' | 'bathrooms', text: string, pattern: RegExp): number | null {
  for (const match of text.matchAll(pattern)) {
    if (!match[1]) continue
    const count = Number.parseInt(match[1], 10)
    if (validateField(field, count)) return count
  }
  return null
}

/** `2房`; an open-plan flat (`開放式`) has zero bedrooms */
const bedrooms: FieldStrategy<'bedrooms'> = ({ doc }) => {
  const count = firstPlausibleCount('bedrooms', doc.text, BEDROOM_PATTERN)
  if (count !== null) return count
  return doc.text.includes('開放式') ? 0 : null
}

const bathrooms: FieldStrategy<'bathrooms'> = ({ doc }) =>
  firstPlausibleCount('bathrooms', doc.text, BATHROOM_PATTERN)

const floor: FieldStrategy<'floor'> = ({ doc }) => {
  const match = FLOOR_PATTERN.exec(doc.text)
  return match?.[1] ? match[1].replace(/\s+/g, '') : null
}

/** First plausible age across the labelled forms */
const buildingAge: FieldStrategy<'buildingAge'> = ({ doc }) => {
  for (const pattern of AGE_PATTERNS) {
    for (const match of doc.text.matchAll(pattern)) {
      if (!match[1]) continue
      const age = Number.parseInt(match[1], 10)
      if (age <= MAX_BUILDING_AGE) return age
    }
  }
  return null
}

const orientation: FieldStrategy<'orientation'> = ({ doc }) =>
  ORIENTATION_LABELLED.exec(doc.text)?.[1] ?? ORIENTATION_SUFFIX.exec(doc.text)?.[1] ?? null

/** `更新日期：2024/3/5` gives `2024-03-05` */
const updateDate: FieldStrategy<'updateDate'> = ({ doc }) => {
  const match = UPDATE_DATE_PATTERN.exec(doc.text)
  if (!match?.[1] || !match[2] || !match[3]) return null
  return `${match[1]}-${match[2].padStart(2, '0')}-${match[3].padStart(2, '0')}`
}

export const PROPERTY_TYPE_STRATEGIES: Record<StrategyIds['propertyType'], FieldStrategy<'propertyType'>> = {
  labelledText: propertyTypeLabelled,
  vocabulary: propertyTypeVocabulary,
}

export const BEDROOM_STRATEGIES: Record<StrategyIds['bedrooms'], FieldStrategy<'bedrooms'>> = {
  pageText: bedrooms,
}

export const BATHROOM_STRATEGIES: Record<StrategyIds['bathrooms'], FieldStrategy<'bathrooms'>> = {
  pageText: bathrooms,
}

export const FLOOR_STRATEGIES: Record<StrategyIds['floor'], FieldStrategy<'floor'>> = {
  pageText: floor,
}

export const BUILDING_AGE_STRATEGIES: Record<StrategyIds['buildingAge'], FieldStrategy<'buildingAge'>> = {
  pageText: buildingAge,
}

export const ORIENTATION_STRATEGIES: Record<StrategyIds['orientation'], FieldStrategy<'orientation'>> = {
  pageText: orientation,
}

export const UPDATE_DATE_STRATEGIES: Record<StrategyIds['updateDate'], FieldStrategy<'updateDate'>> = {
  pageText: updateDate,
}

/**
 * Hierarchy strategies: the breadcrumb path and the two hierarchy fields
 * that have sources of their own (district, estate name).
 *
 * category, region, districtLevel2 and subDistrict have no strategies:
 * they are read positionally from the winning breadcrumb path.
 */

import { CATEGORY_NAMES, DISTRICT_NAMES, HOME_SENTINELS, REGION_NAMES } from '../../data/index.js'
import type { FieldStrategy, StrategyIds } from '../../types.js'
import { parseUrlSlug } from '../../utils/url.js'
import { isBoilerplate, isDesignator } from '../field-rules.js'
import { collapseWhitespace } from '../kit/html.js'
import { asString, hasJsonLdType, isRecord } from '../kit/json.js'
import { HAN_PATTERN, joinPipeTokens, labelledText, toPath } from './shared.js'

const MAX_PATH_PARTS = 7

// ═══════════════════════════════════════════════════════════════════════════════
// Breadcrumb path
// ═══════════════════════════════════════════════════════════════════════════════

/** Breadcrumb containers from the site's selectors: list items, then links, then text */
const navMarkup: FieldStrategy<'breadcrumbPath'> = ({ doc, profile }) => {
  const { $ } = doc
  for (const selector of profile.selectors.breadcrumb) {
    for (const el of $(selector).toArray()) {
      const container = $(el)
      const texts = (inner: string) =>
        container
          .find(inner)
          .toArray()
          .map(node => $(node).text())

      let path = toPath(texts('li'))
      if (path.length < 2) path = toPath(texts('a, span'))
      if (path.length < 2) path = toPath(collapseWhitespace(container.text()).split(/\s*[>›»]\s*/))
      if (path.length >= 2) return path.slice(0, MAX_PATH_PARTS)
    }
  }
  return null
}

const EMBEDDED_PATHS = /paths\s*:\s*\[([^\]]+)\]/
const EMBEDDED_PATH_ENTRY = /path\s*:\s*"([^"]+)"/g

/**
 * Navigation state serialized into inline scripts, as
 * `paths:[{path:"新界西_4-NW"},{path:"荃灣 | 麗城_23-WS050"}]`. Entries are
 * `label_code`; the list may start below the category.
 */
const embeddedNavData: FieldStrategy<'breadcrumbPath'> = ({ doc, categoryLabel }) => {
  for (const script of doc.scripts) {
    const block = EMBEDDED_PATHS.exec(script)?.[1]
    if (!block) continue

    const labels: string[] = []
    for (const entry of block.matchAll(EMBEDDED_PATH_ENTRY)) {
      const label = entry[1]?.split('_')[0]?.replace(/^-+/, '').trim()
      if (label) labels.push(label)
    }

    const path = toPath(labels)
    if (path.length === 0) continue
    if (!CATEGORY_NAMES.has(path[0]) && categoryLabel) path.unshift(categoryLabel)
    if (path.length >= 2) return path.slice(0, MAX_PATH_PARTS)
  }
  return null
}

/** schema.org BreadcrumbList, items ordered by position */
const jsonLdBreadcrumb: FieldStrategy<'breadcrumbPath'> = ({ doc }) => {
  for (const node of doc.jsonLd) {
    if (!hasJsonLdType(node, 'BreadcrumbList')) continue
    const items = node['itemListElement']
    if (!Array.isArray(items)) continue

    const entries: { position: number; name: string }[] = []
    items.forEach((item: unknown, index: number) => {
      if (!isRecord(item)) return
      const target = item['item']
      const nested = isRecord(target) ? asString(target['name']) : undefined
      const name = asString(item['name']) ?? nested
      const position = typeof item['position'] === 'number' ? item['position'] : index + 1
      if (name) entries.push({ position, name })
    })

    const path = toPath(entries.sort((a, b) => a.position - b.position).map(entry => entry.name))
    if (path.length >= 2) return path.slice(0, MAX_PATH_PARTS)
  }
  return null
}

/**
 * A home sentinel followed by a category on one line: `主頁 > 買樓 > 新界東`
 * or, without glyphs, `主頁 買樓 新界東`.
 */
const textPattern: FieldStrategy<'breadcrumbPath'> = ({ doc }) => {
  for (const line of doc.lines) {
    for (const sentinel of HOME_SENTINELS) {
      const at = line.indexOf(sentinel)
      if (at < 0) continue

      const tail = line.slice(at + sentinel.length)
      const parts = /^\s*[>›»]/.test(tail)
        ? tail.split(/\s*[>›»]\s*/)
        : joinPipeTokens(tail.trim().split(/\s+/))
      const path = toPath(parts).slice(0, MAX_PATH_PARTS)
      if (path.length >= 2 && CATEGORY_NAMES.has(path[0])) return path
    }
  }
  return null
}

/**
 * An anchor list that reads like a breadcrumb: exactly one category and one
 * region among its links. A list starting at the region gets the list
 * category in front.
 */
const navLinks: FieldStrategy<'breadcrumbPath'> = ({ doc, categoryLabel }) => {
  const { $ } = doc
  for (const el of $('nav, ol, ul, div').toArray()) {
    const container = $(el)
    const anchors = container.children('a').add(container.children('li, span').children('a'))
    let path = toPath(anchors.toArray().map(anchor => $(anchor).text()))
    if (path.length === 0) continue

    if (REGION_NAMES.has(path[0]) && categoryLabel) path = [categoryLabel, ...path]
    const categories = path.filter(part => CATEGORY_NAMES.has(part)).length
    const regions = path.filter(part => REGION_NAMES.has(part)).length
    if (path.length >= 2 && categories === 1 && regions === 1 && CATEGORY_NAMES.has(path[0])) {
      return path.slice(0, MAX_PATH_PARTS)
    }
  }
  return null
}

// ═══════════════════════════════════════════════════════════════════════════════
// District
// ═══════════════════════════════════════════════════════════════════════════════

function pipePrefix(value: string): string {
  return value.split(/[|｜]/)[0].trim()
}

/** First breadcrumb part naming one of the 18 districts */
const pathVocabulary: FieldStrategy<'district'> = ({ resolved }) => {
  for (const part of resolved.breadcrumbPath ?? []) {
    const candidate = pipePrefix(part)
    if (DISTRICT_NAMES.has(candidate)) return candidate
  }
  return null
}

/** `荃灣 | 麗城` names district 荃灣 */
const districtLevel2Prefix: FieldStrategy<'district'> = ({ resolved }) =>
  resolved.districtLevel2 ? pipePrefix(resolved.districtLevel2) || null : null

const districtLabelled: FieldStrategy<'district'> = ({ doc }) =>
  labelledText(doc.lines, ['地區', '區域'])

// ═══════════════════════════════════════════════════════════════════════════════
// Estate
// ═══════════════════════════════════════════════════════════════════════════════

const estateLabelled: FieldStrategy<'estateName'> = ({ doc }) =>
  labelledText(doc.lines, ['屋苑名稱', '屋苑', '大廈名稱', '大廈'])

/** Last slug token naming something: `荃灣西-御凱-2座_XYZ` gives 御凱 */
const estateFromSlug: FieldStrategy<'estateName'> = ({ url }) => {
  const slug = parseUrlSlug(url)
  if (!slug) return null
  for (const token of [...slug.tokens].reverse()) {
    if (isDesignator(token) || isBoilerplate(token) || !HAN_PATTERN.test(token)) continue
    if (DISTRICT_NAMES.has(token) || REGION_NAMES.has(token)) continue
    return token
  }
  return null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Tables
// ═══════════════════════════════════════════════════════════════════════════════

export const BREADCRUMB_PATH_STRATEGIES: Record<StrategyIds['breadcrumbPath'], FieldStrategy<'breadcrumbPath'>> = {
  navMarkup,
  embeddedNavData,
  jsonLdBreadcrumb,
  textPattern,
  navLinks,
}

export const DISTRICT_STRATEGIES: Record<StrategyIds['district'], FieldStrategy<'district'>> = {
  pathVocabulary,
  districtLevel2Prefix,
  labelledText: districtLabelled,
}

export const ESTATE_NAME_STRATEGIES: Record<StrategyIds['estateName'], FieldStrategy<'estateName'>> = {
  labelledText: estateLabelled,
  urlSlug: estateFromSlug,
}

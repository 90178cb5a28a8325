/**
 * Title strategies.
 *
 * Site brand names are stripped from page titles: `逸瓏灣 2房 | 中原地產`
 * gives `逸瓏灣 2房`.
 */

import type { FieldStrategy, StrategyIds } from '../../types.js'
import { parseUrlSlug } from '../../utils/url.js'
import { isBoilerplate } from '../field-rules.js'
import { collapseWhitespace, metaContent } from '../kit/html.js'
import { firstAcceptedText, HAN_PATTERN } from './shared.js'

const TITLE_SEPARATORS = /\s*[|｜–—]\s*|\s+-\s+/

function isSiteName(segment: string, siteNames: readonly string[]): boolean {
  const lowered = segment.toLowerCase()
  return siteNames.some(name => lowered.includes(name.toLowerCase()))
}

const heading: FieldStrategy<'title'> = ({ doc, profile }) =>
  firstAcceptedText(doc.$, profile.selectors.title, text => !isBoilerplate(text))

const metaTitle: FieldStrategy<'title'> = ({ doc, profile }) => {
  const raw = metaContent(doc.$, 'og:title') ?? collapseWhitespace(doc.$('title').first().text())
  if (!raw) return null

  const segments = raw
    .split(TITLE_SEPARATORS)
    .map(segment => segment.trim())
    .filter(segment => segment !== '' && !isSiteName(segment, profile.siteNames) && !isBoilerplate(segment))
  return segments[0] ?? null
}

/** Slug tokens joined with spaces: `荃灣西-御凱-2座_XYZ` gives `荃灣西 御凱 2座` */
const urlSlug: FieldStrategy<'title'> = ({ url }) => {
  const slug = parseUrlSlug(url)
  if (!slug || !HAN_PATTERN.test(slug.text)) return null
  return slug.tokens.join(' ')
}

const estateName: FieldStrategy<'title'> = ({ resolved }) => resolved.estateName ?? null

export const TITLE_STRATEGIES: Record<StrategyIds['title'], FieldStrategy<'title'>> = {
  heading,
  metaTitle,
  urlSlug,
  estateName,
}

/**
 * Description, image and facility strategies.
 */

import type { FieldStrategy, StrategyIds } from '../../types.js'
import { isStoplisted } from '../field-rules.js'
import { allTexts, metaContent } from '../kit/html.js'
import { asString, isRecord } from '../kit/json.js'
import { absoluteUrl, firstAcceptedText, unique } from './shared.js'

const IMAGE_ATTRIBUTES = ['data-src', 'data-original', 'data-lazy', 'src']
const NON_PHOTO = /logo|icon|avatar|placeholder|sprite|blank\.gif/i
const MAX_IMAGES = 30

const descriptionElement: FieldStrategy<'description'> = ({ doc, profile }) =>
  firstAcceptedText(doc.$, profile.selectors.description, text => text.length >= 4 && !isStoplisted(text))

const metaDescription: FieldStrategy<'description'> = ({ doc }) =>
  metaContent(doc.$, 'og:description') ?? metaContent(doc.$, 'description') ?? null

function photoUrls(references: readonly string[], pageUrl: string): string[] | null {
  const urls = unique(
    references
      .map(reference => absoluteUrl(reference, pageUrl))
      .filter((url): url is string => url !== null && !NON_PHOTO.test(url))
  ).slice(0, MAX_IMAGES)
  return urls.length > 0 ? urls : null
}

/** Gallery images, lazy-load attributes before src */
const gallery: FieldStrategy<'images'> = ({ doc, profile, url }) => {
  const { $ } = doc
  const references: string[] = []
  for (const selector of profile.selectors.images) {
    $(selector).each((_, el) => {
      const image = $(el)
      const reference = IMAGE_ATTRIBUTES.map(attr => image.attr(attr)?.trim()).find(value => value)
      if (reference && !reference.startsWith('data:')) references.push(reference)
    })
  }
  return photoUrls(references, url)
}

const ogImage: FieldStrategy<'images'> = ({ doc, url }) => {
  const reference = metaContent(doc.$, 'og:image')
  return reference ? photoUrls([reference], url) : null
}

function jsonLdImages(value: unknown): string[] {
  if (Array.isArray(value)) return value.flatMap(jsonLdImages)
  if (isRecord(value)) {
    const url = asString(value['url']) ?? asString(value['contentUrl'])
    return url ? [url] : []
  }
  const url = asString(value)
  return url ? [url] : []
}

const imagesStructured: FieldStrategy<'images'> = ({ doc, url }) =>
  photoUrls(
    doc.jsonLd.flatMap(node => jsonLdImages(node['image'])),
    url
  )

const listItems: FieldStrategy<'facilities'> = ({ doc, profile }) => {
  const items = unique(allTexts(doc.$, profile.selectors.facilities)).filter(item => !isStoplisted(item))
  return items.length > 0 ? items : null
}

export const DESCRIPTION_STRATEGIES: Record<StrategyIds['description'], FieldStrategy<'description'>> = {
  element: descriptionElement,
  metaDescription,
}

export const IMAGE_STRATEGIES: Record<StrategyIds['images'], FieldStrategy<'images'>> = {
  gallery,
  ogImage,
  structuredData: imagesStructured,
}

export const FACILITY_STRATEGIES: Record<StrategyIds['facilities'], FieldStrategy<'facilities'>> = {
  listItems,
}

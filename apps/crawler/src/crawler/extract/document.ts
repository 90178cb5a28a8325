/**
 * Page Document
 *
 * Parses a detail page once into the views the strategies read: the cheerio
 * tree, visible text split per block, inline scripts and JSON-LD nodes.
 */

import type { CheerioAPI } from 'cheerio'
import type { ExtractFailureReason, PageDocument } from '../types.js'
import { collapseWhitespace, loadHtml, type ParseMode } from './kit/html.js'
import { flattenJsonLd, safeJsonParse } from './kit/json.js'

const BLOCK_SELECTOR = [
  'address',
  'article',
  'aside',
  'dd',
  'div',
  'dl',
  'dt',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'section',
  'table',
  'td',
  'th',
  'tr',
  'ul',
].join(', ')

export type DocumentResult =
  | { ok: true; doc: PageDocument; mode: ParseMode }
  | { ok: false; reason: ExtractFailureReason; details: string }

function tryLoad(html: string, mode: ParseMode): CheerioAPI | Error {
  try {
    return loadHtml(html, mode)
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error))
  }
}

function collectLines(html: string, mode: ParseMode): string[] {
  const $ = loadHtml(html, mode)
  $('head, script, style, noscript, template, svg').remove()
  $('br').replaceWith('\n')
  $(BLOCK_SELECTOR).before('\n').after('\n')

  return $.root()
    .text()
    .split('\n')
    .map(collapseWhitespace)
    .filter(line => line !== '')
}

function collectScripts($: CheerioAPI): string[] {
  const scripts: string[] = []
  $('script:not([src])').each((_, el) => {
    const body = $(el).text().trim()
    if (body) scripts.push(body)
  })
  return scripts
}

function collectJsonLd($: CheerioAPI): Record<string, unknown>[] {
  const nodes: Record<string, unknown>[] = []
  $('script[type="application/ld+json"]').each((_, el) => {
    const parsed = safeJsonParse($(el).text().trim())
    if (parsed.ok) {
      nodes.push(...flattenJsonLd(parsed.value))
    }
  })
  return nodes
}

/**
 * Parse `html` with the default parser, falling back once to htmlparser2.
 */
export function createPageDocument(html: string): DocumentResult {
  if (html.trim() === '') {
    return { ok: false, reason: 'EMPTY_PAGE', details: 'Page body is empty' }
  }

  let mode: ParseMode = 'parse5'
  let loaded = tryLoad(html, mode)
  if (loaded instanceof Error) {
    mode = 'htmlparser2'
    loaded = tryLoad(html, mode)
  }
  if (loaded instanceof Error) {
    return { ok: false, reason: 'PARSE_FAILED', details: loaded.message }
  }

  const $ = loaded
  const lines = collectLines(html, mode)
  if (lines.length === 0 && $('img').length === 0) {
    return { ok: false, reason: 'EMPTY_PAGE', details: 'Page has no visible content' }
  }

  return {
    ok: true,
    mode,
    doc: {
      $,
      lines,
      text: lines.join('\n'),
      scripts: collectScripts($),
      jsonLd: collectJsonLd($),
    },
  }
}

import * as cheerio from 'cheerio'

/**
 * parse5 is cheerio's default HTML parser; htmlparser2 is the fallback
 * used when the default one throws.
 */
export type ParseMode = 'parse5' | 'htmlparser2'

export function loadHtml(payload: string, mode: ParseMode = 'parse5'): cheerio.CheerioAPI {
  if (mode === 'htmlparser2') {
    return cheerio.load(payload, { xml: { xmlMode: false, decodeEntities: true } })
  }
  return cheerio.load(payload)
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

/**
 * Texts of every element matched by each selector, in selector order,
 * whitespace collapsed, empties dropped.
 */
export function allTexts($: cheerio.CheerioAPI, selectors: readonly string[]): string[] {
  const texts: string[] = []
  for (const selector of selectors) {
    $(selector).each((_, el) => {
      const text = collapseWhitespace($(el).text())
      if (text) texts.push(text)
    })
  }
  return texts
}

export function metaContent($: cheerio.CheerioAPI, key: string): string | undefined {
  return firstAttr($, `meta[property="${key}"]`, 'content') ?? firstAttr($, `meta[name="${key}"]`, 'content')
}

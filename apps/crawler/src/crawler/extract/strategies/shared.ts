/**
 * Helpers shared by the field strategies.
 */

import type { CheerioAPI } from 'cheerio'
import { HOME_SENTINELS } from '../../data/index.js'
import { collapseWhitespace } from '../kit/html.js'

const SEPARATOR_ONLY = /^[\s>›»/|｜]+$/
const EDGE_SEPARATORS = /^[\s>›»/]+|[\s>›»/]+$/g

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * First `label：value` found in the page lines. Labels are tried in order,
 * so list the longer spelling first (`屋苑名稱` before `屋苑`).
 */
export function labelledText(
  lines: readonly string[],
  labels: readonly string[],
  options: { multiWord?: boolean } = {}
): string | null {
  const value = options.multiWord ? '([^\\n]+)' : '(\\S+)'
  for (const label of labels) {
    const pattern = new RegExp(`${escapeRegExp(label)}\\s*[:：]\\s*${value}`)
    for (const line of lines) {
      const match = pattern.exec(line)
      const captured = match?.[1]?.trim()
      if (captured) return captured
    }
  }
  return null
}

/**
 * Clean raw breadcrumb parts into a path: trims separator glyphs, drops
 * separator-only parts, leading home sentinels and repeats of the previous
 * part.
 */
export function toPath(parts: readonly string[]): string[] {
  const path: string[] = []
  for (const raw of parts) {
    const part = collapseWhitespace(raw).replace(EDGE_SEPARATORS, '')
    if (part === '' || SEPARATOR_ONLY.test(part)) continue
    if (path.length === 0 && HOME_SENTINELS.has(part)) continue
    if (path[path.length - 1] === part) continue
    path.push(part)
  }
  return path
}

/**
 * Join whitespace tokens around a bare `|` so `荃灣 | 麗城` stays one part.
 */
export function joinPipeTokens(tokens: readonly string[]): string[] {
  const joined: string[] = []
  let pending = false
  for (const token of tokens) {
    if (token === '|' || token === '｜') {
      pending = joined.length > 0
      continue
    }
    if (pending) {
      joined[joined.length - 1] = `${joined[joined.length - 1]} | ${token}`
      pending = false
      continue
    }
    joined.push(token)
  }
  return joined
}

/**
 * Absolute http(s) URL for a page-relative reference, or null.
 */
export function absoluteUrl(reference: string, pageUrl: string): string | null {
  try {
    const resolved = new URL(reference.trim(), pageUrl)
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : null
  } catch {
    return null
  }
}

export function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)]
}

/** First matched text across selectors that passes `accept` */
export function firstAcceptedText(
  $: CheerioAPI,
  selectors: readonly string[],
  accept: (text: string) => boolean
): string | null {
  for (const selector of selectors) {
    for (const el of $(selector).toArray()) {
      const text = collapseWhitespace($(el).text())
      if (text && accept(text)) return text
    }
  }
  return null
}

export const HAN_PATTERN = /\p{Script=Han}/u

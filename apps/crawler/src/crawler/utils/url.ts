/**
 * URL Canonicalization Utilities
 *
 * Canonical URLs are the frontier's dedup key and the input to record ids.
 * Rules:
 * 1. Resolve against the site base URL
 * 2. Enforce https, lowercase hostname
 * 3. Remove tracking parameters (utm_*, fbclid, gclid) and empty parameters
 * 4. Sort remaining parameters
 * 5. Remove fragment and trailing slash (except root)
 * 6. Percent-decode multi-byte UTF-8 sequences in path and query only; ASCII
 *    escapes (%25, %2F, %41 ...) stay encoded, so a canonical URL
 *    canonicalizes to itself
 */

import { createHash } from 'node:crypto'
import * as psl from 'psl'

const TRACKING_PARAMS = new Set(['fbclid', 'gclid'])

/** A lead byte (C0-FF) followed by one to three continuation bytes (80-BF) */
const UTF8_SEQUENCE = /%[C-F][0-9A-F](?:%[89AB][0-9A-F]){1,3}/gi

function decodeUtf8Escapes(value: string): string {
  return value.replace(UTF8_SEQUENCE, sequence => {
    try {
      return decodeURIComponent(sequence)
    } catch {
      return sequence
    }
  })
}

/**
 * Canonicalize a URL. Returns null when it cannot be parsed or is not http(s).
 */
export function canonicalizeUrl(url: string, baseUrl?: string): string | null {
  let parsed: URL
  try {
    parsed = baseUrl ? new URL(url, baseUrl) : new URL(url)
  } catch {
    return null
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null
  }

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()
  parsed.hash = ''

  for (const key of [...parsed.searchParams.keys()]) {
    if (key.startsWith('utm_') || TRACKING_PARAMS.has(key)) {
      parsed.searchParams.delete(key)
    }
  }
  for (const [key, value] of [...parsed.searchParams.entries()]) {
    if (value === '') {
      parsed.searchParams.delete(key)
    }
  }
  parsed.searchParams.sort()

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return `${parsed.protocol}//${parsed.host}${decodeUtf8Escapes(parsed.pathname)}${decodeUtf8Escapes(parsed.search)}`
}

/**
 * Registrable domain (eTLD+1) for rate limiting, e.g. "centanet.com" for
 * "hk.centanet.com". Falls back to the hostname.
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  return psl.get(hostname) ?? hostname
}

/**
 * Record id: SHA-256 of the canonical URL, first 16 hex chars.
 */
export function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16)
}

/**
 * Return `url` with one query parameter set, keeping everything else.
 */
export function withQueryParam(url: string, name: string, value: string): string {
  const parsed = new URL(url)
  parsed.searchParams.set(name, value)
  return parsed.toString()
}

export interface UrlSlug {
  /** Decoded last path segment without the trailing `_<id>` */
  text: string
  /** `text` split on '-' */
  tokens: string[]
  /** Opaque listing id after the last '_', if any */
  listingId: string | null
}

/**
 * Decode a detail URL's slug: `/荃灣西-御凱-2座_XYZ` gives text
 * `荃灣西-御凱-2座`, tokens `['荃灣西', '御凱', '2座']` and id `XYZ`.
 */
export function parseUrlSlug(url: string): UrlSlug | null {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    return null
  }

  const segments = pathname.split('/').filter(segment => segment !== '')
  const last = segments[segments.length - 1]
  if (!last) return null

  let decoded: string
  try {
    decoded = decodeURIComponent(last)
  } catch {
    decoded = last
  }

  const underscore = decoded.lastIndexOf('_')
  const text = (underscore > 0 ? decoded.slice(0, underscore) : decoded).trim()
  const listingId = underscore > 0 ? decoded.slice(underscore + 1) || null : null
  const tokens = text
    .split('-')
    .map(token => token.trim())
    .filter(token => token !== '')

  if (!text) return null
  return { text, tokens, listingId }
}

/**
 * Percent-decoded pathname of `url`, or null when it cannot be parsed.
 */
export function decodedPathname(url: string): string | null {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    return null
  }
  try {
    return decodeURIComponent(pathname)
  } catch {
    return pathname
  }
}

/**
 * Detail page -> listing record: extract, apply overrides, canonicalize the
 * hierarchy, assemble. Failures are thrown as classified crawl errors.
 */

import { loggers } from '../../config/logger.js'
import { ParseFailureError, ValidationRejectionError } from '../errors.js'
import { canonicalizeHierarchy } from '../extract/breadcrumb.js'
import { applyOverrides } from '../extract/overrides.js'
import { extractFields } from '../extract/pipeline.js'
import type { ListingRecord, SiteProfile } from '../types.js'
import { assembleRecord } from './validator.js'

const log = loggers.extract

export interface BuildListingOptions {
  crawledAt: Date
  categoryLabel?: string | null
}

export function buildListingRecord(
  html: string,
  url: string,
  profile: SiteProfile,
  options: BuildListingOptions
): ListingRecord {
  const extracted = extractFields(html, url, profile, { categoryLabel: options.categoryLabel })
  if (!extracted.ok) {
    throw new ParseFailureError(url, `${extracted.reason}: ${extracted.details ?? 'no details'}`)
  }

  const overridden = applyOverrides(extracted.fields)
  if (overridden.applied.length > 0) {
    log.debug('Overrides applied', { url, rules: overridden.applied })
  }

  const canonical = canonicalizeHierarchy(overridden.fields)
  const assembled = assembleRecord({
    url,
    source: profile.id,
    fields: canonical.fields,
    breadcrumb: canonical.breadcrumb,
    crawledAt: options.crawledAt,
  })

  if (assembled.status === 'reject') {
    throw new ValidationRejectionError(url, assembled.reason, assembled.details)
  }

  log.debug('Listing extracted', {
    url,
    siteId: profile.id,
    fields: extracted.extractions.length,
    strategies: Object.fromEntries(
      extracted.extractions.map(extraction => [extraction.fieldName, extraction.strategyId])
    ),
  })
  return assembled.record
}

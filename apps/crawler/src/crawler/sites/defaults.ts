/**
 * Defaults shared by the site profiles.
 */

import type { FieldStrategyTable } from '../types.js'

/** Breadcrumb containers most listing sites use */
export const BREADCRUMB_SELECTORS = [
  "nav[aria-label*='breadcrumb']",
  '.breadcrumb',
  '.breadcrumbs',
  "[class*='breadcrumb']",
] as const

/** Never detail pages, on any site */
export const COMMON_EXCLUDED_PATH_FRAGMENTS = [
  '/member',
  '/login',
  '/register',
  '/signup',
  '/agent',
  '/api/',
  '/admin',
  '/search',
  '/about',
  '/contact',
  '/help',
  '/terms',
  '/privacy',
] as const

export const DEFAULT_TIMEOUTS = {
  timeoutMs: 30_000,
  listTimeoutMs: 60_000,
  scriptTimeoutMs: 90_000,
  retryCount: 3,
} as const

/** Every strategy in its default order */
export const DEFAULT_FIELD_STRATEGIES: FieldStrategyTable = {
  breadcrumbPath: ['navMarkup', 'embeddedNavData', 'jsonLdBreadcrumb', 'textPattern', 'navLinks'],
  district: ['pathVocabulary', 'districtLevel2Prefix', 'labelledText'],
  estateName: ['labelledText', 'urlSlug'],
  street: ['labelledText', 'addressPattern'],
  address: ['element', 'structuredData', 'composed'],
  title: ['heading', 'metaTitle', 'urlSlug', 'estateName'],
  price: ['element', 'pageText', 'structuredData'],
  area: ['element', 'pageText'],
  monthlyMortgagePayment: ['pageText'],
  propertyType: ['labelledText', 'vocabulary'],
  bedrooms: ['pageText'],
  bathrooms: ['pageText'],
  floor: ['pageText'],
  buildingAge: ['pageText'],
  orientation: ['pageText'],
  updateDate: ['pageText'],
  description: ['element', 'metaDescription'],
  images: ['gallery', 'ogImage', 'structuredData'],
  facilities: ['listItems'],
}

/**
 * 28Hse.com
 *
 * Server-rendered list pages paginated with `?page=N`. Detail slugs carry no
 * estate name (`/buy/apartment/property-3456789`), so slug strategies are
 * left out.
 */

import type { SiteProfile } from '../../types.js'
import { COMMON_EXCLUDED_PATH_FRAGMENTS, DEFAULT_FIELD_STRATEGIES, DEFAULT_TIMEOUTS } from '../defaults.js'
import { SELECTORS } from './selectors.js'

const profile: SiteProfile = {
  id: '28hse',
  name: '28Hse.com',
  baseUrl: 'https://www.28hse.com',
  listUrls: {
    buy: 'https://www.28hse.com/buy/apartment',
    rent: 'https://www.28hse.com/rent/apartment',
  },
  pagination: { mode: 'query_param', paramName: 'page' },
  rateLimitMs: 1200,
  maxConcurrency: 3,
  ...DEFAULT_TIMEOUTS,
  detailPathPattern: /^\/(?:buy|rent)\/apartment\/property-[^/]+$/,
  excludedPathFragments: [...COMMON_EXCLUDED_PATH_FRAGMENTS, '/office', '/shop', '/industrial', '/carpark', '/newproperty'],
  selectors: SELECTORS,
  fieldStrategies: {
    ...DEFAULT_FIELD_STRATEGIES,
    estateName: ['labelledText'],
    title: ['heading', 'metaTitle', 'estateName'],
  },
  siteNames: ['28Hse.com', '28Hse', '28hse'],
}

export const hse28Profile: SiteProfile = Object.freeze(profile)

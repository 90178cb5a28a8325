/**
 * Ricacorp Properties (利嘉閣)
 *
 * Detail slugs read `estate-code-estate-phase-block-id-n-hk`: the estate is
 * the last Han token, but the slug as a whole makes a poor title.
 */

import type { SiteProfile } from '../../types.js'
import { COMMON_EXCLUDED_PATH_FRAGMENTS, DEFAULT_FIELD_STRATEGIES, DEFAULT_TIMEOUTS } from '../defaults.js'
import { SELECTORS } from './selectors.js'

const profile: SiteProfile = {
  id: 'ricacorp',
  name: '利嘉閣',
  baseUrl: 'https://www.ricacorp.com',
  listUrls: {
    buy: 'https://www.ricacorp.com/zh-hk',
    rent: 'https://www.ricacorp.com/zh-hk',
  },
  pagination: { mode: 'query_param', paramName: 'page' },
  rateLimitMs: 1300,
  maxConcurrency: 2,
  ...DEFAULT_TIMEOUTS,
  detailPathPattern: /^\/(?:zh-hk\/)?property\/detail\/[^/]+$/,
  excludedPathFragments: [...COMMON_EXCLUDED_PATH_FRAGMENTS, '/property/list/', '/landregistry', '/commercial'],
  selectors: SELECTORS,
  fieldStrategies: {
    ...DEFAULT_FIELD_STRATEGIES,
    title: ['heading', 'metaTitle', 'estateName'],
  },
  siteNames: ['利嘉閣地產', '利嘉閣', 'Ricacorp Properties', 'Ricacorp'],
}

export const ricacorpProfile: SiteProfile = Object.freeze(profile)

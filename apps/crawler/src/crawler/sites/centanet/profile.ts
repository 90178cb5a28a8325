/**
 * Centaline Property (中原地產)
 *
 * List pages paginate client-side, so page N is reached by clicking the
 * page-N control in the session that loaded page 1.
 */

import type { SiteProfile } from '../../types.js'
import { COMMON_EXCLUDED_PATH_FRAGMENTS, DEFAULT_FIELD_STRATEGIES, DEFAULT_TIMEOUTS } from '../defaults.js'
import { SELECTORS } from './selectors.js'

/** Clicks the pagination control labelled `page` unless it is already current */
function pageScript(page: number): string {
  return `(() => {
  const target = ${JSON.stringify(String(page))};
  const controls = Array.from(document.querySelectorAll('.el-pager li, .pagination li, .pagination a, button'));
  const control = controls.find(el => (el.textContent || '').trim() === target);
  if (!control) throw new Error('Page control not found: ' + target);
  if (control.classList.contains('active') || control.getAttribute('aria-current') === 'page') return;
  control.scrollIntoView({ block: 'center' });
  (control.querySelector('a') || control).click();
})()`
}

const profile: SiteProfile = {
  id: 'centanet',
  name: '中原地產',
  baseUrl: 'https://hk.centanet.com',
  listUrls: {
    buy: 'https://hk.centanet.com/findproperty/list/buy',
    rent: 'https://hk.centanet.com/findproperty/list/rent',
  },
  pagination: {
    mode: 'script_driven',
    pageScript,
    settleDelaySeconds: 8,
  },
  rateLimitMs: 1500,
  maxConcurrency: 2,
  ...DEFAULT_TIMEOUTS,
  detailPathPattern: /^\/findproperty\/detail\/[^/]+$/,
  excludedPathFragments: [
    ...COMMON_EXCLUDED_PATH_FRAGMENTS,
    '/findproperty/list/',
    '/findproperty/district/',
    '/office',
    '/shop',
    '/industrial',
    '/carpark',
  ],
  selectors: SELECTORS,
  fieldStrategies: DEFAULT_FIELD_STRATEGIES,
  siteNames: ['中原地產', 'Centaline Property', 'Centaline', 'centanet'],
}

export const centanetProfile: SiteProfile = Object.freeze(profile)

/**
 * Centaline (hk.centanet.com) CSS Selectors
 *
 * Detail pages are rendered client-side; the breadcrumb is also serialized
 * into the page state as `paths:[...]`, read by the embeddedNavData strategy.
 */

import type { SiteSelectors } from '../../types.js'
import { BREADCRUMB_SELECTORS } from '../defaults.js'

export const SELECTORS: SiteSelectors = {
  breadcrumb: ['.el-breadcrumb', ...BREADCRUMB_SELECTORS],
  title: ['.estate-title h1', '.prop-title h1', 'h1'],
  price: ['.price-info .price', '.prop-price', "[class*='price']"],
  area: ['.area-info', '.prop-area', "[class*='area']"],
  address: ['.estate-address', '.address'],
  description: ['.prop-desc', '.description'],
  images: ['.swiper-slide img', '.gallery img', '.photo img'],
  facilities: ['.facilities li', '.facility-item'],
}

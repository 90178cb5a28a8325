/**
 * Ricacorp (利嘉閣) CSS Selectors
 */

import type { SiteSelectors } from '../../types.js'
import { BREADCRUMB_SELECTORS } from '../defaults.js'

export const SELECTORS: SiteSelectors = {
  breadcrumb: [...BREADCRUMB_SELECTORS],
  title: ['.property-detail-title h1', '.card-title', 'h1'],
  price: ['.property-detail-price', '.card-price', "[class*='price']"],
  area: ['.property-detail-area', '.card-area'],
  address: ['.property-detail-address', '.card-location', '.address'],
  description: ['.property-detail-description', '.description'],
  images: ['.property-detail-gallery img', '.swiper-slide img'],
  facilities: ['.property-detail-facilities li'],
}

/**
 * 28Hse.com CSS Selectors
 */

import type { SiteSelectors } from '../../types.js'
import { BREADCRUMB_SELECTORS } from '../defaults.js'

export const SELECTORS: SiteSelectors = {
  breadcrumb: ['.ui.breadcrumb', ...BREADCRUMB_SELECTORS],
  title: ['.property_title h1', '.detail_title h1', 'h1'],
  price: ['.pricing .price', '.property_price', '.house-price'],
  area: ['.area_info', '.property_area', '.house-area'],
  address: ['.property_address', '.house-location', '.address'],
  description: ['.property_description', '.detail_desc'],
  images: ['.property_photos img', '.gallery img', '.photo img'],
  facilities: ['.facilities li', '.property_facilities li'],
}

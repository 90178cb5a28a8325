/**
 * Strategy catalog: every field's strategies keyed by the ids used in site
 * profile tables. Fields without ids are filled from the breadcrumb path.
 */

import type { FieldName, FieldStrategy, StrategyIds } from '../../types.js'
import {
  BATHROOM_STRATEGIES,
  BEDROOM_STRATEGIES,
  BUILDING_AGE_STRATEGIES,
  FLOOR_STRATEGIES,
  ORIENTATION_STRATEGIES,
  PROPERTY_TYPE_STRATEGIES,
  UPDATE_DATE_STRATEGIES,
} from './attributes.js'
import { DESCRIPTION_STRATEGIES, FACILITY_STRATEGIES, IMAGE_STRATEGIES } from './content.js'
import { BREADCRUMB_PATH_STRATEGIES, DISTRICT_STRATEGIES, ESTATE_NAME_STRATEGIES } from './hierarchy.js'
import { ADDRESS_STRATEGIES, STREET_STRATEGIES } from './location.js'
import { AREA_STRATEGIES, MORTGAGE_STRATEGIES, PRICE_STRATEGIES } from './measures.js'
import { TITLE_STRATEGIES } from './title.js'

export type StrategyCatalog = {
  readonly [K in FieldName]: Readonly<Record<StrategyIds[K], FieldStrategy<K>>>
}

export const STRATEGY_CATALOG: StrategyCatalog = {
  breadcrumbPath: BREADCRUMB_PATH_STRATEGIES,
  category: {},
  region: {},
  district: DISTRICT_STRATEGIES,
  districtLevel2: {},
  subDistrict: {},
  estateName: ESTATE_NAME_STRATEGIES,
  street: STREET_STRATEGIES,
  address: ADDRESS_STRATEGIES,
  title: TITLE_STRATEGIES,
  price: PRICE_STRATEGIES,
  area: AREA_STRATEGIES,
  monthlyMortgagePayment: MORTGAGE_STRATEGIES,
  propertyType: PROPERTY_TYPE_STRATEGIES,
  bedrooms: BEDROOM_STRATEGIES,
  bathrooms: BATHROOM_STRATEGIES,
  floor: FLOOR_STRATEGIES,
  buildingAge: BUILDING_AGE_STRATEGIES,
  orientation: ORIENTATION_STRATEGIES,
  updateDate: UPDATE_DATE_STRATEGIES,
  description: DESCRIPTION_STRATEGIES,
  images: IMAGE_STRATEGIES,
  facilities: FACILITY_STRATEGIES,
}

/**
 * Query Module for docmap
 *
 * Criteria building, filter translation and in-process filter evaluation.
 */

export { Criteria, type NearOptions } from './criteria'
export { translateFilter, normalizeOperand } from './translate'

// Filter evaluation
export {
  matchesFilter,
  createPredicate,
  matchesCondition,
  DEFAULT_FILTER_CONFIG,
  type FilterConfig,
} from './filter'

// Geospatial helpers
export { haversineDistance, distanceBetween, isGeoJSONPoint, EARTH_RADIUS_METERS } from './geo'

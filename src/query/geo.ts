/**
 * Distance Functions for proximity queries
 *
 * Haversine distance between GeoJSON points, in meters.
 */

import type { GeoJSONPoint } from '../types/filter'
import { isPlainObject } from '../utils/comparison'

/**
 * Earth radius in meters (mean radius, as used by 2dsphere indexes)
 */
export const EARTH_RADIUS_METERS = 6378100

/**
 * Haversine distance between two points on Earth
 *
 * Uses the haversine formula for great-circle distance.
 * Accurate for most distances, slight error for antipodal points.
 *
 * @returns Distance in meters
 */
export function haversineDistance(
  lat1: number,
  lng1: number,
  lat2: number,
  lng2: number
): number {
  const toRadians = (deg: number) => deg * (Math.PI / 180)

  const dLat = toRadians(lat2 - lat1)
  const dLng = toRadians(lng2 - lng1)
  const lat1Rad = toRadians(lat1)
  const lat2Rad = toRadians(lat2)

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1Rad) * Math.cos(lat2Rad) * Math.sin(dLng / 2) * Math.sin(dLng / 2)

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))

  return EARTH_RADIUS_METERS * c
}

/**
 * Distance between two GeoJSON points in meters
 */
export function distanceBetween(a: GeoJSONPoint, b: GeoJSONPoint): number {
  const [lngA, latA] = a.coordinates
  const [lngB, latB] = b.coordinates
  return haversineDistance(latA, lngA, latB, lngB)
}

/**
 * Check for a GeoJSON point shape as stored in documents
 */
export function isGeoJSONPoint(value: unknown): value is GeoJSONPoint {
  if (!isPlainObject(value) || value.type !== 'Point') return false
  const coordinates = value.coordinates
  return (
    Array.isArray(coordinates) &&
    coordinates.length === 2 &&
    coordinates.every(c => typeof c === 'number' && Number.isFinite(c))
  )
}

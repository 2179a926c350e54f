/**
 * Geographic point value type
 *
 * Stored as a GeoJSON point so a `2dsphere` index can be built on it.
 *
 * @module codecs/point
 */

import type { Codec } from './types'
import type { GeoJSONPoint } from '../types/filter'
import { isGeoJSONPoint } from '../query/geo'
import { isPlainObject } from '../utils/comparison'
import { MalformedDocumentError } from '../errors'

export class Point {
  readonly longitude: number
  readonly latitude: number

  constructor(longitude: number, latitude: number) {
    if (!isValidCoordinate(longitude, latitude)) {
      throw new MalformedDocumentError('coordinates', 'longitude in [-180, 180] and latitude in [-90, 90]', [longitude, latitude])
    }
    this.longitude = longitude
    this.latitude = latitude
  }

  /**
   * Build from a GeoJSON point (longitude first)
   */
  static fromGeoJSON(geo: GeoJSONPoint): Point {
    return new Point(geo.coordinates[0], geo.coordinates[1])
  }

  toGeoJSON(): GeoJSONPoint {
    return { type: 'Point', coordinates: [this.longitude, this.latitude] }
  }

  equals(other: Point): boolean {
    return this.longitude === other.longitude && this.latitude === other.latitude
  }

  toString(): string {
    return `(${this.latitude}, ${this.longitude})`
  }
}

function isValidCoordinate(longitude: number, latitude: number): boolean {
  return (
    Number.isFinite(longitude) &&
    Number.isFinite(latitude) &&
    Math.abs(longitude) <= 180 &&
    Math.abs(latitude) <= 90
  )
}

const EXPECTED = "GeoJSON { type: 'Point', coordinates: [lng, lat] }"

function toPoint(input: unknown, field: string): Point | undefined {
  if (input instanceof Point) return input
  if (isGeoJSONPoint(input)) {
    const [lng, lat] = input.coordinates
    if (!isValidCoordinate(lng, lat)) throw new MalformedDocumentError(field, EXPECTED, input)
    return new Point(lng, lat)
  }
  if (isPlainObject(input) && typeof input.lat === 'number' && typeof input.lng === 'number') {
    if (!isValidCoordinate(input.lng, input.lat)) throw new MalformedDocumentError(field, EXPECTED, input)
    return new Point(input.lng, input.lat)
  }
  return undefined
}

export const pointCodec: Codec<Point> = {
  name: 'point',

  encode: value => value.toGeoJSON(),

  decode(raw, field) {
    if (!isGeoJSONPoint(raw)) throw new MalformedDocumentError(field, EXPECTED, raw)
    const point = toPoint(raw, field)
    if (!point) throw new MalformedDocumentError(field, EXPECTED, raw)
    return point
  },

  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    const point = toPoint(input, field)
    if (!point) throw new MalformedDocumentError(field, EXPECTED, input)
    return point.toGeoJSON()
  },

  is: (value): value is Point => value instanceof Point,
}

/**
 * Filter types for docmap
 *
 * Store filters use the MongoDB query language shape so that the memory store
 * and the MongoDB adapter consume the same objects.
 *
 * @module types/filter
 */

import type { DocumentValue } from './document'

// =============================================================================
// Geo
// =============================================================================

/** GeoJSON point, longitude first */
export type GeoJSONPoint = {
  type: 'Point'
  coordinates: [number, number]
}

/** Proximity predicate; distances in meters */
export interface NearQuery {
  $geometry: GeoJSONPoint
  $maxDistance?: number
  $minDistance?: number
}

// =============================================================================
// Field Operators
// =============================================================================

/** Operators applicable to a single field */
export interface FieldOperators {
  $eq?: DocumentValue
  $ne?: DocumentValue
  $gt?: DocumentValue
  $gte?: DocumentValue
  $lt?: DocumentValue
  $lte?: DocumentValue
  $in?: DocumentValue[]
  $nin?: DocumentValue[]
  $regex?: string | RegExp
  $options?: string
  $exists?: boolean
  $type?: 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object' | 'date'
  $all?: DocumentValue[]
  $elemMatch?: Filter
  $size?: number
  $not?: FieldOperators
  $near?: NearQuery
}

/** Condition for a field: a literal, a pattern or an operator object */
export type FieldCondition = DocumentValue | RegExp | FieldOperators

// =============================================================================
// Filter
// =============================================================================

/**
 * MongoDB-style filter
 *
 * @example
 * { name: 'Alice' }
 * { year: { $gt: 2000 } }
 * { 'roles._id': actorId }
 * { $or: [{ rated: 'PG' }, { rated: 'G' }] }
 */
export interface Filter {
  [field: string]: FieldCondition | Filter | Filter[] | undefined

  /** Logical AND */
  $and?: Filter[]

  /** Logical OR */
  $or?: Filter[]

  /** Logical NOT */
  $not?: Filter

  /** Logical NOR */
  $nor?: Filter[]
}

/** Sort specification, 1 ascending, -1 descending */
export type SortSpec = Record<string, 1 | -1>

// =============================================================================
// Type Guards
// =============================================================================

const LOGICAL_KEYS = new Set(['$and', '$or', '$not', '$nor'])

/** Check whether a key is a top-level logical operator */
export function isLogicalKey(key: string): key is '$and' | '$or' | '$not' | '$nor' {
  return LOGICAL_KEYS.has(key)
}

/** Check if value is an operator object (has at least one `$` key) */
export function isFieldOperators(value: unknown): value is FieldOperators {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  if (value instanceof Date || value instanceof RegExp) return false
  return Object.keys(value).some(k => k.startsWith('$'))
}

/** Check whether any field condition in the filter is a proximity query */
export function findNearCondition(filter: Filter): { field: string; near: NearQuery } | undefined {
  for (const [field, condition] of Object.entries(filter)) {
    if (field.startsWith('$')) continue
    if (isFieldOperators(condition) && condition.$near) {
      return { field, near: condition.$near }
    }
  }
  return undefined
}

/** Check whether a value is an object usable as a filter (not an array, date or pattern) */
export function isFilterObject(value: unknown): value is Filter {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  return !(value instanceof Date) && !(value instanceof RegExp)
}

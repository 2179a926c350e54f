/**
 * Criteria - immutable query builder over one model
 *
 * Every builder method returns a new Criteria. Nothing runs until a terminal
 * method is awaited or the criteria is iterated, and every iteration queries
 * the store again.
 *
 * @example
 * const nearby = await Places
 *   .where({ city: 'Austin' })
 *   .near('coordinates', { lat: 30.27, lng: -97.74 }, { maxDistance: 5000 })
 *   .limit(10)
 *   .toArray()
 *
 * @example
 * for await (const movie of Movies.where({ rated: 'PG' })) {
 *   console.log(movie.get('title'))
 * }
 */

import type { Entity } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { DocumentPrimitive, DocumentValue } from '../types/document'
import type { FieldOperators, Filter, SortSpec } from '../types/filter'
import { isFieldOperators } from '../types/filter'
import { isGeoJSONPoint } from './geo'
import { translateFilter } from './translate'
import { pointCodec } from '../codecs/point'
import { ErrorCode, QueryError } from '../errors'

/** Internal state for building queries */
interface CriteriaState {
  filter: Filter
  sort: SortSpec | undefined
  limit: number | undefined
}

export interface NearOptions {
  /** Meters */
  maxDistance?: number
}

const EMPTY_STATE: CriteriaState = { filter: {}, sort: undefined, limit: undefined }

/**
 * Query over one model
 *
 * @typeParam E - Entity view handed to callers
 */
export class Criteria<E extends Entity = Entity> implements AsyncIterable<E> {
  constructor(
    readonly model: Model,
    private readonly wrap: (entity: Entity) => E,
    private readonly state: CriteriaState = EMPTY_STATE
  ) {}

  // ===========================================================================
  // Builders
  // ===========================================================================

  /**
   * Add conditions. Names may be raw keys or aliases.
   *
   * @example
   * Movies.where({ year: { $gte: 2000 }, rated: 'PG' })
   */
  where(filter: Filter): Criteria<E> {
    const translated = translateFilter(this.model.schema, filter)
    let next: Filter = this.state.filter
    for (const [key, condition] of Object.entries(translated)) {
      if (condition === undefined) continue
      next = mergeCondition(next, key, condition)
    }
    return this.with({ filter: next })
  }

  eq(field: string, value: DocumentValue): Criteria<E> {
    return this.where({ [field]: value })
  }

  in(field: string, values: DocumentValue[]): Criteria<E> {
    return this.where({ [field]: { $in: values } })
  }

  gt(field: string, value: DocumentValue): Criteria<E> {
    return this.where({ [field]: { $gt: value } })
  }

  gte(field: string, value: DocumentValue): Criteria<E> {
    return this.where({ [field]: { $gte: value } })
  }

  lt(field: string, value: DocumentValue): Criteria<E> {
    return this.where({ [field]: { $lt: value } })
  }

  lte(field: string, value: DocumentValue): Criteria<E> {
    return this.where({ [field]: { $lte: value } })
  }

  /**
   * Regular-expression match
   *
   * @example
   * Actors.regex('name', /^Sylv/i)
   */
  regex(field: string, pattern: RegExp | string, options?: string): Criteria<E> {
    const operators: FieldOperators = { $regex: pattern }
    if (options !== undefined) operators.$options = options
    return this.where({ [field]: operators })
  }

  /**
   * Field presence (`true`) or absence (`false`)
   */
  exists(field: string, present = true): Criteria<E> {
    return this.where({ [field]: { $exists: present } })
  }

  /**
   * Proximity to a point, nearest first. The field must have a `2dsphere`
   * index.
   *
   * @param point - Point, GeoJSON point or `{ lat, lng }`
   */
  near(field: string, point: unknown, options: NearOptions = {}): Criteria<E> {
    const key = this.model.schema.table.keyFor(field)
    const geometry = pointCodec.normalize(point, key)
    if (!isGeoJSONPoint(geometry)) {
      throw new QueryError(`near() needs a point for "${key}"`, ErrorCode.INVALID_FILTER, { field: key })
    }
    const next = this.with({
      filter: mergeCondition(this.state.filter, key, { $near: { $geometry: geometry } }),
    })
    return options.maxDistance === undefined ? next : next.maxDistance(field, options.maxDistance)
  }

  /**
   * Bound an existing `near` on `field`
   *
   * @param meters - Non-negative distance in meters
   */
  maxDistance(field: string, meters: number): Criteria<E> {
    const key = this.model.schema.table.keyFor(field)
    if (!Number.isFinite(meters) || meters < 0) {
      throw new QueryError(`maxDistance must be a non-negative number, got ${meters}`, ErrorCode.INVALID_FILTER, { field: key })
    }
    const condition = this.state.filter[key]
    if (!isFieldOperators(condition) || !condition.$near) {
      throw new QueryError(`maxDistance("${key}") needs a near() on the same field`, ErrorCode.INVALID_FILTER, { field: key })
    }
    const near = { ...condition.$near, $maxDistance: meters }
    return this.with({ filter: { ...this.state.filter, [key]: { ...condition, $near: near } } })
  }

  /**
   * Order results. Later calls add lower-priority keys.
   *
   * @example
   * Movies.sort({ year: -1, title: 1 })
   */
  sort(spec: SortSpec): Criteria<E> {
    const sort: SortSpec = { ...this.state.sort }
    for (const [field, direction] of Object.entries(spec)) {
      sort[this.model.schema.table.keyFor(field)] = direction
    }
    return this.with({ sort })
  }

  /**
   * Cap the number of results
   */
  limit(n: number): Criteria<E> {
    if (!Number.isInteger(n) || n < 0) {
      throw new QueryError(`limit must be a non-negative integer, got ${n}`, ErrorCode.INVALID_FILTER)
    }
    return this.with({ limit: n })
  }

  /**
   * Store filter this criteria sends
   */
  toFilter(): Filter {
    return { ...this.state.filter }
  }

  // ===========================================================================
  // Terminals
  // ===========================================================================

  async toArray(): Promise<E[]> {
    const { store } = this.model.context
    const docs = await store.findMany(this.model.collection, this.state.filter, {
      sort: this.state.sort,
      limit: this.state.limit,
    })
    const entities = docs.map(doc => this.wrap(this.model.instantiate(doc)))
    return this.state.limit === undefined ? entities : entities.slice(0, this.state.limit)
  }

  async first(): Promise<E | undefined> {
    const [entity] = await this.limit(1).toArray()
    return entity
  }

  async count(): Promise<number> {
    const total = await this.model.context.store.count(this.model.collection, this.state.filter)
    return this.state.limit === undefined ? total : Math.min(total, this.state.limit)
  }

  /**
   * Whether at least one document matches
   */
  async any(): Promise<boolean> {
    return (await this.limit(1).count()) > 0
  }

  async *[Symbol.asyncIterator](): AsyncIterator<E> {
    yield* await this.toArray()
  }

  private with(patch: Partial<CriteriaState>): Criteria<E> {
    return new Criteria(this.model, this.wrap, { ...this.state, ...patch })
  }
}

/**
 * Combine a condition with whatever the filter already holds for `key`
 */
function mergeCondition(filter: Filter, key: string, condition: Filter[string]): Filter {
  const existing = filter[key]
  if (existing === undefined) return { ...filter, [key]: condition }

  const left = asOperators(existing)
  const right = asOperators(condition)
  if (left && right && !Object.keys(right).some(op => op in left)) {
    return { ...filter, [key]: { ...left, ...right } }
  }

  // Overlapping operators and incompatible shapes (e.g. two patterns) are both required
  return { ...filter, $and: [...(filter.$and ?? []), { [key]: condition }] }
}

function asOperators(condition: Filter[string]): FieldOperators | undefined {
  if (isFieldOperators(condition)) return condition
  if (isPrimitive(condition)) return { $eq: condition }
  return undefined
}

function isPrimitive(value: unknown): value is DocumentPrimitive {
  return value === null || value instanceof Date ||
    typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

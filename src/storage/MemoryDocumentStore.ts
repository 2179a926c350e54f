/**
 * MemoryDocumentStore - In-memory implementation of DocumentStore
 *
 * Used for testing and prototyping. Collections keep insertion order, which
 * is the store order reported by `findMany`. Documents are copied on the way
 * in and out so callers never share state with the store.
 */

import type { DocumentStore, FindOptions } from '../types/store'
import type { RawDocument } from '../types/document'
import type { Filter, NearQuery, SortSpec } from '../types/filter'
import type { DeleteResult, UpdateResult, UpdateSpec } from '../types/update'
import type { IndexSpec } from '../schema/types'
import { cloneDocument, documentId, ID_FIELD } from '../types/document'
import { findNearCondition } from '../types/filter'
import { matchesFilter } from '../query/filter'
import { distanceBetween, isGeoJSONPoint } from '../query/geo'
import { applyUpdate } from '../mutation/operators'
import { compareValues, deepEqual, getNestedValue, getPathValues } from '../utils/comparison'
import { ErrorCode, QueryError, StorageError } from '../errors'

/** Stored index entry */
interface IndexEntry {
  name: string
  spec: IndexSpec
}

/**
 * Default index name in the `field_direction` form, e.g. `year_1` or
 * `place_of_birth.geolocation_2dsphere`
 */
export function indexName(spec: IndexSpec): string {
  return spec.name ?? Object.entries(spec.fields).map(([f, d]) => `${f}_${d}`).join('_')
}

/**
 * In-memory document store for tests and prototyping
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly type = 'memory'

  /** Documents by collection, then by id */
  private collections = new Map<string, Map<string, RawDocument>>()

  /** Indexes by collection */
  private indexes = new Map<string, IndexEntry[]>()

  private collection(name: string): Map<string, RawDocument> {
    let docs = this.collections.get(name)
    if (!docs) {
      docs = new Map()
      this.collections.set(name, docs)
    }
    return docs
  }

  async insert(collection: string, doc: RawDocument): Promise<void> {
    const id = documentId(doc)
    if (id === undefined) {
      throw new StorageError(`Cannot insert into ${collection} without a string ${ID_FIELD}`, ErrorCode.STORAGE_ERROR, {
        collection,
        operation: 'insert',
      })
    }
    const docs = this.collection(collection)
    if (docs.has(id)) {
      throw new StorageError(`Duplicate ${ID_FIELD} "${id}" in ${collection}`, ErrorCode.DUPLICATE_KEY, {
        collection,
        operation: 'insert',
      })
    }
    this.checkUnique(collection, doc, undefined)
    docs.set(id, cloneDocument(doc))
  }

  async findOne(collection: string, filter: Filter): Promise<RawDocument | null> {
    const [first] = await this.findMany(collection, filter, { limit: 1 })
    return first ?? null
  }

  async findMany(collection: string, filter: Filter, options: FindOptions = {}): Promise<RawDocument[]> {
    const near = findNearCondition(filter)
    let results: RawDocument[]

    if (near) {
      this.requireGeoIndex(collection, near.field)
      results = this.nearest(collection, filter, near.field, near.near)
    } else {
      results = this.matching(collection, filter)
      if (options.sort) {
        results = sortDocuments(results, options.sort)
      }
    }

    if (options.limit !== undefined && options.limit > 0) {
      results = results.slice(0, options.limit)
    }
    return results.map(doc => cloneDocument(doc))
  }

  async updateOne(collection: string, filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const [target] = this.matching(collection, filter)
    if (!target) return { matchedCount: 0, modifiedCount: 0 }
    const modified = this.replace(collection, target, update)
    return { matchedCount: 1, modifiedCount: modified ? 1 : 0 }
  }

  async updateMany(collection: string, filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const targets = this.matching(collection, filter)
    let modifiedCount = 0
    for (const target of targets) {
      if (this.replace(collection, target, update)) modifiedCount++
    }
    return { matchedCount: targets.length, modifiedCount }
  }

  async deleteOne(collection: string, filter: Filter): Promise<DeleteResult> {
    const [target] = this.matching(collection, filter)
    const id = target ? documentId(target) : undefined
    if (id === undefined) return { deletedCount: 0 }
    this.collection(collection).delete(id)
    return { deletedCount: 1 }
  }

  async deleteMany(collection: string, filter: Filter): Promise<DeleteResult> {
    const docs = this.collection(collection)
    let deletedCount = 0
    for (const target of this.matching(collection, filter)) {
      const id = documentId(target)
      if (id !== undefined && docs.delete(id)) deletedCount++
    }
    return { deletedCount }
  }

  async count(collection: string, filter: Filter): Promise<number> {
    if (findNearCondition(filter)) {
      return (await this.findMany(collection, filter)).length
    }
    return this.matching(collection, filter).length
  }

  async createIndex(collection: string, index: IndexSpec): Promise<string> {
    const name = indexName(index)
    const entries = this.indexes.get(collection) ?? []
    if (!entries.some(entry => entry.name === name)) {
      entries.push({ name, spec: index })
      this.indexes.set(collection, entries)
    }
    return name
  }

  /**
   * Index names for a collection
   */
  listIndexes(collection: string): string[] {
    return (this.indexes.get(collection) ?? []).map(entry => entry.name)
  }

  /**
   * Remove every document and index
   */
  clear(): void {
    this.collections.clear()
    this.indexes.clear()
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /** Live (uncloned) documents matching a filter, in store order */
  private matching(collection: string, filter: Filter): RawDocument[] {
    const docs = this.collections.get(collection)
    if (!docs) return []
    return Array.from(docs.values()).filter(doc => matchesFilter(doc, filter))
  }

  private replace(collection: string, current: RawDocument, update: UpdateSpec): boolean {
    const id = documentId(current)
    if (id === undefined) return false
    const next = applyUpdate(current, update)
    if (next[ID_FIELD] !== current[ID_FIELD]) {
      throw new StorageError(`Cannot modify immutable field ${ID_FIELD} in ${collection}`, ErrorCode.STORAGE_ERROR, {
        collection,
        operation: 'update',
      })
    }
    if (deepEqual(current, next)) return false
    this.checkUnique(collection, next, id)
    this.collection(collection).set(id, cloneDocument(next))
    return true
  }

  private checkUnique(collection: string, doc: RawDocument, ownId: string | undefined): void {
    for (const { name, spec } of this.indexes.get(collection) ?? []) {
      if (!spec.unique) continue
      const fields = Object.keys(spec.fields)
      const clash = this.matching(collection, {}).some(other =>
        documentId(other) !== ownId &&
        fields.every(f => deepEqual(getNestedValue(other, f), getNestedValue(doc, f)))
      )
      if (clash) {
        throw new StorageError(`Duplicate key for unique index ${name} in ${collection}`, ErrorCode.DUPLICATE_KEY, {
          collection,
          operation: 'write',
        })
      }
    }
  }

  private requireGeoIndex(collection: string, field: string): void {
    const indexed = (this.indexes.get(collection) ?? []).some(entry => entry.spec.fields[field] === '2dsphere')
    if (!indexed) {
      throw new QueryError(
        `Proximity query on ${collection}.${field} requires a 2dsphere index`,
        ErrorCode.INDEX_NOT_FOUND,
        { collection, field }
      )
    }
  }

  /**
   * Documents with a point at `field` inside the distance bounds, nearest
   * first. Equal distances keep store order.
   */
  private nearest(collection: string, filter: Filter, field: string, near: NearQuery): RawDocument[] {
    const withDistance: { doc: RawDocument; distance: number }[] = []
    for (const doc of this.matching(collection, filter)) {
      const point = getPathValues(doc, field).find(isGeoJSONPoint)
      if (!point) continue
      const distance = distanceBetween(near.$geometry, point)
      if (near.$maxDistance !== undefined && distance > near.$maxDistance) continue
      if (near.$minDistance !== undefined && distance < near.$minDistance) continue
      withDistance.push({ doc, distance })
    }
    // Array.prototype.sort is stable
    withDistance.sort((a, b) => a.distance - b.distance)
    return withDistance.map(entry => entry.doc)
  }
}

/**
 * Stable multi-key sort
 */
function sortDocuments(docs: RawDocument[], sort: SortSpec): RawDocument[] {
  const keys = Object.entries(sort)
  return [...docs].sort((a, b) => {
    for (const [field, direction] of keys) {
      const cmp = compareValues(getNestedValue(a, field), getNestedValue(b, field))
      if (cmp !== 0 && !Number.isNaN(cmp)) return cmp * direction
    }
    return 0
  })
}

/**
 * MongoDocumentStore - DocumentStore over the official MongoDB driver
 *
 * Identifiers are stored as strings. Values the driver returns that have no
 * document-value counterpart (ObjectId, Decimal128, Long) are converted on
 * read: ObjectId to its hex string, numeric wrappers to numbers.
 */

import { MongoClient, MongoServerError, ObjectId } from 'mongodb'
import type { Collection, Db, Document } from 'mongodb'
import type { DocumentStore, FindOptions } from '../types/store'
import type { DocumentValue, RawDocument } from '../types/document'
import type { Filter } from '../types/filter'
import { findNearCondition } from '../types/filter'
import type { DeleteResult, UpdateResult, UpdateSpec } from '../types/update'
import type { IndexSpec } from '../schema/types'
import { isPlainObject } from '../utils/comparison'
import { indexName } from './MemoryDocumentStore'
import { ErrorCode, StorageError } from '../errors'
import { logger } from '../utils/logger'

/** Server error code for unique index violations */
const DUPLICATE_KEY_CODE = 11000

/**
 * Copy a filter, update or document into the driver's loose document type
 */
function toDriver(value: Filter | UpdateSpec | RawDocument): Document {
  return { ...value }
}

/**
 * Convert a value read through the driver into a document value
 *
 * @throws StorageError for BSON types with no document-value form
 */
export function fromBson(value: unknown, path = ''): DocumentValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number') return value
  if (value instanceof Date) return value
  if (value instanceof ObjectId) return value.toHexString()
  if (Array.isArray(value)) return value.map((v, i) => fromBson(v, `${path}.${i}`))
  if (isPlainObject(value)) return fromBsonDocument(value, path)
  if (typeof value === 'object' && 'toNumber' in value && typeof value.toNumber === 'function') {
    const n: unknown = value.toNumber()
    if (typeof n === 'number') return n
  }
  if (typeof value === 'object' && typeof value.toString === 'function') {
    const n = Number(value.toString())
    if (Number.isFinite(n)) return n
  }
  throw new StorageError(`Unsupported stored value at "${path || '<root>'}"`, ErrorCode.STORAGE_ERROR, {
    operation: 'read',
  })
}

export function fromBsonDocument(doc: Record<string, unknown>, path = ''): RawDocument {
  const out: RawDocument = {}
  for (const [key, value] of Object.entries(doc)) {
    if (value === undefined) continue
    out[key] = fromBson(value, path ? `${path}.${key}` : key)
  }
  return out
}

/**
 * Map a driver error to a StorageError
 */
export function toStorageError(err: unknown, collection: string, operation: string): StorageError {
  if (err instanceof StorageError) return err
  const cause = err instanceof Error ? err : undefined
  if (err instanceof MongoServerError && err.code === DUPLICATE_KEY_CODE) {
    return new StorageError(`Duplicate key in ${collection}`, ErrorCode.DUPLICATE_KEY, { collection, operation }, cause)
  }
  const message = err instanceof Error ? err.message : String(err)
  return new StorageError(`${operation} on ${collection} failed: ${message}`, ErrorCode.STORAGE_ERROR, {
    collection,
    operation,
  }, cause)
}

export class MongoDocumentStore implements DocumentStore {
  readonly type = 'mongodb'

  constructor(private readonly db: Db, private readonly client?: MongoClient) {}

  /**
   * Connect to a server and use one database
   *
   * @example
   * const store = await MongoDocumentStore.connect('mongodb://localhost:27017', 'movies')
   */
  static async connect(url: string, database: string): Promise<MongoDocumentStore> {
    const client = new MongoClient(url)
    await client.connect()
    logger.info(`Connected to ${database}`)
    return new MongoDocumentStore(client.db(database), client)
  }

  /**
   * Close the client when this store owns it
   */
  async close(): Promise<void> {
    if (this.client) {
      await this.client.close()
    }
  }

  private collection(name: string): Collection<Document> {
    return this.db.collection<Document>(name)
  }

  private async run<T>(collection: string, operation: string, fn: (col: Collection<Document>) => Promise<T>): Promise<T> {
    try {
      return await fn(this.collection(collection))
    } catch (err) {
      throw toStorageError(err, collection, operation)
    }
  }

  async insert(collection: string, doc: RawDocument): Promise<void> {
    await this.run(collection, 'insert', col => col.insertOne(toDriver(doc)))
  }

  async findOne(collection: string, filter: Filter): Promise<RawDocument | null> {
    const found = await this.run(collection, 'findOne', col => col.findOne(toDriver(filter)))
    return found ? fromBsonDocument(found) : null
  }

  async findMany(collection: string, filter: Filter, options: FindOptions = {}): Promise<RawDocument[]> {
    const docs = await this.run(collection, 'find', col => {
      let cursor = col.find(toDriver(filter))
      if (options.sort) cursor = cursor.sort(options.sort)
      if (options.limit !== undefined && options.limit > 0) cursor = cursor.limit(options.limit)
      return cursor.toArray()
    })
    return docs.map(doc => fromBsonDocument(doc))
  }

  async updateOne(collection: string, filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const res = await this.run(collection, 'updateOne', col => col.updateOne(toDriver(filter), toDriver(update)))
    return { matchedCount: res.matchedCount, modifiedCount: res.modifiedCount }
  }

  async updateMany(collection: string, filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const res = await this.run(collection, 'updateMany', col => col.updateMany(toDriver(filter), toDriver(update)))
    return { matchedCount: res.matchedCount, modifiedCount: res.modifiedCount }
  }

  async deleteOne(collection: string, filter: Filter): Promise<DeleteResult> {
    const res = await this.run(collection, 'deleteOne', col => col.deleteOne(toDriver(filter)))
    return { deletedCount: res.deletedCount }
  }

  async deleteMany(collection: string, filter: Filter): Promise<DeleteResult> {
    const res = await this.run(collection, 'deleteMany', col => col.deleteMany(toDriver(filter)))
    return { deletedCount: res.deletedCount }
  }

  async count(collection: string, filter: Filter): Promise<number> {
    // countDocuments rejects $near; count through a cursor instead
    if (findNearCondition(filter)) {
      return (await this.findMany(collection, filter)).length
    }
    return this.run(collection, 'count', col => col.countDocuments(toDriver(filter)))
  }

  async createIndex(collection: string, index: IndexSpec): Promise<string> {
    return this.run(collection, 'createIndex', col =>
      col.createIndex(index.fields, { name: indexName(index), unique: index.unique ?? false })
    )
  }
}

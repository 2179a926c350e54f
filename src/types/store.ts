/**
 * Document store driver interface
 *
 * Every persistence call made by models, relationship slots and the cascade
 * engine goes through this interface. Stores hold raw documents keyed by a
 * string `_id` in named collections.
 *
 * @module types/store
 */

import type { RawDocument } from './document'
import type { Filter, SortSpec } from './filter'
import type { DeleteResult, UpdateResult, UpdateSpec } from './update'
import type { IndexSpec } from '../schema/types'

/**
 * Options for multi-document reads
 */
export interface FindOptions {
  sort?: SortSpec | undefined
  limit?: number | undefined
}

export interface DocumentStore {
  /** Driver name, e.g. 'memory' or 'mongodb' */
  readonly type: string

  /**
   * Insert a document. The document must carry its `_id`.
   *
   * @throws StorageError with DUPLICATE_KEY when the id exists
   */
  insert(collection: string, doc: RawDocument): Promise<void>

  findOne(collection: string, filter: Filter): Promise<RawDocument | null>

  /**
   * Find documents in store order, or by `sort`. A `$near` condition orders
   * results nearest-first instead.
   */
  findMany(collection: string, filter: Filter, options?: FindOptions): Promise<RawDocument[]>

  updateOne(collection: string, filter: Filter, update: UpdateSpec): Promise<UpdateResult>

  updateMany(collection: string, filter: Filter, update: UpdateSpec): Promise<UpdateResult>

  deleteOne(collection: string, filter: Filter): Promise<DeleteResult>

  deleteMany(collection: string, filter: Filter): Promise<DeleteResult>

  count(collection: string, filter: Filter): Promise<number>

  createIndex(collection: string, index: IndexSpec): Promise<string>
}

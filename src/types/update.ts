/**
 * Update document types
 *
 * @module types/update
 */

import type { DocumentValue } from './document'
import type { Filter } from './filter'

/** `$addToSet` / `$push` value, optionally with `$each` */
export type ArrayAppend = DocumentValue | { $each: DocumentValue[] }

/**
 * Update operators understood by every document store driver
 *
 * @example
 * { $set: { title: 'Rocky' }, $unset: { plot: true } }
 * { $addToSet: { writer_ids: 'w1' } }
 * { $pull: { roles: { _id: 'a1' } } }
 */
export interface UpdateSpec {
  $set?: Record<string, DocumentValue>
  $unset?: Record<string, true | '' | 1>
  $push?: Record<string, ArrayAppend>
  $addToSet?: Record<string, ArrayAppend>
  $pull?: Record<string, DocumentValue | Filter>
  $pullAll?: Record<string, DocumentValue[]>
}

/** Outcome of an update */
export interface UpdateResult {
  matchedCount: number
  modifiedCount: number
}

/** Outcome of a delete */
export interface DeleteResult {
  deletedCount: number
}

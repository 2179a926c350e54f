/**
 * docmap Storage Module
 *
 * Document store drivers.
 *
 * Implementations:
 * - MemoryDocumentStore: In-process store for tests and prototyping
 * - MongoDocumentStore: MongoDB through the official driver
 */

export type { DocumentStore, FindOptions } from '../types/store'

export { MemoryDocumentStore, indexName } from './MemoryDocumentStore'
export { MongoDocumentStore, fromBson, fromBsonDocument, toStorageError } from './MongoDocumentStore'

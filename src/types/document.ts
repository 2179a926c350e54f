/**
 * Document value types
 *
 * Documents are ordered mappings of field name to document-safe values.
 * Every codec converges to one of these shapes.
 *
 * @module types/document
 */

import { isPlainObject } from '../utils/comparison'

/** Scalar values a document store can hold */
export type DocumentPrimitive = string | number | boolean | null | Date

/** Any value that can be stored in a document */
export type DocumentValue = DocumentPrimitive | DocumentValue[] | RawDocument

/** A raw document as read from / written to a store */
export interface RawDocument {
  [key: string]: DocumentValue
}

/** Name of the identifier field */
export const ID_FIELD = '_id'

/**
 * Check that a value is document-safe, recursively
 */
export function isDocumentValue(value: unknown): value is DocumentValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (value instanceof Date) return !Number.isNaN(value.getTime())
      if (Array.isArray(value)) return value.every(isDocumentValue)
      return isRawDocument(value)
    default:
      return false
  }
}

/**
 * Check that a value is a plain object whose values are all document-safe
 */
export function isRawDocument(value: unknown): value is RawDocument {
  return isPlainObject(value) && Object.values(value).every(isDocumentValue)
}

/**
 * Copy a document so that callers cannot mutate stored state
 */
export function cloneDocument<T extends DocumentValue>(doc: T): T {
  return structuredClone(doc)
}

/**
 * Read the identifier of a raw document, if it is a string
 */
export function documentId(doc: RawDocument): string | undefined {
  const id = doc[ID_FIELD]
  return typeof id === 'string' ? id : undefined
}

/**
 * MongoDB-style Update Operators
 *
 * Applies update documents to raw documents. Pure: returns a new document and
 * never mutates its input.
 *
 * Supported operators:
 * - Field: $set, $unset
 * - Array: $push, $addToSet, $pull, $pullAll
 */

import type { DocumentValue, RawDocument } from '../types/document'
import type { ArrayAppend, UpdateSpec } from '../types/update'
import type { Filter } from '../types/filter'
import { isDocumentValue, isRawDocument } from '../types/document'
import { isFilterObject } from '../types/filter'
import { deepEqual, getNestedValue, isPlainObject } from '../utils/comparison'
import { matchesFilter } from '../query/filter'
import { ErrorCode, QueryError } from '../errors'

// =============================================================================
// Path Security
// =============================================================================

/**
 * Dangerous path segments that could lead to prototype pollution
 */
const UNSAFE_PATH_SEGMENTS = new Set(['__proto__', 'constructor', 'prototype'])

/**
 * Check if a dot-notation path contains unsafe segments
 */
export function isUnsafePath(path: string): boolean {
  const parts = path.split('.')
  return parts.some(part => UNSAFE_PATH_SEGMENTS.has(part))
}

/**
 * Validate that a path is safe, throwing if it contains unsafe segments
 */
export function validatePath(path: string): void {
  if (isUnsafePath(path)) {
    throw new QueryError(
      `Unsafe path detected: "${path}" contains a prototype pollution attempt`,
      ErrorCode.INVALID_FILTER,
      { field: path }
    )
  }
}

// =============================================================================
// Main Operator Application
// =============================================================================

/**
 * Apply all update operators to a document
 *
 * @param doc - Original document
 * @param update - Update operators to apply
 * @returns The updated document
 */
export function applyUpdate(doc: RawDocument, update: UpdateSpec): RawDocument {
  let result: RawDocument = { ...doc }

  if (update.$set) {
    for (const [key, value] of Object.entries(update.$set)) {
      result = setField(result, key, value)
    }
  }

  if (update.$unset) {
    for (const key of Object.keys(update.$unset)) {
      result = unsetField(result, key)
    }
  }

  if (update.$push) {
    for (const [key, value] of Object.entries(update.$push)) {
      const arr = [...currentArray(result, key)]
      arr.push(...appendItems(value))
      result = setField(result, key, arr)
    }
  }

  if (update.$addToSet) {
    for (const [key, value] of Object.entries(update.$addToSet)) {
      const arr = [...currentArray(result, key)]
      for (const item of appendItems(value)) {
        if (!arr.some(existing => deepEqual(existing, item))) {
          arr.push(item)
        }
      }
      result = setField(result, key, arr)
    }
  }

  if (update.$pull) {
    for (const [key, condition] of Object.entries(update.$pull)) {
      const arr = currentArray(result, key)
      const filtered = arr.filter(item => !matchesPullCondition(item, condition))
      result = setField(result, key, filtered)
    }
  }

  if (update.$pullAll) {
    for (const [key, values] of Object.entries(update.$pullAll)) {
      const arr = currentArray(result, key)
      const filtered = arr.filter(item => !values.some(v => deepEqual(item, v)))
      result = setField(result, key, filtered)
    }
  }

  return result
}

// =============================================================================
// Field Access Helpers
// =============================================================================

function currentArray(doc: RawDocument, path: string): DocumentValue[] {
  const value = getNestedValue(doc, path)
  if (value === undefined || value === null) return []
  if (!Array.isArray(value)) {
    throw new QueryError(
      `Cannot apply an array operator to non-array field: ${path}`,
      ErrorCode.INVALID_FILTER,
      { field: path }
    )
  }
  return value.filter(isDocumentValue)
}

function isEachModifier(value: ArrayAppend): value is { $each: DocumentValue[] } {
  return isPlainObject(value) && Array.isArray(value.$each)
}

function appendItems(value: ArrayAppend): DocumentValue[] {
  return isEachModifier(value) ? value.$each : [value]
}

function matchesPullCondition(item: DocumentValue, condition: DocumentValue | Filter): boolean {
  if (isFilterObject(condition)) {
    // Operator conditions apply to primitive elements, e.g. { $in: [...] }
    return matchesFilter(item, condition)
  }
  return deepEqual(item, condition)
}

/**
 * Set a field value using dot notation (immutable)
 */
export function setField(doc: RawDocument, path: string, value: DocumentValue): RawDocument {
  validatePath(path)
  const [head, ...tail] = path.split('.')
  if (head === undefined) return doc
  if (tail.length === 0) return { ...doc, [head]: value }
  return { ...doc, [head]: setIn(doc[head], tail, value) }
}

function setIn(current: DocumentValue | undefined, parts: string[], value: DocumentValue): DocumentValue {
  const [head, ...tail] = parts
  if (head === undefined) return value
  const index = parseInt(head, 10)

  if (Array.isArray(current) && !isNaN(index)) {
    const copy = [...current]
    copy[index] = tail.length === 0 ? value : setIn(copy[index], tail, value)
    return copy
  }

  const nested: RawDocument = isRawDocument(current) ? { ...current } : {}
  nested[head] = tail.length === 0 ? value : setIn(nested[head], tail, value)
  return nested
}

/**
 * Remove a field using dot notation (immutable)
 */
export function unsetField(doc: RawDocument, path: string): RawDocument {
  validatePath(path)
  const [head, ...tail] = path.split('.')
  if (head === undefined || !(head in doc)) return doc

  if (tail.length === 0) {
    const { [head]: _removed, ...rest } = doc
    return rest
  }

  const current = doc[head]
  if (!isRawDocument(current)) return doc
  return { ...doc, [head]: unsetField(current, tail.join('.')) }
}

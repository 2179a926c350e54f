/**
 * Filter translation
 *
 * Rewrites an entity-level filter into a store filter: attribute names
 * become stored keys and operands of declared fields go through the field
 * codec, so `{ birthName: 'X' }` and `{ birth_name: 'X' }` query the same
 * thing.
 *
 * @module query/translate
 */

import type { ModelSchema } from '../schema/model'
import type { FieldCondition, FieldOperators, Filter } from '../types/filter'
import type { DocumentValue } from '../types/document'
import { isFieldOperators, isFilterObject, isLogicalKey } from '../types/filter'
import { isDocumentValue } from '../types/document'
import { ErrorCode, QueryError } from '../errors'

/** Codecs whose stored form is an array; scalar operands match elements */
const ARRAY_CODECS = new Set(['array', 'list'])

/**
 * Translate every field name and operand of `filter`
 */
export function translateFilter(schema: ModelSchema, filter: Filter): Filter {
  const out: Filter = {}
  for (const [name, condition] of Object.entries(filter)) {
    if (condition === undefined) continue
    if (name === '$not') {
      if (!isFilterObject(condition)) throw invalid('$not expects a filter', name)
      out.$not = translateFilter(schema, condition)
    } else if (isLogicalKey(name)) {
      if (!Array.isArray(condition)) throw invalid(`${name} expects an array of filters`, name)
      const subs: unknown[] = condition
      const logicalKey: string = name
      out[logicalKey] = subs.map(sub => {
        if (!isFilterObject(sub)) throw invalid(`${name} expects an array of filters`, name)
        return translateFilter(schema, sub)
      })
    } else {
      const key = schema.table.keyFor(name)
      out[key] = translateCondition(schema, key, condition)
    }
  }
  return out
}

function translateCondition(schema: ModelSchema, key: string, condition: Filter[string]): FieldCondition {
  if (condition instanceof RegExp) return condition
  if (isFieldOperators(condition)) return translateOperators(schema, key, condition)
  if (isDocumentValue(condition)) return normalizeOperand(schema, key, condition)
  throw invalid(`Unsupported condition for "${key}"`, key)
}

function translateOperators(schema: ModelSchema, key: string, operators: FieldOperators): FieldOperators {
  const out: FieldOperators = { ...operators }
  const operand = (value: DocumentValue) => normalizeOperand(schema, key, value)

  if (operators.$eq !== undefined) out.$eq = operand(operators.$eq)
  if (operators.$ne !== undefined) out.$ne = operand(operators.$ne)
  if (operators.$gt !== undefined) out.$gt = operand(operators.$gt)
  if (operators.$gte !== undefined) out.$gte = operand(operators.$gte)
  if (operators.$lt !== undefined) out.$lt = operand(operators.$lt)
  if (operators.$lte !== undefined) out.$lte = operand(operators.$lte)
  if (operators.$in) out.$in = operators.$in.map(operand)
  if (operators.$nin) out.$nin = operators.$nin.map(operand)
  if (operators.$not) out.$not = translateOperators(schema, key, operators.$not)
  return out
}

/**
 * Canonical form of a query operand for a stored key
 */
export function normalizeOperand(schema: ModelSchema, key: string, value: DocumentValue): DocumentValue {
  const descriptor = schema.table.get(key)
  if (!descriptor || value === null) return value
  if (ARRAY_CODECS.has(descriptor.codec.name) && !Array.isArray(value)) return value
  return descriptor.codec.normalize(value, key) ?? null
}

function invalid(message: string, field: string): QueryError {
  return new QueryError(message, ErrorCode.INVALID_FILTER, { field })
}

/**
 * Filter Evaluation for docmap
 *
 * In-memory evaluation of MongoDB-style filters. Used by the memory document
 * store, by embed-many `where`, and by `$pull` conditions.
 *
 * ## Paths and arrays
 *
 * Dotted paths descend into arrays of embedded documents, so
 * `{ 'roles._id': 'a1' }` matches a document where any element of `roles`
 * has `_id` equal to `'a1'`. A condition on a field holding an array matches
 * when the array itself or any of its elements satisfies it.
 *
 * ## Null vs Undefined Handling
 *
 * - `{ field: null }` matches documents where field is null OR missing
 * - `{ field: { $exists: true } }` matches if field is present, even if null
 * - Comparison operators never match null or missing values
 *
 * ## Proximity
 *
 * `$near` is accepted here but always matches; distance filtering and
 * ordering are the store's responsibility since they need an index.
 */

import type { Filter, FieldOperators } from '../types/filter'
import { isFieldOperators, isLogicalKey } from '../types/filter'
import { deepEqual, compareValues, getPathValues, getValueType, isNullish, isPlainObject } from '../utils/comparison'
import { logger } from '../utils/logger'
import { ErrorCode, QueryError } from '../errors'

// =============================================================================
// Configuration
// =============================================================================

/**
 * Configuration for filter evaluation behavior
 */
export interface FilterConfig {
  /**
   * Behavior when an unknown operator is encountered:
   * - 'ignore': Silently ignore unknown operators
   * - 'warn': Log a warning
   * - 'error': Throw a QueryError (default)
   */
  unknownOperatorBehavior?: 'ignore' | 'warn' | 'error' | undefined
}

/**
 * Default filter configuration
 */
export const DEFAULT_FILTER_CONFIG: Readonly<FilterConfig> = Object.freeze({
  unknownOperatorBehavior: 'error',
})

function handleUnknownOperator(operator: string, config?: FilterConfig): void {
  const behavior = config?.unknownOperatorBehavior
    ?? DEFAULT_FILTER_CONFIG.unknownOperatorBehavior
    ?? 'error'

  if (behavior === 'ignore') {
    return
  }

  const message = `Unknown query operator: ${operator}`

  if (behavior === 'warn') {
    logger.warn(message)
  } else {
    throw new QueryError(message, ErrorCode.INVALID_FILTER)
  }
}

// =============================================================================
// Main Filter Evaluation
// =============================================================================

/**
 * Check if a document (or a primitive, for `$pull` conditions) matches a filter
 *
 * @param row - The value to check
 * @param filter - MongoDB-style filter
 * @param config - Optional filter configuration
 */
export function matchesFilter(row: unknown, filter: Filter, config?: FilterConfig): boolean {
  if (Object.keys(filter).length === 0) {
    return true
  }

  if (isNullish(row)) {
    return false
  }

  // Primitives: the filter is a set of operators applied to the value itself
  if (!isPlainObject(row)) {
    if (!isFieldOperators(filter)) return false
    if (!Object.keys(filter).every(key => key.startsWith('$'))) return false
    return evaluateOperators([row], filter, config)
  }

  if (filter.$and && !filter.$and.every(sub => matchesFilter(row, sub, config))) {
    return false
  }

  if (filter.$or && !filter.$or.some(sub => matchesFilter(row, sub, config))) {
    return false
  }

  if (filter.$not && matchesFilter(row, filter.$not, config)) {
    return false
  }

  if (filter.$nor && filter.$nor.some(sub => matchesFilter(row, sub, config))) {
    return false
  }

  for (const [field, condition] of Object.entries(filter)) {
    if (isLogicalKey(field)) continue
    if (field.startsWith('$')) {
      handleUnknownOperator(field, config)
      continue
    }

    if (!matchesCondition(getPathValues(row, field), condition, config)) {
      return false
    }
  }

  return true
}

/**
 * Create a predicate function from a filter
 */
export function createPredicate(filter: Filter, config?: FilterConfig): (row: unknown) => boolean {
  return (row: unknown) => matchesFilter(row, filter, config)
}

/**
 * Check if the values found at a path satisfy a condition
 *
 * @param values - Every value reachable through the path (empty when missing)
 * @param condition - Literal, RegExp or operator object
 */
export function matchesCondition(values: unknown[], condition: unknown, config?: FilterConfig): boolean {
  if (condition === undefined) {
    return true
  }

  if (isFieldOperators(condition)) {
    return evaluateOperators(values, condition, config)
  }

  if (condition instanceof RegExp) {
    return expand(values).some(v => typeof v === 'string' && condition.test(v))
  }

  return matchesEquality(values, condition)
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Values plus the elements of any array value
 */
function expand(values: unknown[]): unknown[] {
  return values.flatMap(v => (Array.isArray(v) ? [v, ...v] : [v]))
}

function matchesEquality(values: unknown[], expected: unknown): boolean {
  if (values.length === 0) {
    return isNullish(expected)
  }
  return expand(values).some(v => deepEqual(v, expected))
}

/**
 * Ordering comparisons only apply between values of the same kind
 */
function comparable(a: unknown, b: unknown): boolean {
  if (isNullish(a) || isNullish(b)) return false
  if (a instanceof Date || b instanceof Date) return a instanceof Date && b instanceof Date
  return typeof a === typeof b && (typeof a === 'number' || typeof a === 'string' || typeof a === 'boolean')
}

function compareSome(values: unknown[], operand: unknown, test: (cmp: number) => boolean): boolean {
  return expand(values).some(v => {
    if (!comparable(v, operand)) return false
    const cmp = compareValues(v, operand)
    return !Number.isNaN(cmp) && test(cmp)
  })
}

function buildRegex(pattern: string | RegExp, options: string | undefined): RegExp {
  if (pattern instanceof RegExp) {
    return options !== undefined ? new RegExp(pattern.source, options) : pattern
  }
  try {
    return new RegExp(pattern, options)
  } catch (err) {
    throw new QueryError(
      `Invalid regular expression: ${pattern}`,
      ErrorCode.INVALID_FILTER,
      { filter: pattern },
      err instanceof Error ? err : undefined
    )
  }
}

/**
 * Evaluate operator conditions against the values found at a path
 */
function evaluateOperators(values: unknown[], operators: FieldOperators, config?: FilterConfig): boolean {
  for (const op of Object.keys(operators)) {
    switch (op) {
      case '$eq':
        if (!matchesEquality(values, operators.$eq)) return false
        break

      case '$ne':
        if (matchesEquality(values, operators.$ne)) return false
        break

      case '$gt':
        if (!compareSome(values, operators.$gt, cmp => cmp > 0)) return false
        break

      case '$gte':
        if (!compareSome(values, operators.$gte, cmp => cmp >= 0)) return false
        break

      case '$lt':
        if (!compareSome(values, operators.$lt, cmp => cmp < 0)) return false
        break

      case '$lte':
        if (!compareSome(values, operators.$lte, cmp => cmp <= 0)) return false
        break

      case '$in': {
        const candidates = operators.$in
        if (!Array.isArray(candidates)) return false
        if (!candidates.some(candidate => matchesEquality(values, candidate))) return false
        break
      }

      case '$nin': {
        const candidates = operators.$nin
        if (!Array.isArray(candidates)) return false
        if (candidates.some(candidate => matchesEquality(values, candidate))) return false
        break
      }

      case '$regex': {
        const source = operators.$regex
        if (typeof source !== 'string' && !(source instanceof RegExp)) return false
        const pattern = buildRegex(source, operators.$options)
        if (!expand(values).some(v => typeof v === 'string' && pattern.test(v))) return false
        break
      }

      case '$options':
        break // Handled with $regex

      case '$exists':
        if ((values.length > 0) !== Boolean(operators.$exists)) return false
        break

      case '$type':
        if (!values.some(v => getValueType(v) === operators.$type)) return false
        break

      case '$all': {
        const required = operators.$all
        if (!Array.isArray(required)) return false
        const ok = values.some(v => Array.isArray(v) && required.every(r => v.some(e => deepEqual(e, r))))
        if (!ok) return false
        break
      }

      case '$elemMatch': {
        const sub = operators.$elemMatch
        if (!sub) return false
        if (!values.some(v => Array.isArray(v) && v.some(e => matchesFilter(e, sub, config)))) return false
        break
      }

      case '$size':
        if (!values.some(v => Array.isArray(v) && v.length === operators.$size)) return false
        break

      case '$not': {
        const inner = operators.$not
        if (!inner) return false
        if (evaluateOperators(values, inner, config)) return false
        break
      }

      case '$near':
        break // Distance filtering and ordering happen in the store

      default:
        handleUnknownOperator(op, config)
        break
    }
  }

  return true
}

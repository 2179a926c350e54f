/**
 * docmap Error Handling Module
 *
 * Standardized error hierarchy for the mapping layer. All errors extend
 * DocmapError, which carries:
 * - Error codes for programmatic handling
 * - Context data for debugging
 * - Serialization support (toJSON / fromJSON)
 * - Cause chaining
 *
 * Error Hierarchy:
 * - DocmapError (base class)
 *   - MalformedDocumentError (decode-time shape mismatch)
 *   - MissingIdentityError (save attempted before the identity is resolvable)
 *   - UnsavedParentError (embedded write-through on a transient parent)
 *   - CascadeRestrictedError (restrict policy blocked a destroy)
 *   - ValidationError (declared field constraints failed, collects every issue)
 *   - RelationshipError (invalid relationship operation)
 *   - EntityNotFoundError (lookup by id found nothing)
 *   - QueryError (invalid criteria / unsupported query)
 *   - StorageError (document store failures)
 *   - ConfigurationError (invalid configuration or model definitions)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for docmap operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Mapping
  MALFORMED_DOCUMENT = 'MALFORMED_DOCUMENT',
  MISSING_IDENTITY = 'MISSING_IDENTITY',
  IMMUTABLE_FIELD = 'IMMUTABLE_FIELD',
  ENTITY_DESTROYED = 'ENTITY_DESTROYED',

  // Validation
  VALIDATION_FAILED = 'VALIDATION_FAILED',

  // Relationships
  RELATIONSHIP_ERROR = 'RELATIONSHIP_ERROR',
  UNSAVED_PARENT = 'UNSAVED_PARENT',
  DUPLICATE_EMBEDDED_ID = 'DUPLICATE_EMBEDDED_ID',
  CASCADE_RESTRICTED = 'CASCADE_RESTRICTED',

  // Lookup
  ENTITY_NOT_FOUND = 'ENTITY_NOT_FOUND',

  // Query
  QUERY_ERROR = 'QUERY_ERROR',
  INVALID_FILTER = 'INVALID_FILTER',
  INDEX_NOT_FOUND = 'INDEX_NOT_FOUND',

  // Storage
  STORAGE_ERROR = 'STORAGE_ERROR',
  DUPLICATE_KEY = 'DUPLICATE_KEY',

  // Configuration
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_MODEL = 'UNKNOWN_MODEL',
  UNKNOWN_CODEC = 'UNKNOWN_CODEC',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (omitted in production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all docmap errors.
 *
 * @example
 * ```typescript
 * throw new DocmapError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'save',
 *   collection: 'movies'
 * })
 * ```
 */
export class DocmapError extends Error {
  override readonly name: string = 'DocmapError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for transport or logging
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof DocmapError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): DocmapError {
    const cause = data.cause ? DocmapError.fromJSON(data.cause) : undefined
    const error = new DocmapError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /**
   * Check if error is in a category (e.g., all NOT_FOUND variants)
   */
  isCategory(category: string): boolean {
    return this.code.includes(category)
  }
}

// =============================================================================
// Mapping Errors
// =============================================================================

/**
 * Thrown when a stored value does not have the shape its codec expects.
 *
 * Decoding never substitutes a default for corrupt data; the field and the
 * expected shape are always named.
 */
export class MalformedDocumentError extends DocmapError {
  override readonly name = 'MalformedDocumentError'
  readonly field: string
  readonly expected: string
  readonly actualType: string

  constructor(field: string, expected: string, value: unknown, cause?: Error) {
    const actualType = describeType(value)
    super(
      `Malformed value for field "${field}": expected ${expected}, got ${actualType}`,
      ErrorCode.MALFORMED_DOCUMENT,
      { field, expected, actualType },
      cause
    )
    this.field = field
    this.expected = expected
    this.actualType = actualType
    Object.setPrototypeOf(this, MalformedDocumentError.prototype)
  }
}

/**
 * Thrown when an entity is persisted while its identity cannot be resolved
 * (e.g. an `_id` derived from a field that is still unset).
 */
export class MissingIdentityError extends DocmapError {
  override readonly name = 'MissingIdentityError'
  readonly model: string
  readonly derivedFrom: string | undefined

  constructor(model: string, derivedFrom?: string) {
    const detail = derivedFrom ? ` (derived from "${derivedFrom}", which is unset)` : ''
    super(
      `Cannot persist ${model} without an identity${detail}`,
      ErrorCode.MISSING_IDENTITY,
      { model, derivedFrom }
    )
    this.model = model
    this.derivedFrom = derivedFrom
    Object.setPrototypeOf(this, MissingIdentityError.prototype)
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * A single failed field constraint
 */
export interface ValidationIssue {
  field: string
  message: string
}

/**
 * Thrown when declared field constraints fail.
 *
 * Carries every failed (field, message) pair rather than the first one.
 */
export class ValidationError extends DocmapError {
  override readonly name = 'ValidationError'
  readonly model: string
  readonly issues: ValidationIssue[]

  constructor(model: string, issues: ValidationIssue[]) {
    super(formatIssues(model, issues), ErrorCode.VALIDATION_FAILED, { model, issues })
    this.model = model
    this.issues = issues
    Object.setPrototypeOf(this, ValidationError.prototype)
  }

  /**
   * Messages grouped by field
   */
  getFieldErrors(): Map<string, string[]> {
    const byField = new Map<string, string[]>()
    for (const issue of this.issues) {
      const messages = byField.get(issue.field) ?? []
      messages.push(issue.message)
      byField.set(issue.field, messages)
    }
    return byField
  }
}

function formatIssues(model: string, issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return `Validation failed for ${model}`
  }
  if (issues.length === 1) {
    const [issue] = issues
    return `Validation failed for ${model}: ${issue?.field} ${issue?.message}`
  }
  const lines = [`Validation failed for ${model} with ${issues.length} errors:`]
  for (const issue of issues) {
    lines.push(`  - ${issue.field} ${issue.message}`)
  }
  return lines.join('\n')
}

// =============================================================================
// Relationship Errors
// =============================================================================

/**
 * Error thrown when a relationship operation fails.
 */
export class RelationshipError extends DocmapError {
  override readonly name: string = 'RelationshipError'
  readonly model: string
  readonly relation: string

  constructor(
    model: string,
    relation: string,
    message: string,
    code: ErrorCode = ErrorCode.RELATIONSHIP_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(`${model}.${relation}: ${message}`, code, { model, relation, ...context }, cause)
    this.model = model
    this.relation = relation
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Thrown when an embedded write-through is attempted on a parent that has
 * never been persisted.
 */
export class UnsavedParentError extends RelationshipError {
  override readonly name = 'UnsavedParentError'

  constructor(model: string, relation: string) {
    super(
      model,
      relation,
      'parent must be persisted before an embedded value can be created',
      ErrorCode.UNSAVED_PARENT
    )
    Object.setPrototypeOf(this, UnsavedParentError.prototype)
  }
}

/**
 * Thrown when a restrict cascade policy finds live related entities.
 * No mutation has been performed when this is raised.
 */
export class CascadeRestrictedError extends RelationshipError {
  override readonly name = 'CascadeRestrictedError'
  readonly entityId: string
  readonly count: number

  constructor(model: string, entityId: string, relation: string, count: number) {
    super(
      model,
      relation,
      `cannot destroy ${model} ${entityId}: ${count} related document(s) still exist`,
      ErrorCode.CASCADE_RESTRICTED,
      { entityId, count }
    )
    this.entityId = entityId
    this.count = count
    Object.setPrototypeOf(this, CascadeRestrictedError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when an entity is not found.
 */
export class EntityNotFoundError extends DocmapError {
  override readonly name = 'EntityNotFoundError'
  readonly model: string
  readonly entityId: string

  constructor(model: string, entityId: string, cause?: Error) {
    super(
      `${model} not found: ${entityId}`,
      ErrorCode.ENTITY_NOT_FOUND,
      { model, entityId },
      cause
    )
    this.model = model
    this.entityId = entityId
    Object.setPrototypeOf(this, EntityNotFoundError.prototype)
  }
}

// =============================================================================
// Query Errors
// =============================================================================

/**
 * Error thrown when a query cannot be built or executed.
 */
export class QueryError extends DocmapError {
  override readonly name = 'QueryError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.QUERY_ERROR,
    context?: {
      collection?: string
      field?: string
      filter?: unknown
    },
    cause?: Error
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, QueryError.prototype)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when a document store operation fails.
 */
export class StorageError extends DocmapError {
  override readonly name = 'StorageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    context?: {
      collection?: string
      operation?: string
    },
    cause?: Error
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, StorageError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration or a model definition is invalid.
 */
export class ConfigurationError extends DocmapError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: {
      configKey?: string
      model?: string
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a DocmapError
 */
export function isDocmapError(error: unknown): error is DocmapError {
  return error instanceof DocmapError
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a RelationshipError (or any subclass)
 */
export function isRelationshipError(error: unknown): error is RelationshipError {
  return error instanceof RelationshipError
}

export function isCascadeRestrictedError(error: unknown): error is CascadeRestrictedError {
  return error instanceof CascadeRestrictedError
}

export function isEntityNotFoundError(error: unknown): error is EntityNotFoundError {
  return error instanceof EntityNotFoundError
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError ||
    (isDocmapError(error) && error.code.includes('STORAGE'))
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Wrap an unknown error in a DocmapError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): DocmapError {
  if (error instanceof DocmapError) {
    return error
  }

  if (error instanceof Error) {
    return new DocmapError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new DocmapError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Short type description used in error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (value === undefined) return 'undefined'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Date) return 'date'
  return typeof value
}

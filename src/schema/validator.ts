/**
 * Schema Validator
 *
 * Runtime validation of entity attributes against declared field
 * constraints. Every failed constraint is collected; nothing stops at the
 * first failure.
 */

import type { ModelSchema } from './model'
import type { FieldDescriptor } from './field-table'
import type { RawDocument } from '../types/document'
import { ValidationError, type ValidationIssue } from '../errors'
import { logger as defaultLogger, type Logger } from '../utils/logger'

// =============================================================================
// Validation Mode
// =============================================================================

/**
 * Validation mode determines what happens to collected issues
 * - 'collect': Return issues to the caller (default)
 * - 'strict': Throw ValidationError when there are any
 * - 'warn': Log issues and report none
 */
export type ValidationMode = 'collect' | 'strict' | 'warn'

export interface SchemaValidatorOptions {
  mode?: ValidationMode | undefined
  /** Receives issues in 'warn' mode (default: the global logger) */
  logger?: Logger | undefined
}

// =============================================================================
// Schema Validator
// =============================================================================

export class SchemaValidator {
  private readonly mode: ValidationMode
  private readonly logger: Logger

  constructor(private readonly schema: ModelSchema, options: SchemaValidatorOptions = {}) {
    this.mode = options.mode ?? 'collect'
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Check stored attributes against the field table
   *
   * @param attributes - Attributes in document form, keyed by raw key
   * @param nested - Issues already collected from embedded values
   * @throws ValidationError in strict mode
   */
  validate(attributes: RawDocument, nested: ValidationIssue[] = []): ValidationIssue[] {
    const issues: ValidationIssue[] = []
    for (const descriptor of this.schema.table.descriptors()) {
      const issue = this.checkField(descriptor, attributes[descriptor.key])
      if (issue) issues.push(issue)
    }
    issues.push(...nested)

    if (issues.length === 0) return issues

    switch (this.mode) {
      case 'strict':
        throw new ValidationError(this.schema.name, issues)
      case 'warn':
        this.logger.warn(`Validation issues for ${this.schema.name}`, issues)
        return []
      default:
        return issues
    }
  }

  private checkField(descriptor: FieldDescriptor, raw: RawDocument[string] | undefined): ValidationIssue | undefined {
    const name = descriptor.alias ?? descriptor.key

    if (isBlank(raw)) {
      return descriptor.required ? { field: name, message: "can't be blank" } : undefined
    }

    if (descriptor.validate && raw !== undefined && raw !== null) {
      const message = descriptor.validate(descriptor.codec.decode(raw, descriptor.key))
      if (message) return { field: name, message }
    }

    return undefined
  }
}

/**
 * Presence check: missing, null, empty or whitespace-only strings and empty
 * arrays are blank
 */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true
  if (typeof value === 'string') return value.trim() === ''
  if (Array.isArray(value)) return value.length === 0
  return false
}

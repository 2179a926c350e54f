/**
 * Custom Vitest Matchers for docmap
 *
 * Extend Vitest's expect with domain-specific assertions.
 */

import type { ExpectationResult } from '@vitest/expect'
import { Entity } from '../src/entity/Entity'
import { isDocmapError, type ErrorCode } from '../src/errors'

function describeEntity(entity: Entity): string {
  return `${entity.model.name} ${entity.id ?? '(no id)'}`
}

export const docmapMatchers = {
  /**
   * Assert that an entity has been stored and not destroyed
   */
  toBePersisted(received: unknown): ExpectationResult {
    if (!(received instanceof Entity)) {
      return { message: () => `expected an Entity, got ${typeof received}`, pass: false }
    }
    const pass = received.isPersisted
    return {
      message: () =>
        pass
          ? `expected ${describeEntity(received)} not to be persisted`
          : `expected ${describeEntity(received)} to be persisted (new: ${received.isNew}, destroyed: ${received.isDestroyed})`,
      pass,
    }
  },

  /**
   * Assert that the last validation reported an issue on `field`
   */
  toHaveIssueOn(received: unknown, field: string, message?: string): ExpectationResult {
    if (!(received instanceof Entity)) {
      return { message: () => `expected an Entity, got ${typeof received}`, pass: false }
    }
    const issues = received.errors.filter(issue => issue.field === field)
    const pass = message === undefined ? issues.length > 0 : issues.some(issue => issue.message === message)
    const seen = received.errors.map(issue => `${issue.field}: ${issue.message}`).join('; ') || 'none'
    return {
      message: () =>
        pass
          ? `expected no issue on "${field}"`
          : `expected an issue on "${field}"${message === undefined ? '' : ` saying "${message}"`}, got ${seen}`,
      pass,
    }
  },

  /**
   * Assert that a value is a DocmapError with the given code
   */
  toBeDocmapError(received: unknown, code: ErrorCode): ExpectationResult {
    const pass = isDocmapError(received) && received.code === code
    return {
      message: () =>
        pass
          ? `expected error not to have code ${code}`
          : `expected DocmapError with code ${code}, got ${isDocmapError(received) ? received.code : String(received)}`,
      pass,
    }
  },
}

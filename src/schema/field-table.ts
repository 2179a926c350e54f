/**
 * Bidirectional field table
 *
 * Resolves an attribute name to its stored document key and back. Raw keys
 * and aliases resolve to the same descriptor, so both names read and write
 * one stored value.
 *
 * @module schema/field-table
 */

import type { AnyCodec } from '../codecs/types'
import type { CodecRegistry } from '../codecs/registry'
import type { FieldDefault, FieldMap } from './types'
import { ID_FIELD } from '../types/document'
import { ConfigurationError, ErrorCode } from '../errors'

/**
 * A field with its codec resolved
 */
export interface FieldDescriptor {
  /** Stored document key */
  readonly key: string
  readonly alias: string | undefined
  readonly codec: AnyCodec
  readonly default: FieldDefault<unknown> | undefined
  readonly required: boolean
  readonly validate: ((value: unknown) => string | undefined) | undefined
}

export class FieldTable {
  private byKey = new Map<string, FieldDescriptor>()
  private aliasToKey = new Map<string, string>()

  constructor(model: string, fields: FieldMap, codecs: CodecRegistry) {
    for (const [key, spec] of Object.entries(fields)) {
      if (key === ID_FIELD) {
        throw new ConfigurationError(
          `${model}: "${ID_FIELD}" is implicit and cannot be declared as a field`,
          ErrorCode.INVALID_CONFIG,
          { model, configKey: key }
        )
      }
      const validate = spec.validate
      this.byKey.set(key, {
        key,
        alias: spec.alias,
        codec: codecs.resolve(spec.codec),
        default: spec.default,
        required: spec.required,
        validate: validate ? value => validate.call(spec, value) : undefined,
      })
    }

    for (const descriptor of this.byKey.values()) {
      const alias = descriptor.alias
      if (alias === undefined) continue
      if (this.byKey.has(alias) || this.aliasToKey.has(alias) || alias === ID_FIELD) {
        throw new ConfigurationError(
          `${model}: alias "${alias}" for "${descriptor.key}" collides with another field name`,
          ErrorCode.INVALID_CONFIG,
          { model, configKey: alias }
        )
      }
      this.aliasToKey.set(alias, descriptor.key)
    }
  }

  /**
   * Look up a field by raw key or alias
   */
  get(name: string): FieldDescriptor | undefined {
    return this.byKey.get(this.keyFor(name))
  }

  has(name: string): boolean {
    return this.get(name) !== undefined
  }

  /**
   * Stored key for a name. Unknown names (and dotted paths into embedded
   * values) translate their first segment only.
   */
  keyFor(name: string): string {
    const direct = this.aliasToKey.get(name)
    if (direct !== undefined) return direct
    const dot = name.indexOf('.')
    if (dot > 0) {
      const head = this.aliasToKey.get(name.slice(0, dot))
      if (head !== undefined) return head + name.slice(dot)
    }
    return name
  }

  aliasFor(key: string): string | undefined {
    return this.byKey.get(key)?.alias
  }

  descriptors(): FieldDescriptor[] {
    return Array.from(this.byKey.values())
  }

  keys(): string[] {
    return Array.from(this.byKey.keys())
  }
}

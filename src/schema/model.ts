/**
 * Resolved model schema
 *
 * Turns a ModelDefinition into the lookups the mapper, the relationship
 * resolver and the cascade engine use: the field table, relations by name,
 * the collection name and the identity rule.
 *
 * @module schema/model
 */

import type { CodecRegistry } from '../codecs/registry'
import type {
  FieldMap,
  IndexSpec,
  ModelDefinition,
  RelationKind,
  RelationSpec,
  ScopeFactory,
} from './types'
import { field } from './types'
import { FieldTable } from './field-table'
import { ID_FIELD } from '../types/document'
import { modelToCollection } from '../utils/type-utils'
import { ConfigurationError, ErrorCode } from '../errors'

export const CREATED_AT = 'created_at'
export const UPDATED_AT = 'updated_at'

export interface SchemaOptions {
  /** Force timestamps on or off regardless of the definition */
  timestamps?: boolean | undefined
}

const EMBED_KINDS: ReadonlySet<RelationKind> = new Set<RelationKind>(['embed-one', 'embed-many'])

export class ModelSchema {
  readonly name: string
  readonly collection: string
  readonly table: FieldTable
  readonly embedded: boolean
  readonly embeddable: ReadonlySet<string>
  readonly timestamps: boolean
  /** Raw key the identity is derived from */
  readonly idFrom: string | undefined
  readonly indexes: readonly IndexSpec[]
  readonly scopes: Readonly<Record<string, ScopeFactory>>

  private relationSpecs = new Map<string, RelationSpec>()
  /** Embedded relation name by document key */
  private embedKeys = new Map<string, string>()

  constructor(definition: ModelDefinition, codecs: CodecRegistry, options: SchemaOptions = {}) {
    if (!definition.name || !/^[A-Za-z_][A-Za-z0-9_]*$/.test(definition.name)) {
      throw new ConfigurationError(
        `Invalid model name "${definition.name}"`,
        ErrorCode.INVALID_CONFIG,
        { configKey: 'name', actualValue: definition.name }
      )
    }

    this.name = definition.name
    this.collection = definition.collection ?? modelToCollection(definition.name)
    this.embedded = definition.embedded ?? false
    this.embeddable = new Set(definition.embeddable ?? [])
    this.timestamps = options.timestamps ?? definition.timestamps ?? false
    this.indexes = definition.indexes ?? []
    this.scopes = definition.scopes ?? {}

    const fields: FieldMap = this.timestamps
      ? { ...definition.fields, [CREATED_AT]: field('date'), [UPDATED_AT]: field('date') }
      : definition.fields
    this.table = new FieldTable(definition.name, fields, codecs)

    if (definition.idFrom !== undefined) {
      const descriptor = this.table.get(definition.idFrom)
      if (!descriptor) {
        throw this.invalid(`idFrom "${definition.idFrom}" is not a declared field`, 'idFrom')
      }
      this.idFrom = descriptor.key
    } else {
      this.idFrom = undefined
    }

    for (const [name, spec] of Object.entries(definition.relations ?? {})) {
      if (this.table.has(name) || name === ID_FIELD) {
        throw this.invalid(`relation "${name}" collides with a field`, name)
      }
      this.relationSpecs.set(name, spec)
      if (EMBED_KINDS.has(spec.kind)) {
        const key = this.embedKeyOf(name, spec)
        if (this.table.has(key) || this.embedKeys.has(key)) {
          throw this.invalid(`embedded relation "${name}" stores under "${key}", which is already in use`, name)
        }
        this.embedKeys.set(key, name)
      }
    }
  }

  private invalid(message: string, configKey: string): ConfigurationError {
    return new ConfigurationError(`${this.name}: ${message}`, ErrorCode.INVALID_CONFIG, {
      model: this.name,
      configKey,
    })
  }

  private embedKeyOf(name: string, spec: RelationSpec): string {
    if (spec.kind === 'embed-one' || spec.kind === 'embed-many') {
      return spec.field ?? name
    }
    return name
  }

  relation(name: string): RelationSpec | undefined {
    return this.relationSpecs.get(name)
  }

  relationNames(): string[] {
    return Array.from(this.relationSpecs.keys())
  }

  relations(): [string, RelationSpec][] {
    return Array.from(this.relationSpecs.entries())
  }

  /** Document key an embedded relation is stored under */
  documentKeyOf(relation: string): string {
    const spec = this.relationSpecs.get(relation)
    return spec ? this.embedKeyOf(relation, spec) : relation
  }

  /** Embedded relation stored under a document key, if any */
  embeddedRelationAt(key: string): string | undefined {
    return this.embedKeys.get(key)
  }

  /** Whether this model may be embedded as `capability` */
  canEmbedAs(capability: string): boolean {
    return this.embeddable.has(capability)
  }
}

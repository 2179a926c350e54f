/**
 * Model
 *
 * A defined model bound to a store: builds and loads entities, resolves
 * relations and starts queries.
 *
 * @module entity/Model
 */

import type { CodecRegistry } from '../codecs/registry'
import type { ResolvedConfig } from '../config/loader'
import type { ModelDefinition } from '../schema/types'
import type { DocumentStore } from '../types/store'
import type { Filter } from '../types/filter'
import type { RawDocument } from '../types/document'
import type { Logger } from '../utils/logger'
import type { ResolvedRelation } from '../relationships/types'
import type { LifecycleEvent, LifecycleObserver } from './hooks'
import { ModelSchema } from '../schema/model'
import { DocumentMapper } from '../mapper/document-mapper'
import { resolveRelation } from '../relationships/resolver'
import { Criteria } from '../query/criteria'
import { HookRegistry } from './hooks'
import { Entity, type EmbeddingLink } from './Entity'
import { ID_FIELD } from '../types/document'
import { EntityNotFoundError, ErrorCode, QueryError } from '../errors'

/**
 * What a model needs from its registry
 */
export interface ModelContext {
  readonly store: DocumentStore
  readonly logger: Logger
  readonly config: ResolvedConfig
  /** @throws ConfigurationError for unknown models */
  model(name: string): Model
}

export class Model {
  readonly schema: ModelSchema
  readonly mapper: DocumentMapper
  readonly hooks = new HookRegistry()

  private resolved = new Map<string, ResolvedRelation>()

  constructor(readonly context: ModelContext, definition: ModelDefinition, codecs: CodecRegistry) {
    this.schema = new ModelSchema(definition, codecs, { timestamps: context.config.timestamps })
    this.mapper = new DocumentMapper(this.schema)
  }

  get name(): string {
    return this.schema.name
  }

  get collection(): string {
    return this.schema.collection
  }

  // ===========================================================================
  // Relations
  // ===========================================================================

  /**
   * Resolved descriptor of a relation
   *
   * @throws RelationshipError for undeclared relations
   */
  relation(name: string): ResolvedRelation {
    const cached = this.resolved.get(name)
    if (cached) return cached
    const relation = resolveRelation(this.schema, name, {
      schemaOf: model => this.context.model(model).schema,
      defaultCascade: this.context.config.defaultCascade,
    })
    this.resolved.set(name, relation)
    return relation
  }

  relations(): ResolvedRelation[] {
    return this.schema.relationNames().map(name => this.relation(name))
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Transient entity with defaults applied, then `attributes`
   */
  build(attributes: Record<string, unknown> = {}): Entity {
    const entity = new Entity(this, { attributes: this.mapper.defaults() })
    return entity.assign(attributes)
  }

  /**
   * Entity for a stored document
   *
   * @throws MalformedDocumentError when a field does not decode
   */
  instantiate(doc: RawDocument): Entity {
    const { attributes, embedded } = this.mapper.load(doc)
    return new Entity(this, { attributes, embedded, stored: doc })
  }

  /** @internal */
  instantiateEmbedded(doc: RawDocument, link: EmbeddingLink): Entity {
    const { attributes, embedded } = this.mapper.load(doc)
    return new Entity(this, { attributes, embedded, link, persisted: true })
  }

  /**
   * Build and save. The entity is returned even when validation failed;
   * check `isPersisted` or `errors`.
   */
  async create(attributes: Record<string, unknown> = {}): Promise<Entity> {
    const entity = this.build(attributes)
    await entity.save()
    return entity
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * @throws EntityNotFoundError when no document has the id
   */
  async find(id: string): Promise<Entity> {
    const entity = await this.findById(id)
    if (!entity) {
      throw new EntityNotFoundError(this.name, id)
    }
    return entity
  }

  async findById(id: string): Promise<Entity | undefined> {
    this.assertCollection('find')
    const doc = await this.context.store.findOne(this.collection, { [ID_FIELD]: id })
    return doc ? this.instantiate(doc) : undefined
  }

  findBy(filter: Filter): Promise<Entity | undefined> {
    return this.where(filter).first()
  }

  where(filter: Filter = {}): Criteria {
    this.assertCollection('where')
    return new Criteria(this, entity => entity).where(filter)
  }

  all(): Criteria {
    return this.where()
  }

  /**
   * Criteria of a named scope
   *
   * @throws QueryError for unknown scopes
   */
  scope(name: string): Criteria {
    const factory = this.schema.scopes[name]
    if (!factory) {
      throw new QueryError(`${this.name} has no scope "${name}"`, ErrorCode.QUERY_ERROR, { collection: this.collection })
    }
    return this.where(factory())
  }

  count(filter: Filter = {}): Promise<number> {
    return this.where(filter).count()
  }

  // ===========================================================================
  // Hooks and indexes
  // ===========================================================================

  /**
   * Register a lifecycle observer
   * @returns Function to unregister the observer
   */
  on(event: LifecycleEvent, observer: LifecycleObserver): () => void {
    return this.hooks.on(event, observer)
  }

  owns(entity: Entity): boolean {
    return entity.model === this
  }

  /**
   * Create the declared indexes
   * @returns Index names
   */
  async syncIndexes(): Promise<string[]> {
    if (this.schema.embedded) return []
    const names: string[] = []
    for (const index of this.schema.indexes) {
      const fields: typeof index.fields = {}
      for (const [field, direction] of Object.entries(index.fields)) {
        fields[this.schema.table.keyFor(field)] = direction
      }
      names.push(await this.context.store.createIndex(this.collection, { ...index, fields }))
    }
    if (names.length > 0) this.context.logger.debug(`Synced ${names.length} index(es) on ${this.collection}`)
    return names
  }

  private assertCollection(operation: string): void {
    if (this.schema.embedded) {
      throw new QueryError(
        `${this.name} is embedded and has no collection to ${operation} in`,
        ErrorCode.QUERY_ERROR,
        { collection: this.collection }
      )
    }
  }
}

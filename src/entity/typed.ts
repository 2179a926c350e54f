/**
 * Typed entity views
 *
 * `Docmap.define` infers attribute and relation types from the definition.
 * A TypedEntity is an ordinary Entity whose accessors are narrowed to the
 * names and value types its model declares; unknown names still fall
 * through to the untyped signatures.
 *
 * @example
 * ```typescript
 * const Actors = dm.define({
 *   name: 'Actor',
 *   fields: { name: field('string'), height: field('measurement') },
 *   relations: { residence: embedsOne('Place', { as: 'locatable' }) },
 * })
 * const actor = Actors.build({ name: 'Tom', height: 1.8 })
 * actor.get('height')            // Measurement | undefined
 * actor.embedOne('residence')    // EmbedOneSlot
 * ```
 *
 * @module entity/typed
 */

import type { Entity } from './Entity'
import type { Model } from './Model'
import type { LifecycleEvent, LifecycleObserver } from './hooks'
import type { EmbedOneSlot } from '../relationships/embeds-one'
import type { EmbedManySlot } from '../relationships/embeds-many'
import type { RefOneSlot } from '../relationships/belongs-to'
import type { RefManySlot } from '../relationships/has-many'
import type { ManyToManySlot } from '../relationships/many-to-many'
import type { EmbeddedRefSlot } from '../relationships/embedded-refs'
import type { AttributeInput, AttributeName, AttributeValue, FieldMap, RelationMap, RelationNamesOf } from '../schema/types'
import type { DocumentValue, RawDocument } from '../types/document'
import type { Filter } from '../types/filter'
import { Criteria } from '../query/criteria'
import { asTypedEntity } from '../types/cast'

export interface AttributeAccess<F extends FieldMap> {
  get<N extends AttributeName<F>>(name: N): AttributeValue<F, N> | undefined
  set<N extends AttributeName<F>>(name: N, value: AttributeValue<F, N> | DocumentValue | undefined): this
  assign(input: AttributeInput<F>): this
}

export interface RelationAccess<R extends RelationMap> {
  embedOne(name: RelationNamesOf<R, 'embed-one'>): EmbedOneSlot
  embedMany(name: RelationNamesOf<R, 'embed-many'>): EmbedManySlot
  refOne(name: RelationNamesOf<R, 'ref-one'>): RefOneSlot
  refMany(name: RelationNamesOf<R, 'ref-many'>): RefManySlot
  manyToMany(name: RelationNamesOf<R, 'many-to-many'>): ManyToManySlot
  embeddedRefs(name: RelationNamesOf<R, 'embedded-ref'>): EmbeddedRefSlot
}

export type TypedEntity<F extends FieldMap, R extends RelationMap> = AttributeAccess<F> & RelationAccess<R> & Entity

/**
 * Model handle returned by `Docmap.define`
 */
export class TypedModel<F extends FieldMap, R extends RelationMap> {
  constructor(readonly model: Model) {}

  get name(): string {
    return this.model.name
  }

  get collection(): string {
    return this.model.collection
  }

  owns(entity: Entity): entity is TypedEntity<F, R> {
    return this.model.owns(entity)
  }

  build(attributes: AttributeInput<F> = {}): TypedEntity<F, R> {
    return this.wrap(this.model.build(attributes))
  }

  instantiate(doc: RawDocument): TypedEntity<F, R> {
    return this.wrap(this.model.instantiate(doc))
  }

  async create(attributes: AttributeInput<F> = {}): Promise<TypedEntity<F, R>> {
    return this.wrap(await this.model.create(attributes))
  }

  async find(id: string): Promise<TypedEntity<F, R>> {
    return this.wrap(await this.model.find(id))
  }

  async findBy(filter: Filter): Promise<TypedEntity<F, R> | undefined> {
    const entity = await this.model.findBy(filter)
    return entity && this.wrap(entity)
  }

  where(filter: Filter = {}): Criteria<TypedEntity<F, R>> {
    return this.criteria(filter)
  }

  all(): Criteria<TypedEntity<F, R>> {
    return this.where()
  }

  scope(name: string): Criteria<TypedEntity<F, R>> {
    return this.criteria(this.model.scope(name).toFilter())
  }

  count(filter: Filter = {}): Promise<number> {
    return this.model.count(filter)
  }

  on(event: LifecycleEvent, observer: LifecycleObserver<TypedEntity<F, R>>): () => void {
    return this.model.on(event, entity => observer(this.wrap(entity)))
  }

  syncIndexes(): Promise<string[]> {
    return this.model.syncIndexes()
  }

  private criteria(filter: Filter): Criteria<TypedEntity<F, R>> {
    return new Criteria<TypedEntity<F, R>>(this.model, entity => this.wrap(entity)).where(filter)
  }

  private wrap(entity: Entity): TypedEntity<F, R> {
    return asTypedEntity<TypedEntity<F, R>>(entity)
  }
}

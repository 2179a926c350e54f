/**
 * Embed-one slot
 *
 * A single value stored under a key of the owner's document. An attached
 * value with no attributes is still a value: it serializes as `{}`, which is
 * different from the key being absent.
 *
 * @module relationships/embeds-one
 */

import type { Entity, EmbeddingLink } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { DocumentValue } from '../types/document'
import type { ResolvedEmbedOne, SlotState } from './types'
import { isRawDocument } from '../types/document'
import { canWriteThrough, writeThrough } from './write-through'
import { MalformedDocumentError, RelationshipError, UnsavedParentError } from '../errors'

export class EmbedOneSlot {
  private value: Entity | undefined
  private state: SlotState
  /** Whether the owner's stored document holds the key */
  private stored: boolean

  constructor(readonly owner: Entity, readonly relation: ResolvedEmbedOne, raw?: DocumentValue) {
    if (raw === undefined || raw === null) {
      this.state = 'absent'
      this.stored = false
      return
    }
    if (!isRawDocument(raw)) {
      throw new MalformedDocumentError(relation.documentKey, 'embedded document', raw)
    }
    this.value = this.target().instantiateEmbedded(raw, this.link())
    this.state = 'attached'
    this.stored = true
  }

  get status(): SlotState {
    return this.state
  }

  /** True for any value, including a hollow one */
  get hasValue(): boolean {
    return this.value !== undefined
  }

  get(): Entity | undefined {
    return this.value
  }

  /**
   * Replace the value with a transient one, stored on the owner's next save
   */
  build(attributes: Record<string, unknown> = {}): Entity {
    const entity = this.target().build(attributes)
    this.replace(entity)
    this.state = 'built'
    return entity
  }

  /**
   * Build and write the value through to the owner's stored document
   *
   * @throws UnsavedParentError when the owner is not stored
   */
  async create(attributes: Record<string, unknown> = {}): Promise<Entity> {
    if (!canWriteThrough(this.owner)) {
      throw new UnsavedParentError(this.owner.model.name, this.relation.name)
    }
    const entity = this.build(attributes)
    const doc = entity.toDocument()
    await writeThrough(this.owner, this.relation, path => ({ $set: { [path]: doc } }))
    entity.markPersisted()
    this.state = 'attached'
    this.stored = true
    return entity
  }

  /**
   * Set or clear the value in memory; the owner's next save stores it
   */
  assign(value: Entity | null): void {
    if (value === null) {
      this.replace(undefined)
      this.state = this.stored ? 'removed' : 'absent'
      return
    }
    if (value.model.name !== this.relation.target) {
      throw new RelationshipError(
        this.owner.model.name,
        this.relation.name,
        `expected ${this.relation.target}, got ${value.model.name}`
      )
    }
    this.replace(value)
    this.state = 'built'
  }

  /**
   * Remove `child` if it is the current value, writing through when the
   * owner's document holds it
   * @internal
   */
  async removeChild(child: Entity): Promise<boolean> {
    if (child !== this.value) return false
    if (this.stored && canWriteThrough(this.owner)) {
      await writeThrough(this.owner, this.relation, path => ({ $unset: { [path]: true } }))
      this.stored = false
    }
    this.replace(undefined)
    this.state = this.stored ? 'removed' : 'absent'
    return true
  }

  /** @internal */
  children(): Entity[] {
    return this.value ? [this.value] : []
  }

  /** @internal */
  serialize(): DocumentValue | undefined {
    return this.value?.toDocument()
  }

  /** @internal */
  markPersisted(): void {
    this.stored = this.value !== undefined
    this.state = this.value ? 'attached' : 'absent'
    this.value?.markPersisted()
  }

  private replace(next: Entity | undefined): void {
    if (this.value && this.value !== next) this.value.detach()
    if (next) next.attach(this.link())
    this.value = next
  }

  private link(): EmbeddingLink {
    return { parent: this.owner, relation: this.relation.name, as: this.relation.as }
  }

  private target(): Model {
    return this.owner.model.context.model(this.relation.target)
  }
}

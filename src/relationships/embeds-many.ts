/**
 * Embed-many slot
 *
 * Ordered elements stored as an array in the owner's document. Every
 * element has an `_id` unique within the owner. On a stored owner,
 * `append`, `create` and `remove` write through; on a transient owner they
 * are staged for its first save.
 *
 * @module relationships/embeds-many
 */

import type { Entity, EmbeddingLink } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { DocumentValue } from '../types/document'
import type { Filter } from '../types/filter'
import type { ResolvedEmbedMany } from './types'
import { ID_FIELD, isRawDocument } from '../types/document'
import { matchesFilter } from '../query/filter'
import { translateFilter } from '../query/translate'
import { canWriteThrough, writeThrough } from './write-through'
import { ErrorCode, MalformedDocumentError, RelationshipError, UnsavedParentError } from '../errors'

export class EmbedManySlot {
  private elements: Entity[] = []

  constructor(readonly owner: Entity, readonly relation: ResolvedEmbedMany, raw?: DocumentValue) {
    if (raw === undefined || raw === null) return
    if (!Array.isArray(raw)) {
      throw new MalformedDocumentError(relation.documentKey, 'array of embedded documents', raw)
    }
    const target = this.target()
    for (const item of raw) {
      if (!isRawDocument(item)) {
        throw new MalformedDocumentError(relation.documentKey, 'array of embedded documents', item)
      }
      this.push(target.instantiateEmbedded(item, this.link()))
    }
  }

  get size(): number {
    return this.elements.length
  }

  all(): Entity[] {
    return [...this.elements]
  }

  find(id: string): Entity | undefined {
    return this.elements.find(element => element.id === id)
  }

  indexOf(element: Entity): number {
    return this.elements.indexOf(element)
  }

  /**
   * Elements whose documents match `filter` (aliases accepted)
   */
  where(filter: Filter): Entity[] {
    const translated = translateFilter(this.target().schema, filter)
    return this.elements.filter(element => matchesFilter(element.toDocument(), translated))
  }

  /**
   * Add a transient element, stored on the owner's next save
   */
  build(attributes: Record<string, unknown> = {}): Entity {
    const element = this.target().build(attributes)
    this.push(element)
    return element
  }

  /**
   * Add an element; writes through when the owner is stored
   *
   * @throws RelationshipError on a duplicate `_id`
   */
  async append(element: Entity): Promise<Entity> {
    if (element.model.name !== this.relation.target) {
      throw new RelationshipError(
        this.owner.model.name,
        this.relation.name,
        `expected ${this.relation.target}, got ${element.model.name}`
      )
    }
    if (this.elements.includes(element)) return element
    this.push(element)
    if (canWriteThrough(this.owner)) {
      const doc = element.toDocument()
      try {
        await writeThrough(this.owner, this.relation, path => ({ $push: { [path]: doc } }))
      } catch (error) {
        this.splice(element)
        throw error
      }
      element.markPersisted()
    }
    return element
  }

  /**
   * Build and append to a stored owner
   *
   * @throws UnsavedParentError when the owner is not stored
   */
  async create(attributes: Record<string, unknown> = {}): Promise<Entity> {
    if (!canWriteThrough(this.owner)) {
      throw new UnsavedParentError(this.owner.model.name, this.relation.name)
    }
    return this.append(this.target().build(attributes))
  }

  /**
   * Remove an element by reference or id; writes through when the element
   * is stored
   *
   * @returns false when no such element exists
   */
  async remove(elementOrId: Entity | string): Promise<boolean> {
    const element = typeof elementOrId === 'string' ? this.find(elementOrId) : elementOrId
    if (!element || this.indexOf(element) === -1) return false

    const id = element.ensureId()
    if (element.isPersisted && canWriteThrough(this.owner)) {
      await writeThrough(this.owner, this.relation, path => ({ $pull: { [path]: { [ID_FIELD]: id } } }))
    }
    this.splice(element)
    return true
  }

  /** @internal */
  children(): Entity[] {
    return this.all()
  }

  /** @internal */
  serialize(): DocumentValue[] {
    return this.elements.map(element => element.toDocument())
  }

  /** @internal */
  markPersisted(): void {
    for (const element of this.elements) {
      element.markPersisted()
    }
  }

  private push(element: Entity): void {
    const id = element.ensureId()
    if (this.elements.some(existing => existing !== element && existing.id === id)) {
      throw new RelationshipError(
        this.owner.model.name,
        this.relation.name,
        `duplicate embedded ${ID_FIELD} "${id}"`,
        ErrorCode.DUPLICATE_EMBEDDED_ID,
        { id }
      )
    }
    if (this.elements.includes(element)) return
    element.attach(this.link())
    this.elements.push(element)
  }

  private splice(element: Entity): void {
    const index = this.elements.indexOf(element)
    if (index > -1) this.elements.splice(index, 1)
    element.detach()
  }

  private link(): EmbeddingLink {
    return { parent: this.owner, relation: this.relation.name, as: undefined }
  }

  private target(): Model {
    return this.owner.model.context.model(this.relation.target)
  }
}

/**
 * Many-to-many slot
 *
 * Both sides keep an ordered set of the other side's ids. `append` and
 * `remove` update both sides in memory; the owner's save writes its own
 * array, then the partners' arrays. The two writes are separate store
 * operations, so a failure between them leaves a one-sided link (see
 * Reconciler).
 *
 * @module relationships/many-to-many
 */

import type { Entity } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { DocumentValue } from '../types/document'
import type { ResolvedManyToMany } from './types'
import { ID_FIELD } from '../types/document'
import { RelationshipError, ValidationError } from '../errors'

function idList(value: DocumentValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((id): id is string => typeof id === 'string') : []
}

export class ManyToManySlot {
  /** Partners appended since the last save */
  private added = new Map<string, Entity>()
  /** Partner ids removed since the last save, with the entity when known */
  private removed = new Map<string, Entity | undefined>()

  constructor(readonly owner: Entity, readonly relation: ResolvedManyToMany) {}

  /** Partner ids in stored order */
  ids(): string[] {
    return idList(this.owner.raw(this.relation.foreignKey))
  }

  includes(partner: Entity | string): boolean {
    const id = typeof partner === 'string' ? partner : partner.id
    return id !== undefined && this.ids().includes(id)
  }

  get hasPendingChanges(): boolean {
    return this.added.size > 0 || this.removed.size > 0
  }

  /**
   * Partners in id order. Appended partners not yet stored are included.
   */
  async all(): Promise<Entity[]> {
    const ids = this.ids()
    if (ids.length === 0) return []
    const found = await this.target().where({ [ID_FIELD]: { $in: ids } }).toArray()
    const byId = new Map<string, Entity>()
    for (const partner of found) {
      const id = partner.id
      if (id !== undefined) byId.set(id, partner)
    }
    const partners: Entity[] = []
    for (const id of ids) {
      const partner = this.added.get(id) ?? byId.get(id)
      if (partner) partners.push(partner)
    }
    return partners
  }

  /**
   * Link `partner` on both sides in memory
   */
  append(partner: Entity): void {
    this.assertTarget(partner)
    const partnerId = partner.ensureId()
    const ownerId = this.owner.ensureId()

    addId(this.owner, this.relation.foreignKey, partnerId)
    addId(partner, this.relation.inverseForeignKey, ownerId)
    this.removed.delete(partnerId)
    this.added.set(partnerId, partner)
  }

  /**
   * Unlink on both sides in memory. Given only an id, the partner's array
   * is updated in the store on save.
   */
  remove(partner: Entity | string): void {
    const partnerId = typeof partner === 'string' ? partner : partner.ensureId()
    const known = typeof partner === 'string' ? this.added.get(partner) : partner
    if (known) this.assertTarget(known)

    removeId(this.owner, this.relation.foreignKey, partnerId)
    const ownerId = this.owner.id
    if (known && ownerId !== undefined) {
      removeId(known, this.relation.inverseForeignKey, ownerId)
    }
    this.added.delete(partnerId)
    this.removed.set(partnerId, known)
  }

  /**
   * Unlink every partner
   */
  clear(): void {
    for (const id of this.ids()) {
      this.remove(id)
    }
  }

  /**
   * Write the partners' side of changes made since the last save. Runs
   * after the owner itself was stored.
   * @internal
   */
  async flush(): Promise<void> {
    const ownerId = this.owner.ensureId()
    const { store, logger } = this.owner.model.context
    const collection = this.target().collection
    const key = this.relation.inverseForeignKey

    for (const [partnerId, partner] of this.added) {
      if (partner.isDestroyed) {
        logger.warn(`${this.owner.model.name}.${this.relation.name}: partner ${partnerId} was destroyed; link is one-sided`)
        continue
      }
      if (partner.isNew) {
        if (!(await partner.save())) {
          throw new ValidationError(partner.model.name, partner.errors)
        }
        continue
      }
      const update = { $addToSet: { [key]: ownerId } }
      await store.updateOne(collection, { [ID_FIELD]: partnerId }, update)
      partner.recordWrite(update)
    }

    for (const [partnerId, partner] of this.removed) {
      const update = { $pull: { [key]: ownerId } }
      await store.updateOne(collection, { [ID_FIELD]: partnerId }, update)
      if (partner?.isPersisted) partner.recordWrite(update)
    }

    logger.debug(
      `${this.owner.model.name}.${this.relation.name}: linked ${this.added.size}, unlinked ${this.removed.size} partner(s)`
    )
    this.added.clear()
    this.removed.clear()
  }

  /** @internal */
  markPersisted(): void {}

  private assertTarget(partner: Entity): void {
    if (partner.model.name !== this.relation.target) {
      throw new RelationshipError(
        this.owner.model.name,
        this.relation.name,
        `expected ${this.relation.target}, got ${partner.model.name}`
      )
    }
  }

  private target(): Model {
    return this.owner.model.context.model(this.relation.target)
  }
}

function addId(entity: Entity, key: string, id: string): void {
  const ids = idList(entity.raw(key))
  if (!ids.includes(id)) entity.writeRaw(key, [...ids, id])
}

function removeId(entity: Entity, key: string, id: string): void {
  const ids = idList(entity.raw(key))
  if (ids.includes(id)) entity.writeRaw(key, ids.filter(existing => existing !== id))
}

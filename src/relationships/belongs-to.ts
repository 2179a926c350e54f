/**
 * Ref-one slot
 *
 * The holder stores the target id under the foreign key. The target is
 * unaware of the link. Reading issues at most one query per foreign key
 * value; an unset key issues none.
 *
 * @module relationships/belongs-to
 */

import type { Entity } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { ResolvedRefOne, SlotState } from './types'
import { UPDATED_AT } from '../schema/model'
import { ID_FIELD } from '../types/document'
import { RelationshipError } from '../errors'

export class RefOneSlot {
  private cached: Entity | undefined
  /** Foreign key value `cached` was read for */
  private cachedKey: string | undefined
  private loaded = false
  /** Assigned in memory since the holder was last saved */
  private pending = false

  constructor(readonly owner: Entity, readonly relation: ResolvedRefOne) {}

  /** Current foreign key value */
  get foreignKey(): string | undefined {
    const value = this.owner.raw(this.relation.foreignKey)
    return typeof value === 'string' ? value : undefined
  }

  get status(): SlotState {
    if (this.pending) return this.cached ? 'built' : 'removed'
    if (this.foreignKey === undefined) return 'absent'
    if (!this.loaded || this.cachedKey !== this.foreignKey) return 'unloaded'
    return this.cached ? 'attached' : 'absent'
  }

  /**
   * The referenced entity, `undefined` when the key is unset or dangling
   */
  async get(): Promise<Entity | undefined> {
    const key = this.foreignKey
    if (key === undefined) return undefined
    if (this.loaded && this.cachedKey === key) return this.cached

    this.cached = await this.target().findById(key)
    this.cachedKey = key
    this.loaded = true
    return this.cached
  }

  /**
   * Point at `target` (or clear) in memory; the holder's next save stores
   * the foreign key
   *
   * @throws RelationshipError when clearing a reference held in `_id`
   */
  assign(target: Entity | null): void {
    const { foreignKey } = this.relation
    if (target === null) {
      if (foreignKey === ID_FIELD) {
        throw new RelationshipError(this.owner.model.name, this.relation.name, `cannot clear a reference held in ${ID_FIELD}`)
      }
      this.owner.writeRaw(foreignKey, null)
      this.remember(undefined, undefined)
      return
    }

    if (target.model.name !== this.relation.target) {
      throw new RelationshipError(
        this.owner.model.name,
        this.relation.name,
        `expected ${this.relation.target}, got ${target.model.name}`
      )
    }
    const id = target.ensureId()
    if (foreignKey === ID_FIELD) {
      this.owner.set(ID_FIELD, id)
    } else {
      this.owner.writeRaw(foreignKey, id)
    }
    this.remember(target, id)
  }

  /**
   * Set the target's `updated_at` to now
   * @internal
   */
  async touch(): Promise<void> {
    const key = this.foreignKey
    if (key === undefined) return
    const target = this.target()
    if (!target.schema.timestamps) {
      this.owner.model.context.logger.debug(`Not touching ${target.name} ${key}: model has no timestamps`)
      return
    }
    const update = { $set: { [UPDATED_AT]: new Date() } }
    await this.owner.model.context.store.updateOne(target.collection, { [ID_FIELD]: key }, update)
    if (this.cached && this.cachedKey === key && this.cached.isPersisted) {
      this.cached.absorb(update)
    }
  }

  /** @internal */
  markPersisted(): void {
    this.pending = false
  }

  private remember(target: Entity | undefined, key: string | undefined): void {
    this.cached = target
    this.cachedKey = key
    this.loaded = true
    this.pending = true
  }

  private target(): Model {
    return this.owner.model.context.model(this.relation.target)
  }
}

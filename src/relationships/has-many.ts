/**
 * Ref-many slot (has-many, or has-one with `single`)
 *
 * The foreign key lives on the targets, so navigation is a query against
 * the target collection filtered by the owner id.
 *
 * @module relationships/has-many
 */

import type { Entity } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { Criteria } from '../query/criteria'
import type { ResolvedRefMany } from './types'
import { ID_FIELD } from '../types/document'
import { RelationshipError } from '../errors'

export class RefManySlot {
  constructor(readonly owner: Entity, readonly relation: ResolvedRefMany) {}

  /**
   * Criteria over the targets referring to the owner. A transient owner
   * without a resolvable id has none.
   */
  all(): Criteria {
    const id = this.owner.id
    return id === undefined
      ? this.target().where({ [ID_FIELD]: { $in: [] } })
      : this.target().where({ [this.relation.foreignKey]: id })
  }

  first(): Promise<Entity | undefined> {
    return this.all().first()
  }

  count(): Promise<number> {
    return this.all().count()
  }

  /**
   * The single target of a has-one relation
   */
  get(): Promise<Entity | undefined> {
    return this.first()
  }

  /**
   * Point `child` at the owner. A stored owner saves the child immediately;
   * for has-one, the previous target's key is cleared.
   *
   * @returns false when the child failed validation
   */
  async add(child: Entity): Promise<boolean> {
    if (child.model.name !== this.relation.target) {
      throw new RelationshipError(
        this.owner.model.name,
        this.relation.name,
        `expected ${this.relation.target}, got ${child.model.name}`
      )
    }
    const ownerId = this.owner.ensureId()
    child.writeRaw(this.relation.foreignKey, ownerId)
    if (!this.owner.isPersisted) return true

    if (!(await child.save())) return false
    if (this.relation.single) {
      const { store } = this.owner.model.context
      await store.updateMany(
        this.target().collection,
        { [this.relation.foreignKey]: ownerId, [ID_FIELD]: { $ne: child.ensureId() } },
        { $set: { [this.relation.foreignKey]: null } }
      )
    }
    return true
  }

  /** @internal */
  markPersisted(): void {}

  private target(): Model {
    return this.owner.model.context.model(this.relation.target)
  }
}

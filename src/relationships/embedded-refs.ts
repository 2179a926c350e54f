/**
 * Embedded-ref slot
 *
 * Navigates from an entity to elements embedded in other documents that
 * carry its id, e.g. from an actor to the roles embedded in movies. There
 * is no index from element to parent, so this takes two steps: find every
 * parent document containing a matching element, then pick the element out
 * of each. Cost grows with the number of matching parents.
 *
 * @module relationships/embedded-refs
 */

import type { Entity } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { Criteria } from '../query/criteria'
import type { ResolvedEmbeddedRef } from './types'
import { ID_FIELD } from '../types/document'

export class EmbeddedRefSlot {
  constructor(readonly owner: Entity, readonly relation: ResolvedEmbeddedRef) {}

  /**
   * Step one: parents embedding at least one element that refers to the
   * owner
   */
  parents(): Criteria {
    const id = this.owner.id
    const target = this.target()
    if (id === undefined) return target.where({ [ID_FIELD]: { $in: [] } })
    return target.where({ [`${this.relation.documentKey}.${this.relation.key}`]: id })
  }

  /**
   * Step two: the matching elements of every parent, in parent order
   */
  async all(): Promise<Entity[]> {
    const id = this.owner.id
    if (id === undefined) return []
    const elements: Entity[] = []
    for (const parent of await this.parents().toArray()) {
      for (const element of parent.embedMany(this.relation.relation).all()) {
        if (element.raw(this.relation.key) === id) elements.push(element)
      }
    }
    return elements
  }

  async first(): Promise<Entity | undefined> {
    const [element] = await this.all()
    return element
  }

  /** @internal */
  markPersisted(): void {}

  private target(): Model {
    return this.owner.model.context.model(this.relation.target)
  }
}

/**
 * Cascade engine
 *
 * Runs `destroy` on a top-level entity: before-destroy observers, restrict
 * checks for every relation, pre-removal policy work, removal of the
 * document, post-removal work, then after-destroy observers.
 *
 * Policies apply to ref-many and many-to-many relations:
 *
 * | Policy   | ref-many children               | many-to-many partners                     |
 * |----------|---------------------------------|-------------------------------------------|
 * | orphan   | left with a stale key           | owner id pulled after removal             |
 * | nullify  | key set to null                 | owner id pulled before removal            |
 * | destroy  | each destroyed with its cascade | each destroyed, then owner ids cleared    |
 * | delete   | removed with deleteMany         | owner id pulled before removal            |
 * | restrict | any child aborts the destroy    | any live partner aborts the destroy       |
 *
 * Steps after the first store write are not transactional; a failure part
 * way leaves earlier writes in place.
 *
 * @module cascade/engine
 */

import type { Entity } from '../entity/Entity'
import type { Model } from '../entity/Model'
import type { Criteria } from '../query/criteria'
import type { ResolvedManyToMany, ResolvedRefMany } from '../relationships/types'
import type { DocumentValue } from '../types/document'
import { ID_FIELD } from '../types/document'
import { CascadeRestrictedError } from '../errors'

type CascadingRelation = ResolvedRefMany | ResolvedManyToMany

/**
 * Destroy a top-level entity and apply the cascade policies of its
 * relations
 *
 * @throws CascadeRestrictedError before any store write when a restrict
 * relation still has related documents
 */
export async function destroyEntity(entity: Entity): Promise<void> {
  await new CascadeWalk().destroy(entity)
}

/**
 * One destroy, including every entity it destroys through `destroy`
 * policies. Keys already visited are skipped so cyclic chains end.
 */
export class CascadeWalk {
  private visited = new Set<string>()

  async destroy(entity: Entity): Promise<void> {
    const { model } = entity
    const { store, logger } = model.context

    if (entity.isDestroyed) return
    if (!entity.isPersisted) {
      entity.markDestroyed()
      return
    }

    const id = entity.ensureId()
    const key = `${model.name}:${id}`
    if (this.visited.has(key)) return
    this.visited.add(key)

    await model.hooks.dispatch('beforeDestroy', entity)

    const relations = cascadingRelations(model)
    for (const relation of relations) {
      if (relation.dependent === 'restrict') await this.checkRestrict(entity, relation)
    }

    for (const relation of relations) {
      await this.beforeRemoval(entity, relation)
    }

    await store.deleteOne(model.collection, { [ID_FIELD]: id })
    logger.debug(`Destroyed ${model.name} ${id}`)

    for (const relation of relations) {
      await this.afterRemoval(entity, relation)
    }

    entity.markDestroyed()
    await model.hooks.dispatch('afterDestroy', entity)
  }

  private async checkRestrict(entity: Entity, relation: CascadingRelation): Promise<void> {
    const id = entity.ensureId()
    const count = await related(entity, relation).count()
    if (count > 0) {
      throw new CascadeRestrictedError(entity.model.name, id, relation.name, count)
    }
  }

  private async beforeRemoval(entity: Entity, relation: CascadingRelation): Promise<void> {
    const { logger } = entity.model.context
    const label = `${entity.model.name}.${relation.name}`

    switch (relation.dependent) {
      case 'nullify':
        if (relation.kind === 'ref-many') {
          const result = await nullifyChildren(entity, relation)
          logger.debug(`${label}: nullified ${result} child(ren)`)
        } else {
          await unlinkPartners(entity, relation)
        }
        return

      case 'destroy': {
        const targets = await related(entity, relation).toArray()
        for (const target of targets) {
          await this.destroy(target)
        }
        if (relation.kind === 'many-to-many') entity.writeRaw(relation.foreignKey, [])
        logger.debug(`${label}: destroyed ${targets.length} related document(s)`)
        return
      }

      case 'delete':
        if (relation.kind === 'ref-many') {
          const target = targetModel(entity, relation)
          const result = await target.context.store.deleteMany(target.collection, {
            [relation.foreignKey]: entity.ensureId(),
          })
          logger.debug(`${label}: deleted ${result.deletedCount} child(ren)`)
        } else {
          await unlinkPartners(entity, relation)
        }
        return

      case 'orphan':
      case 'restrict':
        return
    }
  }

  private async afterRemoval(entity: Entity, relation: CascadingRelation): Promise<void> {
    if (relation.dependent !== 'orphan') return
    if (relation.kind === 'many-to-many') {
      await unlinkPartners(entity, relation)
    } else {
      entity.model.context.logger.debug(
        `${entity.model.name}.${relation.name}: children of ${entity.ensureId()} keep a stale ${relation.foreignKey}`
      )
    }
  }
}

function cascadingRelations(model: Model): CascadingRelation[] {
  return model
    .relations()
    .filter((relation): relation is CascadingRelation => relation.kind === 'ref-many' || relation.kind === 'many-to-many')
}

function targetModel(entity: Entity, relation: CascadingRelation): Model {
  return entity.model.context.model(relation.target)
}

/**
 * Stored related documents. Many-to-many partners are the ones listed in
 * the stored id array that still exist.
 */
function related(entity: Entity, relation: CascadingRelation): Criteria {
  const target = targetModel(entity, relation)
  if (relation.kind === 'ref-many') {
    return target.where({ [relation.foreignKey]: entity.ensureId() })
  }
  return target.where({ [ID_FIELD]: { $in: storedIds(entity, relation.foreignKey) } })
}

function storedIds(entity: Entity, key: string): string[] {
  const value: DocumentValue | undefined = entity.storedDocument()?.[key]
  return Array.isArray(value) ? value.filter((id): id is string => typeof id === 'string') : []
}

async function nullifyChildren(entity: Entity, relation: ResolvedRefMany): Promise<number> {
  const target = targetModel(entity, relation)
  const result = await target.context.store.updateMany(
    target.collection,
    { [relation.foreignKey]: entity.ensureId() },
    { $set: { [relation.foreignKey]: null } }
  )
  return result.modifiedCount
}

/**
 * Pull the owner id from every partner holding it
 */
async function unlinkPartners(entity: Entity, relation: ResolvedManyToMany): Promise<void> {
  const target = targetModel(entity, relation)
  const id = entity.ensureId()
  const key = relation.inverseForeignKey
  const result = await target.context.store.updateMany(target.collection, { [key]: id }, { $pull: { [key]: id } })
  target.context.logger.debug(
    `${entity.model.name}.${relation.name}: pulled ${id} from ${result.modifiedCount} partner(s)`
  )
}

/**
 * Entity persistence
 *
 * Save order: validate, resolve identity, beforeSave observers, insert or
 * diff update, many-to-many partner writes, touches, afterSave observers.
 * None of the steps after the first store write are transactional.
 *
 * @module entity/persistence
 */

import type { Entity } from './Entity'
import type { ValidationMode } from '../schema/validator'
import { CREATED_AT, UPDATED_AT } from '../schema/model'
import { ID_FIELD } from '../types/document'
import { ManyToManySlot } from '../relationships/many-to-many'
import { DocmapError, ErrorCode, RelationshipError } from '../errors'

export interface SaveOptions {
  /**
   * Validation mode for this save; `false` skips validation.
   * Default: 'strict' when `strictValidation` is configured, else 'collect'.
   */
  validate?: ValidationMode | false | undefined
}

/**
 * Store a top-level entity
 *
 * @returns false when validation collected issues
 */
export async function saveEntity(entity: Entity, options: SaveOptions): Promise<boolean> {
  const { model } = entity
  const { store, logger, config } = model.context

  if (model.schema.embedded) {
    throw new RelationshipError(model.name, '(parent)', 'embedded entities are saved through their parent')
  }
  if (entity.isDestroyed) {
    throw new DocmapError(`Cannot save a destroyed ${model.name}`, ErrorCode.ENTITY_DESTROYED, {
      model: model.name,
      id: entity.id,
    })
  }

  const mode = options.validate ?? (config.strictValidation ? 'strict' : 'collect')
  if (mode !== false && entity.validate(mode).length > 0) {
    logger.debug(`Not saving ${model.name}: validation failed`, entity.errors)
    return false
  }

  const id = entity.ensureId()
  await model.hooks.dispatch('beforeSave', entity)

  if (entity.isNew) {
    if (model.schema.timestamps) {
      const now = new Date()
      if (!entity.has(CREATED_AT)) entity.writeRaw(CREATED_AT, now)
      entity.writeRaw(UPDATED_AT, now)
    }
    const doc = entity.toDocument()
    await store.insert(model.collection, doc)
    entity.markPersisted(doc)
    logger.debug(`Inserted ${model.name} ${id}`)
  } else {
    let doc = entity.toDocument()
    const previous = entity.storedDocument() ?? {}
    let update = model.mapper.diff(previous, doc)
    if (update && model.schema.timestamps) {
      entity.writeRaw(UPDATED_AT, new Date())
      doc = entity.toDocument()
      update = model.mapper.diff(previous, doc)
    }
    if (update) {
      await store.updateOne(model.collection, { [ID_FIELD]: id }, update)
      logger.debug(`Updated ${model.name} ${id}`, update)
    }
    entity.markPersisted(doc)
  }

  for (const slot of entity.loadedSlots()) {
    if (slot instanceof ManyToManySlot) {
      await slot.flush()
    }
  }
  await touchReferences(entity)

  await model.hooks.dispatch('afterSave', entity)
  return true
}

/**
 * Bump `updated_at` on the targets of touching references held by the
 * entity or any embedded descendant
 */
async function touchReferences(entity: Entity): Promise<void> {
  for (const relation of entity.model.relations()) {
    if (relation.kind === 'ref-one' && relation.touch) {
      await entity.refOne(relation.name).touch()
    }
  }
  for (const child of entity.embeddedChildren()) {
    await touchReferences(child)
  }
}

/**
 * Raw removal of a top-level entity
 */
export async function deleteEntity(entity: Entity): Promise<void> {
  const { model } = entity
  if (entity.isPersisted) {
    await model.context.store.deleteOne(model.collection, { [ID_FIELD]: entity.ensureId() })
    model.context.logger.debug(`Deleted ${model.name} ${entity.ensureId()}`)
  }
  entity.markDestroyed()
}

/**
 * Remove an embedded entity from its parent, writing through when the
 * parent document holds it
 */
export async function removeEmbedded(entity: Entity, options: { notify: boolean }): Promise<void> {
  const parent = entity.parent
  const relation = entity.embeddedIn
  if (!parent || relation === undefined) return

  const { hooks } = entity.model
  if (options.notify) await hooks.dispatch('beforeDestroy', entity)

  if (parent.model.relation(relation).kind === 'embed-one') {
    await parent.embedOne(relation).removeChild(entity)
  } else {
    await parent.embedMany(relation).remove(entity)
  }
  entity.markDestroyed()

  if (options.notify) await hooks.dispatch('afterDestroy', entity)
}


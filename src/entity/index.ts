/**
 * Entities and models
 *
 * @module entity
 */

export { Entity, type EntityInit, type EntityState, type EmbeddingLink, type RelationSlot } from './Entity'
export { Model, type ModelContext } from './Model'
export { TypedModel, type TypedEntity, type AttributeAccess, type RelationAccess } from './typed'
export { HookRegistry, type LifecycleEvent, type LifecycleObserver } from './hooks'
export type { SaveOptions } from './persistence'

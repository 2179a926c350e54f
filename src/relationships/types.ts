/**
 * Relationship descriptors
 *
 * A relation declared on a model definition is resolved once, against the
 * registry, into a descriptor carrying everything the slots and the cascade
 * engine need: the target model, the foreign key(s) or document key, the
 * cascade policy and whether the other side mirrors it.
 *
 * @packageDocumentation
 */

import type { CascadePolicy, RelationKind } from '../schema/types'

interface BaseRelation {
  /** Relation name on the owner */
  readonly name: string
  /** Owner model name */
  readonly owner: string
  /** Target model name */
  readonly target: string
  /** Whether the target declares the mirror relation */
  readonly bidirectional: boolean
}

export interface ResolvedEmbedOne extends BaseRelation {
  readonly kind: 'embed-one'
  /** Key in the owner's document */
  readonly documentKey: string
  /** Capability the value is embedded as */
  readonly as: string | undefined
}

export interface ResolvedEmbedMany extends BaseRelation {
  readonly kind: 'embed-many'
  readonly documentKey: string
}

export interface ResolvedRefOne extends BaseRelation {
  readonly kind: 'ref-one'
  /** Key on the holder storing the target id */
  readonly foreignKey: string
  readonly touch: boolean
}

export interface ResolvedRefMany extends BaseRelation {
  readonly kind: 'ref-many'
  /** Key on the target storing the owner id */
  readonly foreignKey: string
  readonly single: boolean
  readonly dependent: CascadePolicy
}

export interface ResolvedManyToMany extends BaseRelation {
  readonly kind: 'many-to-many'
  /** Owner-side id array */
  readonly foreignKey: string
  /** Target-side id array */
  readonly inverseForeignKey: string
  /** Mirror relation on the target, when declared */
  readonly inverseName: string | undefined
  readonly dependent: CascadePolicy
}

export interface ResolvedEmbeddedRef extends BaseRelation {
  readonly kind: 'embedded-ref'
  /** Embed-many relation on the target holding the elements */
  readonly relation: string
  /** Document key of that relation */
  readonly documentKey: string
  /** Element key compared with the owner id */
  readonly key: string
}

export type ResolvedRelation =
  | ResolvedEmbedOne
  | ResolvedEmbedMany
  | ResolvedRefOne
  | ResolvedRefMany
  | ResolvedManyToMany
  | ResolvedEmbeddedRef

/** Descriptor of one kind */
export type ResolvedOf<K extends RelationKind> = Extract<ResolvedRelation, { kind: K }>

/**
 * Slot states
 *
 * - 'unloaded': nothing read yet (references before their first `get`)
 * - 'built': a value was set in memory and is not yet stored
 * - 'attached': the value is present in the stored document
 * - 'absent': no value and no stored key
 * - 'removed': cleared in memory, still stored until the next save
 */
export type SlotState = 'unloaded' | 'built' | 'attached' | 'absent' | 'removed'

/** Relations whose values live inside the owner's document */
export function isEmbedded(relation: ResolvedRelation): relation is ResolvedEmbedOne | ResolvedEmbedMany {
  return relation.kind === 'embed-one' || relation.kind === 'embed-many'
}

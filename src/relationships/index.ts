/**
 * Relationships Module
 *
 * Relation descriptors and the per-entity slots that navigate them.
 *
 * @packageDocumentation
 */

export {
  type ResolvedEmbedOne,
  type ResolvedEmbedMany,
  type ResolvedRefOne,
  type ResolvedRefMany,
  type ResolvedManyToMany,
  type ResolvedEmbeddedRef,
  type ResolvedRelation,
  type ResolvedOf,
  type SlotState,
  isEmbedded,
} from './types'

export { resolveRelation, type ResolveOptions } from './resolver'

export { EmbedOneSlot } from './embeds-one'
export { EmbedManySlot } from './embeds-many'
export { RefOneSlot } from './belongs-to'
export { RefManySlot } from './has-many'
export { ManyToManySlot } from './many-to-many'
export { EmbeddedRefSlot } from './embedded-refs'

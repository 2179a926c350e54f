/**
 * Write-through for embedded values
 *
 * Embedded values are stored inside their root document, so an immediate
 * write is an update of the root at the value's dotted path.
 *
 * @module relationships/write-through
 */

import type { Entity } from '../entity/Entity'
import type { ResolvedEmbedMany, ResolvedEmbedOne } from './types'
import type { UpdateSpec } from '../types/update'
import { ID_FIELD } from '../types/document'
import { UnsavedParentError } from '../errors'

/**
 * Whether the owner's stored document can take a write-through
 */
export function canWriteThrough(owner: Entity): boolean {
  return owner.isPersisted && owner.root.isPersisted
}

/**
 * Send `build(path)` to the owner's root document and record it there
 *
 * @throws UnsavedParentError when the owner is not stored
 */
export async function writeThrough(
  owner: Entity,
  relation: ResolvedEmbedOne | ResolvedEmbedMany,
  build: (path: string) => UpdateSpec
): Promise<void> {
  if (!canWriteThrough(owner)) {
    throw new UnsavedParentError(owner.model.name, relation.name)
  }
  const root = owner.root
  const prefix = owner.documentPath()
  const path = prefix ? `${prefix}.${relation.documentKey}` : relation.documentKey
  const update = build(path)

  const { store, logger } = root.model.context
  await store.updateOne(root.model.collection, { [ID_FIELD]: root.ensureId() }, update)
  root.recordWrite(update)
  logger.debug(`Wrote ${owner.model.name}.${relation.name} through to ${root.model.name} ${root.ensureId()}`, update)
}

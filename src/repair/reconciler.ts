/**
 * Reconciler - opt-in consistency repair
 *
 * Many-to-many links and reference keys are written by separate store
 * operations, so an interrupted save or cascade can leave one-sided links
 * and keys pointing at removed documents. The reconciler finds both by
 * scanning stored documents and can repair them. It is never run by the
 * save or destroy paths.
 *
 * Each pass works in three steps:
 * 1. Collect the ids a collection refers to
 * 2. Look up which of them exist
 * 3. Report, or write the fix unless `dryRun` is set
 *
 * @module repair/reconciler
 */

import type { Model, ModelContext } from '../entity/Model'
import type { ResolvedManyToMany, ResolvedRefOne } from '../relationships/types'
import type { DocumentValue, RawDocument } from '../types/document'
import { ID_FIELD, documentId } from '../types/document'
import { RelationshipError } from '../errors'

// =============================================================================
// Types
// =============================================================================

/** A model given by name or by its handle */
export type ModelRef = string | { readonly name: string }

/**
 * A many-to-many link recorded on one side only
 *
 * - 'inverse': the partner exists but does not list the owner
 * - 'partner': the partner document no longer exists
 */
export interface OneSidedLink {
  ownerId: string
  partnerId: string
  missing: 'inverse' | 'partner'
}

/** A reference key whose target document no longer exists */
export interface DanglingReference {
  /** Id of the document holding the key */
  id: string
  /** Missing target id */
  targetId: string
}

export interface RepairOptions {
  /** Report what would change without writing (default false) */
  dryRun?: boolean | undefined
}

export interface RepairResult {
  /** Problems found */
  found: number
  /** Documents written */
  repaired: number
  /** Problems left alone */
  skipped: number
  dryRun: boolean
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  constructor(private readonly context: ModelContext) {}

  /**
   * Links in `relation` missing on the partner side
   */
  async checkManyToMany(model: ModelRef, relation: string): Promise<OneSidedLink[]> {
    const { owner, resolved } = this.manyToMany(model, relation)
    const target = this.context.model(resolved.target)
    const owners = await this.context.store.findMany(owner.collection, {
      [resolved.foreignKey]: { $exists: true },
    })

    const partnerIds = new Set<string>()
    for (const doc of owners) {
      for (const id of idList(doc[resolved.foreignKey])) partnerIds.add(id)
    }
    const partners = await this.byId(target, [...partnerIds])

    const links: OneSidedLink[] = []
    for (const doc of owners) {
      const ownerId = documentId(doc)
      if (ownerId === undefined) continue
      for (const partnerId of idList(doc[resolved.foreignKey])) {
        const partner = partners.get(partnerId)
        if (!partner) {
          links.push({ ownerId, partnerId, missing: 'partner' })
        } else if (!idList(partner[resolved.inverseForeignKey]).includes(ownerId)) {
          links.push({ ownerId, partnerId, missing: 'inverse' })
        }
      }
    }

    if (links.length > 0) {
      this.context.logger.warn(`${owner.name}.${relation}: ${links.length} one-sided link(s)`)
    }
    return links
  }

  /**
   * Add the missing inverse ids. Links to removed partners are left for
   * the caller; running it twice writes nothing the second time.
   */
  async repairManyToMany(model: ModelRef, relation: string, options: RepairOptions = {}): Promise<RepairResult> {
    const { owner, resolved } = this.manyToMany(model, relation)
    const target = this.context.model(resolved.target)
    const links = await this.checkManyToMany(model, relation)
    const dryRun = options.dryRun ?? false

    let repaired = 0
    let skipped = 0
    for (const link of links) {
      if (link.missing === 'partner') {
        this.context.logger.debug(`${owner.name}.${relation}: skipping ${link.ownerId} -> removed ${link.partnerId}`)
        skipped++
        continue
      }
      if (dryRun) continue
      const result = await this.context.store.updateOne(
        target.collection,
        { [ID_FIELD]: link.partnerId },
        { $addToSet: { [resolved.inverseForeignKey]: link.ownerId } }
      )
      repaired += result.modifiedCount
    }

    return { found: links.length, repaired, skipped, dryRun }
  }

  /**
   * Holders of `relation` whose key names a document that does not exist
   */
  async findDanglingReferences(model: ModelRef, relation: string): Promise<DanglingReference[]> {
    const { holder, resolved } = this.refOne(model, relation)
    const target = this.context.model(resolved.target)
    const docs = await this.context.store.findMany(holder.collection, {
      [resolved.foreignKey]: { $exists: true, $ne: null },
    })

    const targetIds = new Set<string>()
    for (const doc of docs) {
      const targetId = doc[resolved.foreignKey]
      if (typeof targetId === 'string') targetIds.add(targetId)
    }
    const existing = await this.byId(target, [...targetIds])

    const dangling: DanglingReference[] = []
    for (const doc of docs) {
      const id = documentId(doc)
      const targetId = doc[resolved.foreignKey]
      if (id === undefined || typeof targetId !== 'string') continue
      if (!existing.has(targetId)) dangling.push({ id, targetId })
    }

    if (dangling.length > 0) {
      this.context.logger.warn(`${holder.name}.${relation}: ${dangling.length} dangling reference(s)`)
    }
    return dangling
  }

  /**
   * Set dangling keys of `relation` to null
   */
  async nullifyDanglingReferences(model: ModelRef, relation: string, options: RepairOptions = {}): Promise<RepairResult> {
    const { holder, resolved } = this.refOne(model, relation)
    const dangling = await this.findDanglingReferences(model, relation)
    const dryRun = options.dryRun ?? false

    let repaired = 0
    if (!dryRun) {
      for (const reference of dangling) {
        const result = await this.context.store.updateOne(
          holder.collection,
          { [ID_FIELD]: reference.id, [resolved.foreignKey]: reference.targetId },
          { $set: { [resolved.foreignKey]: null } }
        )
        repaired += result.modifiedCount
      }
    }

    return { found: dangling.length, repaired, skipped: 0, dryRun }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private manyToMany(ref: ModelRef, relation: string): { owner: Model; resolved: ResolvedManyToMany } {
    const owner = this.topLevel(ref, relation)
    const resolved = owner.relation(relation)
    if (resolved.kind !== 'many-to-many') {
      throw new RelationshipError(owner.name, relation, `is ${resolved.kind}, expected many-to-many`)
    }
    return { owner, resolved }
  }

  private refOne(ref: ModelRef, relation: string): { holder: Model; resolved: ResolvedRefOne } {
    const holder = this.topLevel(ref, relation)
    const resolved = holder.relation(relation)
    if (resolved.kind !== 'ref-one') {
      throw new RelationshipError(holder.name, relation, `is ${resolved.kind}, expected ref-one`)
    }
    if (resolved.foreignKey === ID_FIELD) {
      throw new RelationshipError(holder.name, relation, `keys on ${ID_FIELD} cannot be nullified`)
    }
    return { holder, resolved }
  }

  private topLevel(ref: ModelRef, relation: string): Model {
    const model = this.context.model(typeof ref === 'string' ? ref : ref.name)
    if (model.schema.embedded) {
      throw new RelationshipError(model.name, relation, 'embedded models have no collection to reconcile')
    }
    return model
  }

  private async byId(model: Model, ids: string[]): Promise<Map<string, RawDocument>> {
    const found = new Map<string, RawDocument>()
    if (ids.length === 0) return found
    for (const doc of await this.context.store.findMany(model.collection, { [ID_FIELD]: { $in: ids } })) {
      const id = documentId(doc)
      if (id !== undefined) found.set(id, doc)
    }
    return found
  }
}

function idList(value: DocumentValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((id): id is string => typeof id === 'string') : []
}

/**
 * Entity
 *
 * A mapped record: attributes held in canonical document form keyed by raw
 * document key, relation slots, and the last document known to be stored.
 * Saves send only the difference between the two documents.
 *
 * @module entity/Entity
 */

import type { Model } from './Model'
import type { ValidationMode } from '../schema/validator'
import type { DocumentValue, RawDocument } from '../types/document'
import type { UpdateSpec } from '../types/update'
import type { ResolvedOf, ResolvedRelation } from '../relationships/types'
import type { RelationKind } from '../schema/types'
import { SchemaValidator } from '../schema/validator'
import { ID_FIELD, cloneDocument } from '../types/document'
import { applyUpdate } from '../mutation/operators'
import { generateId } from '../utils/random'
import { EmbedOneSlot } from '../relationships/embeds-one'
import { EmbedManySlot } from '../relationships/embeds-many'
import { RefOneSlot } from '../relationships/belongs-to'
import { RefManySlot } from '../relationships/has-many'
import { ManyToManySlot } from '../relationships/many-to-many'
import { EmbeddedRefSlot } from '../relationships/embedded-refs'
import { isEmbedded } from '../relationships/types'
import { deleteEntity, removeEmbedded, saveEntity, type SaveOptions } from './persistence'
import { destroyEntity } from '../cascade/engine'
import {
  DocmapError,
  EntityNotFoundError,
  ErrorCode,
  MalformedDocumentError,
  MissingIdentityError,
  RelationshipError,
  type ValidationIssue,
} from '../errors'

export type EntityState = 'new' | 'persisted' | 'destroyed'

/**
 * Where an embedded entity lives
 */
export interface EmbeddingLink {
  readonly parent: Entity
  /** Relation name on the parent */
  readonly relation: string
  /** Capability the entity is embedded as */
  readonly as: string | undefined
}

export interface EntityInit {
  attributes: RawDocument
  embedded?: Map<string, DocumentValue> | undefined
  /** Stored document, for entities read from the store */
  stored?: RawDocument | undefined
  link?: EmbeddingLink | undefined
  /** Embedded entity already present in its parent's stored document */
  persisted?: boolean | undefined
}

export type RelationSlot =
  | EmbedOneSlot
  | EmbedManySlot
  | RefOneSlot
  | RefManySlot
  | ManyToManySlot
  | EmbeddedRefSlot

type SlotClass<K extends RelationKind, S extends RelationSlot> =
  new (owner: Entity, relation: ResolvedOf<K>, stored?: DocumentValue) => S

function isRelationOfKind<K extends RelationKind>(relation: ResolvedRelation, kind: K): relation is ResolvedOf<K> {
  return relation.kind === kind
}

export class Entity {
  /** Issues found by the last validation */
  errors: ValidationIssue[] = []

  private attributes: RawDocument
  private stored: RawDocument | undefined
  private state: EntityState
  private slots = new Map<string, RelationSlot>()
  private link: EmbeddingLink | undefined

  constructor(readonly model: Model, init: EntityInit) {
    this.attributes = init.attributes
    this.link = init.link
    if (init.stored) {
      this.stored = cloneDocument(init.stored)
      this.state = 'persisted'
    } else {
      this.state = init.persisted ? 'persisted' : 'new'
    }
    this.loadEmbedded(init.embedded)
  }

  // ===========================================================================
  // Identity and state
  // ===========================================================================

  /**
   * Identifier. A derived identity is computed on first read once its source
   * field has a value, then kept. Other models get a generated id on first
   * read.
   */
  get id(): string | undefined {
    const current = this.attributes[ID_FIELD]
    if (typeof current === 'string') return current

    const from = this.model.schema.idFrom
    if (from !== undefined) {
      const source = this.attributes[from]
      const derived = typeof source === 'number' ? String(source) : source
      if (typeof derived !== 'string' || derived === '') return undefined
      this.attributes[ID_FIELD] = derived
      return derived
    }

    const generated = generateId()
    this.attributes[ID_FIELD] = generated
    return generated
  }

  /**
   * Identifier, or MissingIdentityError when it cannot be resolved yet
   */
  ensureId(): string {
    const id = this.id
    if (id === undefined) {
      const from = this.model.schema.idFrom
      throw new MissingIdentityError(this.model.name, from === undefined ? undefined : this.model.schema.table.aliasFor(from) ?? from)
    }
    return id
  }

  get isNew(): boolean {
    return this.state === 'new'
  }

  /** Stored, either in its own collection or inside its stored parent */
  get isPersisted(): boolean {
    return this.state === 'persisted'
  }

  get isDestroyed(): boolean {
    return this.state === 'destroyed'
  }

  get isEmbedded(): boolean {
    return this.link !== undefined
  }

  /** Embedding parent (lookup only) */
  get parent(): Entity | undefined {
    return this.link?.parent
  }

  /** Capability this entity is embedded as */
  get embeddedAs(): string | undefined {
    return this.link?.as
  }

  /** Relation on the parent holding this entity */
  get embeddedIn(): string | undefined {
    return this.link?.relation
  }

  /** Top-level entity whose document holds this one */
  get root(): Entity {
    return this.link ? this.link.parent.root : this
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  /**
   * Decoded value by raw key or alias; `undefined` when unset
   */
  get(name: string): unknown {
    if (name === ID_FIELD) return this.id
    return this.model.mapper.read(this.attributes, name)
  }

  /**
   * Write a value by raw key or alias. The value is normalized through the
   * field codec; `null` and `undefined` clear declared fields.
   *
   * @throws MalformedDocumentError when the codec rejects the value
   */
  set(name: string, value: unknown): this {
    if (this.model.schema.relation(name) !== undefined) {
      throw new RelationshipError(this.model.name, name, 'is a relation; use its accessor')
    }
    if (name === ID_FIELD) {
      this.setId(value)
      return this
    }
    const { key, value: normalized } = this.model.mapper.normalize(name, value)
    this.writeRaw(key, normalized)
    return this
  }

  /**
   * Mass assignment; each value goes through `set`
   */
  assign(input: Record<string, unknown>): this {
    for (const [name, value] of Object.entries(input)) {
      this.set(name, value)
    }
    return this
  }

  /**
   * Whether a value is stored under the name's key
   */
  has(name: string): boolean {
    const key = this.model.schema.table.keyFor(name)
    return this.attributes[key] !== undefined
  }

  /**
   * Stored form of a key, without decoding
   */
  raw(key: string): DocumentValue | undefined {
    return this.attributes[key]
  }

  /**
   * Write a stored value directly. Used for foreign keys and id arrays,
   * which have no codec.
   * @internal
   */
  writeRaw(key: string, value: DocumentValue | undefined): void {
    if (value === undefined) {
      delete this.attributes[key]
    } else {
      this.attributes[key] = value
    }
  }

  private setId(value: unknown): void {
    if (value !== undefined && value !== null && typeof value !== 'string') {
      throw new MalformedDocumentError(ID_FIELD, 'string', value)
    }
    const next = value ?? undefined
    if (!this.link && this.state !== 'new' && next !== this.attributes[ID_FIELD]) {
      throw new DocmapError(
        `Cannot change the ${ID_FIELD} of a stored ${this.model.name}`,
        ErrorCode.IMMUTABLE_FIELD,
        { model: this.model.name, id: this.attributes[ID_FIELD] }
      )
    }
    if (next !== undefined && next !== this.attributes[ID_FIELD]) this.assertUniqueAmongSiblings(next)
    this.writeRaw(ID_FIELD, next)
  }

  /**
   * @throws RelationshipError when another element of the same embed-many
   * already has `id`
   */
  private assertUniqueAmongSiblings(id: string): void {
    const link = this.link
    if (!link || link.parent.model.relation(link.relation).kind !== 'embed-many') return
    const siblings = link.parent.embedMany(link.relation).all()
    if (siblings.some(sibling => sibling !== this && sibling.id === id)) {
      throw new RelationshipError(
        link.parent.model.name,
        link.relation,
        `duplicate embedded ${ID_FIELD} "${id}"`,
        ErrorCode.DUPLICATE_EMBEDDED_ID,
        { id }
      )
    }
  }

  // ===========================================================================
  // Relations
  // ===========================================================================

  embedOne(name: string): EmbedOneSlot {
    return this.slot(name, 'embed-one', EmbedOneSlot)
  }

  embedMany(name: string): EmbedManySlot {
    return this.slot(name, 'embed-many', EmbedManySlot)
  }

  refOne(name: string): RefOneSlot {
    return this.slot(name, 'ref-one', RefOneSlot)
  }

  refMany(name: string): RefManySlot {
    return this.slot(name, 'ref-many', RefManySlot)
  }

  manyToMany(name: string): ManyToManySlot {
    return this.slot(name, 'many-to-many', ManyToManySlot)
  }

  embeddedRefs(name: string): EmbeddedRefSlot {
    return this.slot(name, 'embedded-ref', EmbeddedRefSlot)
  }

  /**
   * Slots created so far
   * @internal
   */
  loadedSlots(): RelationSlot[] {
    return Array.from(this.slots.values())
  }

  /**
   * Embedded entities of every created embed slot
   * @internal
   */
  embeddedChildren(): Entity[] {
    const children: Entity[] = []
    for (const slot of this.slots.values()) {
      if (slot instanceof EmbedOneSlot || slot instanceof EmbedManySlot) {
        children.push(...slot.children())
      }
    }
    return children
  }

  private slot<K extends RelationKind, S extends RelationSlot>(name: string, kind: K, Slot: SlotClass<K, S>): S {
    const existing = this.slots.get(name)
    if (existing instanceof Slot) return existing

    const relation = this.model.relation(name)
    if (!isRelationOfKind(relation, kind)) {
      throw new RelationshipError(this.model.name, name, `is a ${relation.kind} relation, not ${kind}`)
    }
    const created = new Slot(this, relation)
    this.slots.set(name, created)
    return created
  }

  private loadEmbedded(embedded: Map<string, DocumentValue> | undefined): void {
    if (!embedded) return
    for (const [name, raw] of embedded) {
      const relation = this.model.relation(name)
      if (relation.kind === 'embed-one') {
        this.slots.set(name, new EmbedOneSlot(this, relation, raw))
      } else if (relation.kind === 'embed-many') {
        this.slots.set(name, new EmbedManySlot(this, relation, raw))
      }
    }
  }

  // ===========================================================================
  // Embedding
  // ===========================================================================

  /** @internal */
  attach(link: EmbeddingLink): void {
    if (this.link && this.link.parent !== link.parent) {
      throw new RelationshipError(
        link.parent.model.name,
        link.relation,
        `${this.model.name} is already embedded in ${this.link.parent.model.name}`
      )
    }
    this.link = link
  }

  /** @internal */
  detach(): void {
    this.link = undefined
  }

  /**
   * Dotted path of this entity inside its root document, '' for the root
   * @internal
   */
  documentPath(): string {
    const link = this.link
    if (!link) return ''
    const relation = link.parent.model.relation(link.relation)
    if (!isEmbedded(relation)) return ''

    let segment = relation.documentKey
    if (relation.kind === 'embed-many') {
      segment = `${segment}.${link.parent.embedMany(link.relation).indexOf(this)}`
    }
    const parentPath = link.parent.documentPath()
    return parentPath ? `${parentPath}.${segment}` : segment
  }

  // ===========================================================================
  // Documents
  // ===========================================================================

  /**
   * Document form of this entity and its embedded values
   *
   * Embedded values whose derived identity is still unresolved are written
   * without `_id`.
   */
  toDocument(): RawDocument {
    const attributes: RawDocument = { ...this.attributes }
    const id = this.id
    if (id !== undefined) attributes[ID_FIELD] = id

    const embedded = new Map<string, DocumentValue>()
    for (const [name, slot] of this.slots) {
      if (slot instanceof EmbedOneSlot || slot instanceof EmbedManySlot) {
        const value = slot.serialize()
        if (value !== undefined) embedded.set(name, value)
      }
    }
    return cloneDocument(this.model.mapper.compose(attributes, embedded))
  }

  toJSON(): RawDocument {
    return this.toDocument()
  }

  /**
   * Last document known to be stored
   * @internal
   */
  storedDocument(): RawDocument | undefined {
    return this.stored
  }

  /**
   * Record that `doc` is now the stored document; embedded values become
   * persisted with it
   * @internal
   */
  markPersisted(doc?: RawDocument): void {
    if (doc) this.stored = cloneDocument(doc)
    this.state = 'persisted'
    for (const slot of this.slots.values()) {
      slot.markPersisted()
    }
  }

  /** @internal */
  markDestroyed(): void {
    this.state = 'destroyed'
  }

  /**
   * Apply an update already sent to the store to the stored document
   * @internal
   */
  recordWrite(update: UpdateSpec): void {
    const root = this.root
    root.stored = applyUpdate(root.stored ?? {}, update)
  }

  /**
   * Apply a top-level update already sent to the store to both the
   * attributes and the stored document
   * @internal
   */
  absorb(update: UpdateSpec): void {
    this.attributes = applyUpdate(this.attributes, update)
    this.recordWrite(update)
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  /**
   * Check declared constraints here and in embedded values. Issues are kept
   * in `errors`.
   *
   * @throws ValidationError in 'strict' mode
   */
  validate(mode: ValidationMode = 'collect'): ValidationIssue[] {
    const validator = new SchemaValidator(this.model.schema, { mode, logger: this.model.context.logger })
    this.errors = validator.validate(this.attributes, this.nestedIssues())
    return this.errors
  }

  isValid(): boolean {
    return this.validate().length === 0
  }

  private nestedIssues(): ValidationIssue[] {
    const issues: ValidationIssue[] = []
    for (const [name, slot] of this.slots) {
      if (!(slot instanceof EmbedOneSlot || slot instanceof EmbedManySlot)) continue
      for (const child of slot.children()) {
        for (const issue of child.validate()) {
          issues.push({ field: `${name}.${issue.field}`, message: issue.message })
        }
      }
    }
    return issues
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Validate and store. Embedded entities save through their root.
   *
   * @returns false when validation collected issues (see `errors`)
   */
  async save(options: SaveOptions = {}): Promise<boolean> {
    const root = this.root
    if (root !== this) return root.save(options)
    return saveEntity(this, options)
  }

  /**
   * Save, throwing ValidationError instead of returning false
   */
  async saveStrict(): Promise<this> {
    await this.save({ validate: 'strict' })
    return this
  }

  /**
   * Remove with lifecycle observers and cascade policies. An embedded entity
   * is removed from its parent.
   */
  async destroy(): Promise<void> {
    if (this.link) {
      await removeEmbedded(this, { notify: true })
      return
    }
    await destroyEntity(this)
  }

  /**
   * Raw removal: no observers, no cascades
   */
  async delete(): Promise<void> {
    if (this.link) {
      await removeEmbedded(this, { notify: false })
      return
    }
    await deleteEntity(this)
  }

  /**
   * Replace in-memory state with the stored document
   *
   * @throws EntityNotFoundError when the document no longer exists
   */
  async reload(): Promise<this> {
    if (this.link) {
      throw new RelationshipError(this.model.name, this.link.relation, 'embedded entities reload through their parent')
    }
    const id = this.ensureId()
    const doc = await this.model.context.store.findOne(this.model.collection, { [ID_FIELD]: id })
    if (!doc) {
      throw new EntityNotFoundError(this.model.name, id)
    }
    const loaded = this.model.mapper.load(doc)
    this.attributes = loaded.attributes
    this.slots.clear()
    this.stored = cloneDocument(doc)
    this.state = 'persisted'
    this.errors = []
    this.loadEmbedded(loaded.embedded)
    return this
  }
}

/**
 * Document Mapper
 *
 * Converts between entity attributes and raw documents for one model.
 * Attributes are held in canonical document form keyed by raw document key;
 * reads decode through the field codec and writes normalize through it, so an
 * alias and its raw key always address the same stored value.
 *
 * @module mapper/document-mapper
 */

import type { ModelSchema } from '../schema/model'
import type { DocumentValue, RawDocument } from '../types/document'
import type { UpdateSpec } from '../types/update'
import { ID_FIELD, isDocumentValue } from '../types/document'
import { deepEqual } from '../utils/comparison'
import { MalformedDocumentError } from '../errors'

/**
 * Result of splitting a stored document
 */
export interface LoadedDocument {
  /** Field values (canonicalized), foreign keys and unknown keys */
  attributes: RawDocument
  /** Raw embedded values by relation name */
  embedded: Map<string, DocumentValue>
}

export class DocumentMapper {
  constructor(readonly schema: ModelSchema) {}

  /**
   * Decoded value of an attribute, `undefined` when unset or null
   */
  read(attributes: RawDocument, name: string): unknown {
    const key = this.schema.table.keyFor(name)
    const raw = attributes[key]
    if (raw === undefined || raw === null) return undefined
    const descriptor = this.schema.table.get(key)
    return descriptor ? descriptor.codec.decode(raw, key) : raw
  }

  /**
   * Canonical document form of a write. A `value` of `undefined` clears the
   * attribute.
   *
   * @throws MalformedDocumentError when the codec rejects the input
   */
  normalize(name: string, input: unknown): { key: string; value: DocumentValue | undefined } {
    const key = this.schema.table.keyFor(name)
    const descriptor = this.schema.table.get(key)
    if (descriptor) {
      return { key, value: descriptor.codec.normalize(input, key) }
    }
    if (input === undefined) return { key, value: undefined }
    if (!isDocumentValue(input)) {
      throw new MalformedDocumentError(key, 'document value', input)
    }
    return { key, value: input }
  }

  /**
   * Static defaults in document form. Factories run once per call.
   */
  defaults(): RawDocument {
    const out: RawDocument = {}
    for (const descriptor of this.schema.table.descriptors()) {
      const fallback = descriptor.default
      if (fallback === undefined) continue
      const value: unknown = typeof fallback === 'function' ? fallback() : fallback
      const normalized = descriptor.codec.normalize(value, descriptor.key)
      if (normalized !== undefined) out[descriptor.key] = normalized
    }
    return out
  }

  /**
   * Split and decode a stored document
   *
   * Every known field is decoded so corrupt values fail here rather than on
   * first read. Unknown keys are kept verbatim.
   *
   * @throws MalformedDocumentError naming the first field that does not decode
   */
  load(raw: RawDocument): LoadedDocument {
    const attributes: RawDocument = {}
    const embedded = new Map<string, DocumentValue>()

    for (const [key, value] of Object.entries(raw)) {
      const relation = this.schema.embeddedRelationAt(key)
      if (relation !== undefined) {
        embedded.set(relation, value)
        continue
      }
      const descriptor = this.schema.table.get(key)
      if (descriptor && value !== null && descriptor.key === key) {
        attributes[key] = descriptor.codec.encode(descriptor.codec.decode(value, key))
      } else {
        attributes[key] = value
      }
    }

    return { attributes, embedded }
  }

  /**
   * Assemble a document: `_id` first, then attributes, then embedded values
   */
  compose(attributes: RawDocument, embedded: Map<string, DocumentValue>): RawDocument {
    const doc: RawDocument = {}
    const id = attributes[ID_FIELD]
    if (id !== undefined) doc[ID_FIELD] = id
    for (const [key, value] of Object.entries(attributes)) {
      if (key !== ID_FIELD) doc[key] = value
    }
    for (const [relation, value] of embedded) {
      doc[this.schema.documentKeyOf(relation)] = value
    }
    return doc
  }

  /**
   * Top-level `$set` / `$unset` turning `previous` into `next`, or
   * `undefined` when nothing changed
   */
  diff(previous: RawDocument, next: RawDocument): UpdateSpec | undefined {
    const $set: Record<string, DocumentValue> = {}
    const $unset: Record<string, true> = {}

    for (const [key, value] of Object.entries(next)) {
      if (key === ID_FIELD) continue
      if (!(key in previous) || !deepEqual(previous[key], value)) $set[key] = value
    }
    for (const key of Object.keys(previous)) {
      if (key !== ID_FIELD && !(key in next)) $unset[key] = true
    }

    const update: UpdateSpec = {}
    if (Object.keys($set).length > 0) update.$set = $set
    if (Object.keys($unset).length > 0) update.$unset = $unset
    return update.$set || update.$unset ? update : undefined
  }
}

/**
 * Codec types
 *
 * A codec converts between a typed in-memory value and the document primitive
 * a store holds. Attribute values are kept in document form on the entity, so
 * `normalize` runs on writes and `decode` runs on reads.
 *
 * @module codecs/types
 */

import type { DocumentValue } from '../types/document'

/**
 * Bidirectional converter for one value type
 *
 * Contract:
 * - `decode(encode(v))` equals `v` for every canonical `v`
 * - `normalize(normalize(x))` equals `normalize(x)`
 * - `decode` never substitutes a default for a malformed value
 */
export interface Codec<T> {
  /** Registry name, e.g. 'measurement' */
  readonly name: string

  /** Typed value to document form */
  encode(value: T): DocumentValue

  /**
   * Document form to typed value
   *
   * @throws MalformedDocumentError naming the field and expected shape
   */
  decode(raw: DocumentValue, field: string): T

  /**
   * Converge loose input (typed value, raw primitive, partial input) to the
   * canonical document form. `null` and `undefined` clear the field.
   *
   * @throws MalformedDocumentError when the input cannot be converted
   */
  normalize(input: unknown, field: string): DocumentValue | undefined

  /** Whether a value is already the typed in-memory form */
  is(value: unknown): value is T
}

/** A codec of any value type, as held by a registry */
export type AnyCodec = Codec<unknown>

/** Value type carried by a codec */
export type CodecValue<C> = C extends Codec<infer T> ? T : never

/**
 * Built-in codecs for scalar, array and object fields
 *
 * @module codecs/builtin
 */

import type { Codec } from './types'
import type { DocumentValue, RawDocument } from '../types/document'
import { isDocumentValue, isRawDocument } from '../types/document'
import { MalformedDocumentError } from '../errors'

// =============================================================================
// Scalars
// =============================================================================

export const stringCodec: Codec<string> = {
  name: 'string',
  encode: value => value,
  decode(raw, field) {
    if (typeof raw !== 'string') throw new MalformedDocumentError(field, 'string', raw)
    return raw
  },
  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    if (typeof input === 'string') return input
    if (typeof input === 'number' || typeof input === 'boolean') return String(input)
    throw new MalformedDocumentError(field, 'string', input)
  },
  is: (value): value is string => typeof value === 'string',
}

export const integerCodec: Codec<number> = {
  name: 'integer',
  encode: value => Math.trunc(value),
  decode(raw, field) {
    if (typeof raw !== 'number' || !Number.isInteger(raw)) {
      throw new MalformedDocumentError(field, 'integer', raw)
    }
    return raw
  },
  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    const n = toNumber(input)
    if (n === undefined) throw new MalformedDocumentError(field, 'integer', input)
    return Math.trunc(n)
  },
  is: (value): value is number => typeof value === 'number' && Number.isInteger(value),
}

export const numberCodec: Codec<number> = {
  name: 'number',
  encode: value => value,
  decode(raw, field) {
    if (typeof raw !== 'number' || !Number.isFinite(raw)) {
      throw new MalformedDocumentError(field, 'number', raw)
    }
    return raw
  },
  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    const n = toNumber(input)
    if (n === undefined) throw new MalformedDocumentError(field, 'number', input)
    return n
  },
  is: (value): value is number => typeof value === 'number' && Number.isFinite(value),
}

export const booleanCodec: Codec<boolean> = {
  name: 'boolean',
  encode: value => value,
  decode(raw, field) {
    if (typeof raw !== 'boolean') throw new MalformedDocumentError(field, 'boolean', raw)
    return raw
  },
  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    if (typeof input === 'boolean') return input
    if (input === 'true' || input === 1) return true
    if (input === 'false' || input === 0) return false
    throw new MalformedDocumentError(field, 'boolean', input)
  },
  is: (value): value is boolean => typeof value === 'boolean',
}

export const dateCodec: Codec<Date> = {
  name: 'date',
  encode: value => new Date(value.getTime()),
  decode(raw, field) {
    if (!(raw instanceof Date) || Number.isNaN(raw.getTime())) {
      throw new MalformedDocumentError(field, 'date', raw)
    }
    return new Date(raw.getTime())
  },
  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    const date =
      input instanceof Date ? new Date(input.getTime())
      : typeof input === 'string' || typeof input === 'number' ? new Date(input)
      : undefined
    if (!date || Number.isNaN(date.getTime())) {
      throw new MalformedDocumentError(field, 'date', input)
    }
    return date
  },
  is: (value): value is Date => value instanceof Date && !Number.isNaN(value.getTime()),
}

// =============================================================================
// Collections
// =============================================================================

/**
 * Options for array codecs
 */
export interface ArrayCodecOptions {
  /** Accept a delimited string and split it into trimmed, non-empty items */
  split?: boolean
  /** Delimiter used when splitting (default ',') */
  separator?: string
}

/**
 * Create an array codec
 *
 * @example
 * const genres = createArrayCodec({ split: true })
 * genres.normalize('Drama, Sport', 'genres') // ['Drama', 'Sport']
 */
export function createArrayCodec(options: ArrayCodecOptions = {}): Codec<DocumentValue[]> {
  const separator = options.separator ?? ','
  return {
    name: options.split ? 'list' : 'array',
    encode: value => [...value],
    decode(raw, field) {
      if (!Array.isArray(raw)) throw new MalformedDocumentError(field, 'array', raw)
      return [...raw]
    },
    normalize(input, field) {
      if (input === null || input === undefined) return undefined
      if (typeof input === 'string' && options.split) {
        return input.split(separator).map(s => s.trim()).filter(s => s.length > 0)
      }
      if (Array.isArray(input) && input.every(isDocumentValue)) return [...input]
      throw new MalformedDocumentError(field, 'array', input)
    },
    is: (value): value is DocumentValue[] => Array.isArray(value),
  }
}

export const arrayCodec = createArrayCodec()

/** Array codec that also accepts comma-separated strings */
export const listCodec = createArrayCodec({ split: true })

export const objectCodec: Codec<RawDocument> = {
  name: 'object',
  encode: value => ({ ...value }),
  decode(raw, field) {
    if (!isRawDocument(raw)) throw new MalformedDocumentError(field, 'object', raw)
    return { ...raw }
  },
  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    if (isRawDocument(input)) return { ...input }
    throw new MalformedDocumentError(field, 'object', input)
  },
  is: (value): value is RawDocument => isRawDocument(value),
}

// =============================================================================
// Helpers
// =============================================================================

function toNumber(input: unknown): number | undefined {
  if (typeof input === 'number') return Number.isFinite(input) ? input : undefined
  if (typeof input === 'string' && input.trim() !== '') {
    const n = Number(input)
    return Number.isFinite(n) ? n : undefined
  }
  return undefined
}

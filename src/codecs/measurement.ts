/**
 * Measurement value type
 *
 * An amount with optional units. Lengths given in meters are held in feet.
 *
 * @module codecs/measurement
 */

import type { Codec } from './types'
import type { RawDocument } from '../types/document'
import { isPlainObject } from '../utils/comparison'
import { MalformedDocumentError } from '../errors'

/** Meters in one foot */
export const METERS_PER_FOOT = 0.3048

export class Measurement {
  readonly amount: number
  readonly units: string | undefined

  constructor(amount: number, units?: string) {
    if (units === 'meters') {
      this.amount = amount / METERS_PER_FOOT
      this.units = 'feet'
    } else {
      this.amount = amount
      this.units = units
    }
  }

  /**
   * @example
   * new Measurement(136, 'min').toString() // '136 (min)'
   */
  toString(): string {
    return this.units !== undefined ? `${this.amount} (${this.units})` : `${this.amount}`
  }

  equals(other: Measurement): boolean {
    return this.amount === other.amount && this.units === other.units
  }

  /** Document form: `{ amount, units? }` */
  toDocument(): RawDocument {
    return this.units !== undefined
      ? { amount: this.amount, units: this.units }
      : { amount: this.amount }
  }
}

function parseAmount(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? n : undefined
  }
  return undefined
}

export const measurementCodec: Codec<Measurement> = {
  name: 'measurement',

  encode: value => value.toDocument(),

  decode(raw, field) {
    if (!isPlainObject(raw) || typeof raw.amount !== 'number') {
      throw new MalformedDocumentError(field, '{ amount: number, units?: string }', raw)
    }
    const units = raw.units
    if (units !== undefined && units !== null && typeof units !== 'string') {
      throw new MalformedDocumentError(`${field}.units`, 'string', units)
    }
    return new Measurement(raw.amount, units ?? undefined)
  },

  normalize(input, field) {
    if (input === null || input === undefined) return undefined
    if (input instanceof Measurement) return input.toDocument()
    if (typeof input === 'number') return new Measurement(input).toDocument()
    if (isPlainObject(input)) {
      const amount = parseAmount(input.amount)
      const units = input.units
      if (amount !== undefined && (units === undefined || units === null || typeof units === 'string')) {
        return new Measurement(amount, units ?? undefined).toDocument()
      }
    }
    throw new MalformedDocumentError(field, 'measurement', input)
  },

  is: (value): value is Measurement => value instanceof Measurement,
}

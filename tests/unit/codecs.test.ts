/**
 * Codec Tests
 *
 * Built-in codecs, the Measurement and Point value types, and the registry.
 */

import { describe, it, expect } from 'vitest'
import {
  booleanCodec,
  dateCodec,
  integerCodec,
  listCodec,
  arrayCodec,
  numberCodec,
  objectCodec,
  stringCodec,
} from '../../src/codecs/builtin'
import { Measurement, measurementCodec, METERS_PER_FOOT } from '../../src/codecs/measurement'
import { Point, pointCodec } from '../../src/codecs/point'
import { CodecRegistry, createDefaultCodecRegistry } from '../../src/codecs/registry'
import type { Codec } from '../../src/codecs/types'
import { ConfigurationError, ErrorCode, MalformedDocumentError } from '../../src/errors'

// =============================================================================
// Measurement
// =============================================================================

describe('Measurement', () => {
  it('converts meters to feet at construction', () => {
    const height = new Measurement(10, 'meters')
    expect(height.amount).toBeCloseTo(32.8084, 4)
    expect(height.units).toBe('feet')
  })

  it('keeps other units as given', () => {
    const runtime = new Measurement(136, 'min')
    expect(runtime.amount).toBe(136)
    expect(runtime.units).toBe('min')
  })

  it('formats with and without units', () => {
    expect(new Measurement(136, 'min').toString()).toBe('136 (min)')
    expect(new Measurement(5).toString()).toBe('5')
  })

  it('compares by amount and units', () => {
    expect(new Measurement(1, 'feet').equals(new Measurement(METERS_PER_FOOT, 'meters'))).toBe(true)
    expect(new Measurement(1, 'feet').equals(new Measurement(1))).toBe(false)
  })
})

describe('measurementCodec', () => {
  it('normalizes every input form to the same document', () => {
    const expected = { amount: 136, units: 'min' }
    expect(measurementCodec.normalize(new Measurement(136, 'min'), 'runtime')).toEqual(expected)
    expect(measurementCodec.normalize({ amount: 136, units: 'min' }, 'runtime')).toEqual(expected)
    expect(measurementCodec.normalize({ amount: '136', units: 'min' }, 'runtime')).toEqual(expected)
  })

  it('normalizes a bare number without units', () => {
    expect(measurementCodec.normalize(42, 'height')).toEqual({ amount: 42 })
  })

  it('normalizes meters documents to feet', () => {
    const doc = measurementCodec.normalize({ amount: 0.3048, units: 'meters' }, 'height')
    expect(doc).toEqual({ amount: 1, units: 'feet' })
  })

  it('is idempotent', () => {
    const once = measurementCodec.normalize({ amount: 10, units: 'meters' }, 'height')
    expect(measurementCodec.normalize(once, 'height')).toEqual(once)
  })

  it('round-trips canonical values', () => {
    const value = new Measurement(72, 'in')
    expect(measurementCodec.decode(measurementCodec.encode(value), 'height').equals(value)).toBe(true)
  })

  it('clears on null and undefined', () => {
    expect(measurementCodec.normalize(null, 'height')).toBeUndefined()
    expect(measurementCodec.normalize(undefined, 'height')).toBeUndefined()
  })

  it('rejects a malformed document with the field and expected shape', () => {
    try {
      measurementCodec.decode({ amount: 'tall' }, 'height')
      expect.unreachable('decode should throw')
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedDocumentError)
      expect(error).toBeDocmapError(ErrorCode.MALFORMED_DOCUMENT)
      expect(error).toMatchObject({
        field: 'height',
        expected: '{ amount: number, units?: string }',
        actualType: 'object',
      })
    }
  })

  it('rejects non-string units', () => {
    expect(() => measurementCodec.decode({ amount: 1, units: 5 }, 'height')).toThrow(MalformedDocumentError)
  })

  it('rejects unconvertible input', () => {
    expect(() => measurementCodec.normalize('tall', 'height')).toThrow(MalformedDocumentError)
  })
})

// =============================================================================
// Point
// =============================================================================

describe('pointCodec', () => {
  const austin = { type: 'Point', coordinates: [-97.74, 30.27] }

  it('normalizes points, GeoJSON and lat/lng objects alike', () => {
    expect(pointCodec.normalize(new Point(-97.74, 30.27), 'geolocation')).toEqual(austin)
    expect(pointCodec.normalize(austin, 'geolocation')).toEqual(austin)
    expect(pointCodec.normalize({ lat: 30.27, lng: -97.74 }, 'geolocation')).toEqual(austin)
  })

  it('decodes to a Point', () => {
    const point = pointCodec.decode(austin, 'geolocation')
    expect(point).toBeInstanceOf(Point)
    expect(point.longitude).toBe(-97.74)
    expect(point.latitude).toBe(30.27)
  })

  it('rejects out-of-range coordinates', () => {
    expect(() => pointCodec.normalize({ lat: 91, lng: 0 }, 'geolocation')).toThrow(MalformedDocumentError)
    expect(() => new Point(181, 0)).toThrow(MalformedDocumentError)
  })

  it('rejects documents that are not GeoJSON points', () => {
    expect(() => pointCodec.decode({ lat: 1, lng: 2 }, 'geolocation')).toThrow(MalformedDocumentError)
  })
})

// =============================================================================
// Built-in scalar and collection codecs
// =============================================================================

describe('built-in codecs', () => {
  it('stringCodec converts numbers and booleans', () => {
    expect(stringCodec.normalize(1976, 'year')).toBe('1976')
    expect(stringCodec.normalize(true, 'flag')).toBe('true')
    expect(() => stringCodec.decode(5, 'title')).toThrow(MalformedDocumentError)
  })

  it('integerCodec truncates and parses', () => {
    expect(integerCodec.normalize('1976', 'year')).toBe(1976)
    expect(integerCodec.normalize(1976.9, 'year')).toBe(1976)
    expect(() => integerCodec.decode(1.5, 'year')).toThrow(MalformedDocumentError)
    expect(() => integerCodec.normalize('soon', 'year')).toThrow(MalformedDocumentError)
  })

  it('numberCodec rejects non-finite values', () => {
    expect(numberCodec.normalize('2.5', 'rating')).toBe(2.5)
    expect(() => numberCodec.normalize(Number.NaN, 'rating')).toThrow(MalformedDocumentError)
  })

  it('booleanCodec accepts common spellings', () => {
    expect(booleanCodec.normalize('true', 'flag')).toBe(true)
    expect(booleanCodec.normalize(0, 'flag')).toBe(false)
    expect(() => booleanCodec.normalize('maybe', 'flag')).toThrow(MalformedDocumentError)
  })

  it('dateCodec parses strings and copies dates', () => {
    const source = new Date('1976-11-21T00:00:00.000Z')
    const normalized = dateCodec.normalize(source, 'released')
    expect(normalized).toEqual(source)
    expect(normalized).not.toBe(source)
    expect(dateCodec.normalize('1976-11-21T00:00:00.000Z', 'released')).toEqual(source)
    expect(() => dateCodec.normalize('not a date', 'released')).toThrow(MalformedDocumentError)
  })

  it('listCodec splits delimited strings', () => {
    expect(listCodec.normalize('Drama, Sport,', 'genres')).toEqual(['Drama', 'Sport'])
    expect(listCodec.normalize(['Drama'], 'genres')).toEqual(['Drama'])
  })

  it('arrayCodec does not split strings', () => {
    expect(() => arrayCodec.normalize('Drama, Sport', 'genres')).toThrow(MalformedDocumentError)
  })

  it('objectCodec copies documents', () => {
    const doc = { a: 1 }
    const normalized = objectCodec.normalize(doc, 'meta')
    expect(normalized).toEqual({ a: 1 })
    expect(normalized).not.toBe(doc)
    expect(() => objectCodec.decode([1], 'meta')).toThrow(MalformedDocumentError)
  })
})

// =============================================================================
// Registry
// =============================================================================

describe('CodecRegistry', () => {
  const upperCodec: Codec<string> = {
    name: 'upper',
    encode: value => value,
    decode(raw, field) {
      if (typeof raw !== 'string') throw new MalformedDocumentError(field, 'string', raw)
      return raw
    },
    normalize: input => (typeof input === 'string' ? input.toUpperCase() : undefined),
    is: (value): value is string => typeof value === 'string',
  }

  it('holds the built-in codecs by default', () => {
    const registry = createDefaultCodecRegistry()
    expect(registry.names()).toEqual([
      'array', 'boolean', 'date', 'integer', 'list', 'measurement', 'number', 'object', 'point', 'string',
    ])
    expect(registry.get('measurement')).toBe(measurementCodec)
  })

  it('registers custom codecs', () => {
    const registry = new CodecRegistry().register(upperCodec)
    expect(registry.has('upper')).toBe(true)
    expect(registry.resolve('upper').normalize('pg', 'rated')).toBe('PG')
    expect(registry.resolve(upperCodec)).toBe(upperCodec)
  })

  it('refuses duplicate names', () => {
    const registry = new CodecRegistry().register(upperCodec)
    expect(() => registry.register(upperCodec)).toThrow(ConfigurationError)
  })

  it('reports unknown codecs', () => {
    try {
      new CodecRegistry().get('money')
      expect.unreachable('get should throw')
    } catch (error) {
      expect(error).toBeDocmapError(ErrorCode.UNKNOWN_CODEC)
    }
  })
})

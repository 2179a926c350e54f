/**
 * Codecs: conversion between typed values and document primitives
 *
 * @module codecs
 */

export type { Codec, AnyCodec, CodecValue } from './types'
export {
  stringCodec,
  integerCodec,
  numberCodec,
  booleanCodec,
  dateCodec,
  arrayCodec,
  listCodec,
  objectCodec,
  createArrayCodec,
  type ArrayCodecOptions,
} from './builtin'
export { Measurement, measurementCodec, METERS_PER_FOOT } from './measurement'
export { Point, pointCodec } from './point'
export { CodecRegistry, BUILTIN_CODECS, createDefaultCodecRegistry } from './registry'

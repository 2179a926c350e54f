/**
 * Filter translation tests
 */

import { describe, it, expect } from 'vitest'
import { createMovieDomain } from '../fixtures/movies'
import { normalizeOperand, translateFilter } from '../../src/query/translate'
import type { Filter } from '../../src/types/filter'
import { MalformedDocumentError } from '../../src/errors'

const { dm } = createMovieDomain()
const movie = dm.model('Movie').schema
const actor = dm.model('Actor').schema

describe('translateFilter', () => {
  it('maps aliases to stored keys', () => {
    expect(translateFilter(movie, { plot: 'A boxer' })).toEqual({ simple_plot: 'A boxer' })
    expect(translateFilter(actor, { birthName: 'Michael Sylvester Stallone' })).toEqual({
      birth_name: 'Michael Sylvester Stallone',
    })
  })

  it('normalizes operands of declared fields', () => {
    expect(translateFilter(movie, { year: '1976', runtime: 119 })).toEqual({ year: 1976, runtime: { amount: 119 } })
    expect(translateFilter(movie, { year: { $in: ['1976', 1995], $gt: '1900' } })).toEqual({
      year: { $in: [1976, 1995], $gt: 1900 },
    })
    expect(translateFilter(movie, { year: { $not: { $gte: '2000' } } })).toEqual({ year: { $not: { $gte: 2000 } } })
  })

  it('leaves null, patterns and unknown fields alone', () => {
    expect(translateFilter(movie, { year: null, title: /^Rock/, budget: '1M' })).toEqual({
      year: null,
      title: /^Rock/,
      budget: '1M',
    })
  })

  it('matches a scalar against a list field without splitting it', () => {
    expect(translateFilter(movie, { genres: 'Drama, Sport' })).toEqual({ genres: 'Drama, Sport' })
    expect(translateFilter(movie, { genres: ['Drama'] })).toEqual({ genres: ['Drama'] })
  })

  it('recurses into logical operators', () => {
    expect(translateFilter(movie, { $and: [{ plot: 'x' }], $not: { year: '1976' } })).toEqual({
      $and: [{ simple_plot: 'x' }],
      $not: { year: 1976 },
    })
  })

  it('rejects logical operators without sub-filters', () => {
    const key: string = '$and'
    const filter: Filter = { [key]: 'rated' }
    expect(() => translateFilter(movie, filter)).toThrow('$and expects an array of filters')
  })

  it('rejects malformed operands', () => {
    expect(() => translateFilter(movie, { year: 'nineteen' })).toThrow(MalformedDocumentError)
    expect(() => translateFilter(movie, { year: 'nineteen' })).toThrow(
      'Malformed value for field "year": expected integer, got string'
    )
  })
})

describe('normalizeOperand', () => {
  it('uses the codec of the stored key', () => {
    expect(normalizeOperand(movie, 'year', '2015')).toBe(2015)
    expect(normalizeOperand(movie, 'simple_plot', 'x')).toBe('x')
    expect(normalizeOperand(movie, 'missing', 'x')).toBe('x')
  })
})

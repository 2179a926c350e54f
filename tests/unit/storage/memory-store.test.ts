/**
 * MemoryDocumentStore Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryDocumentStore, indexName } from '../../../src/storage/MemoryDocumentStore'
import { ErrorCode, QueryError, StorageError } from '../../../src/errors'
import type { GeoJSONPoint } from '../../../src/types/filter'

function point(lng: number, lat: number): GeoJSONPoint {
  return { type: 'Point', coordinates: [lng, lat] }
}

describe('MemoryDocumentStore', () => {
  let store: MemoryDocumentStore

  beforeEach(async () => {
    store = new MemoryDocumentStore()
    await store.insert('movies', { _id: 'm1', title: 'Rocky', year: 1976, genres: ['Drama', 'Sport'] })
    await store.insert('movies', { _id: 'm2', title: 'Rocky II', year: 1979, genres: ['Drama'] })
    await store.insert('movies', { _id: 'm3', title: 'Creed', year: 2015, genres: ['Drama', 'Sport'] })
  })

  describe('insert', () => {
    it('requires a string _id', async () => {
      await expect(store.insert('movies', { title: 'Untitled' })).rejects.toThrow(StorageError)
    })

    it('rejects duplicate ids', async () => {
      await expect(store.insert('movies', { _id: 'm1', title: 'Again' })).rejects.toBeDocmapError(ErrorCode.DUPLICATE_KEY)
    })

    it('copies the document', async () => {
      const doc = { _id: 'm4', title: 'Rocky III' }
      await store.insert('movies', doc)
      doc.title = 'changed'
      expect(await store.findOne('movies', { _id: 'm4' })).toEqual({ _id: 'm4', title: 'Rocky III' })
    })
  })

  describe('find', () => {
    it('returns matches in insertion order', async () => {
      const docs = await store.findMany('movies', { genres: 'Sport' })
      expect(docs.map(doc => doc._id)).toEqual(['m1', 'm3'])
    })

    it('sorts and limits', async () => {
      const docs = await store.findMany('movies', {}, { sort: { year: -1 }, limit: 2 })
      expect(docs.map(doc => doc._id)).toEqual(['m3', 'm2'])
    })

    it('returns copies', async () => {
      const [doc] = await store.findMany('movies', { _id: 'm1' })
      if (doc) doc.title = 'changed'
      expect((await store.findOne('movies', { _id: 'm1' }))?.title).toBe('Rocky')
    })

    it('returns null and empty results for unknown collections', async () => {
      expect(await store.findOne('actors', {})).toBeNull()
      expect(await store.findMany('actors', {})).toEqual([])
      expect(await store.count('actors', {})).toBe(0)
    })
  })

  describe('update', () => {
    it('updates the first match only with updateOne', async () => {
      const result = await store.updateOne('movies', { genres: 'Drama' }, { $set: { rated: 'PG' } })
      expect(result).toEqual({ matchedCount: 1, modifiedCount: 1 })
      expect(await store.count('movies', { rated: 'PG' })).toBe(1)
      expect((await store.findOne('movies', { rated: 'PG' }))?._id).toBe('m1')
    })

    it('reports no modification when nothing changes', async () => {
      const result = await store.updateOne('movies', { _id: 'm1' }, { $set: { title: 'Rocky' } })
      expect(result).toEqual({ matchedCount: 1, modifiedCount: 0 })
    })

    it('updates every match with updateMany', async () => {
      const result = await store.updateMany('movies', { genres: 'Sport' }, { $addToSet: { genres: 'Boxing' } })
      expect(result).toEqual({ matchedCount: 2, modifiedCount: 2 })
      expect((await store.findOne('movies', { _id: 'm3' }))?.genres).toEqual(['Drama', 'Sport', 'Boxing'])
    })

    it('refuses to change _id', async () => {
      await expect(store.updateOne('movies', { _id: 'm1' }, { $set: { _id: 'other' } })).rejects.toThrow(
        'Cannot modify immutable field _id in movies'
      )
    })

    it('reports no match', async () => {
      expect(await store.updateOne('movies', { _id: 'nope' }, { $set: { a: 1 } })).toEqual({
        matchedCount: 0,
        modifiedCount: 0,
      })
    })
  })

  describe('delete', () => {
    it('deletes one or many', async () => {
      expect(await store.deleteOne('movies', { genres: 'Sport' })).toEqual({ deletedCount: 1 })
      expect(await store.findOne('movies', { _id: 'm1' })).toBeNull()
      expect(await store.deleteMany('movies', { genres: 'Drama' })).toEqual({ deletedCount: 2 })
      expect(await store.count('movies', {})).toBe(0)
    })
  })

  describe('indexes', () => {
    it('names indexes by field and direction', async () => {
      expect(indexName({ fields: { year: 1, title: -1 } })).toBe('year_1_title_-1')
      expect(await store.createIndex('movies', { fields: { year: 1 } })).toBe('year_1')
      expect(await store.createIndex('movies', { fields: { year: 1 } })).toBe('year_1')
      expect(store.listIndexes('movies')).toEqual(['year_1'])
    })

    it('enforces unique indexes once created', async () => {
      await store.insert('movies', { _id: 'm4', title: 'Rocky' })
      await store.deleteOne('movies', { _id: 'm4' })
      await store.createIndex('movies', { fields: { title: 1 }, unique: true, name: 'title_unique' })
      await expect(store.insert('movies', { _id: 'm5', title: 'Rocky' })).rejects.toThrow(
        'Duplicate key for unique index title_unique in movies'
      )
      await expect(store.updateOne('movies', { _id: 'm2' }, { $set: { title: 'Creed' } })).rejects.toThrow(StorageError)
    })

    it('clears documents and indexes', async () => {
      await store.createIndex('movies', { fields: { year: 1 } })
      store.clear()
      expect(await store.count('movies', {})).toBe(0)
      expect(store.listIndexes('movies')).toEqual([])
    })
  })

  describe('proximity', () => {
    beforeEach(async () => {
      // Along the equator, one degree of longitude is about 111 km
      await store.insert('places', { _id: 'far', spot: point(2, 0) })
      await store.insert('places', { _id: 'near', spot: point(0.5, 0) })
      await store.insert('places', { _id: 'none', name: 'no point' })
      await store.insert('places', { _id: 'mid', spot: point(1, 0) })
    })

    it('requires a 2dsphere index', async () => {
      try {
        await store.findMany('places', { spot: { $near: { $geometry: point(0, 0) } } })
        expect.unreachable('findMany should throw')
      } catch (error) {
        expect(error).toBeInstanceOf(QueryError)
        expect(error).toBeDocmapError(ErrorCode.INDEX_NOT_FOUND)
      }
    })

    it('orders results nearest first', async () => {
      await store.createIndex('places', { fields: { spot: '2dsphere' } })
      const docs = await store.findMany('places', { spot: { $near: { $geometry: point(0, 0) } } })
      expect(docs.map(doc => doc._id)).toEqual(['near', 'mid', 'far'])
    })

    it('bounds by distance', async () => {
      await store.createIndex('places', { fields: { spot: '2dsphere' } })
      const filter = { spot: { $near: { $geometry: point(0, 0), $maxDistance: 150_000 } } }
      expect((await store.findMany('places', filter)).map(doc => doc._id)).toEqual(['near', 'mid'])
      expect(await store.count('places', filter)).toBe(2)
      const ring = { spot: { $near: { $geometry: point(0, 0), $minDistance: 100_000, $maxDistance: 150_000 } } }
      expect((await store.findMany('places', ring)).map(doc => doc._id)).toEqual(['mid'])
    })
  })
})

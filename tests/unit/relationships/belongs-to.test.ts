/**
 * Ref-one Slot Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createMovieDomain } from '../../fixtures/movies'
import { belongsTo, field } from '../../../src/schema/types'
import { RelationshipError } from '../../../src/errors'
import type { Logger } from '../../../src/utils/logger'

afterEach(() => {
  vi.useRealTimers()
  vi.restoreAllMocks()
})

describe('RefOneSlot', () => {
  it('issues no query while the key is unset', async () => {
    const { Movie, store } = createMovieDomain()
    const findOne = vi.spyOn(store, 'findOne')
    const slot = Movie.build({ title: 'Rocky' }).refOne('director')

    expect(slot.status).toBe('absent')
    expect(await slot.get()).toBeUndefined()
    expect(findOne).not.toHaveBeenCalled()
  })

  it('stores the target id under the foreign key', async () => {
    const { Movie, Director, store } = createMovieDomain()
    const director = await Director.create({ _id: 'd1', name: 'John G. Avildsen' })
    const movie = Movie.build({ _id: 'm1', title: 'Rocky' })

    movie.refOne('director').assign(director)
    expect(movie.raw('director_id')).toBe('d1')
    expect(movie.refOne('director').status).toBe('built')

    await movie.save()
    expect(movie.refOne('director').status).toBe('attached')
    expect((await store.findOne('movies', { _id: 'm1' }))?.director_id).toBe('d1')
  })

  it('reads the target once per key value', async () => {
    const { Movie, Director, store } = createMovieDomain()
    await Director.create({ _id: 'd1', name: 'John G. Avildsen' })
    await Director.create({ _id: 'd2', name: 'Ryan Coogler' })
    await store.insert('movies', { _id: 'm1', title: 'Rocky', director_id: 'd1' })
    const movie = await Movie.find('m1')
    const slot = movie.refOne('director')
    expect(slot.status).toBe('unloaded')

    const findOne = vi.spyOn(store, 'findOne')
    const first = await slot.get()
    const second = await slot.get()
    expect(first?.get('name')).toBe('John G. Avildsen')
    expect(second).toBe(first)
    expect(findOne).toHaveBeenCalledTimes(1)

    movie.set('director_id', 'd2')
    expect(slot.status).toBe('unloaded')
    expect((await slot.get())?.id).toBe('d2')
    expect(findOne).toHaveBeenCalledTimes(2)
  })

  it('returns undefined for a dangling key', async () => {
    const { Movie, store } = createMovieDomain()
    await store.insert('movies', { _id: 'm1', title: 'Rocky', director_id: 'gone' })
    const slot = (await Movie.find('m1')).refOne('director')
    expect(await slot.get()).toBeUndefined()
    expect(slot.status).toBe('absent')
  })

  it('clears to null', async () => {
    const { Movie, Director, store } = createMovieDomain()
    const director = await Director.create({ name: 'John G. Avildsen' })
    const movie = Movie.build({ _id: 'm1', title: 'Rocky' })
    movie.refOne('director').assign(director)
    await movie.save()

    movie.refOne('director').assign(null)
    expect(movie.refOne('director').status).toBe('removed')
    await movie.save()
    expect((await store.findOne('movies', { _id: 'm1' }))?.director_id).toBeNull()
  })

  it('checks the target model', async () => {
    const { Movie, Writer } = createMovieDomain()
    const movie = Movie.build({ title: 'Rocky' })
    expect(() => movie.refOne('director').assign(Writer.build({ name: 'Sylvester Stallone' }))).toThrow(
      'Movie.director: expected Director, got Writer'
    )
  })

  it('can hold the reference in an embedded _id', async () => {
    const { Movie, Director } = createMovieDomain()
    const director = await Director.create({ _id: 'd1', name: 'John G. Avildsen' })
    const movie = Movie.build({ title: 'Rocky' })
    const ref = movie.embedOne('directorRef').build({ name: 'John G. Avildsen' })

    ref.refOne('director').assign(director)
    expect(ref.id).toBe('d1')
    expect(movie.toDocument().director_ref).toEqual({ _id: 'd1', name: 'John G. Avildsen' })
    expect((await ref.refOne('director').get())?.get('name')).toBe('John G. Avildsen')

    expect(() => ref.refOne('director').assign(null)).toThrow(RelationshipError)
  })

  describe('touch', () => {
    it("sets the target's updated_at when the holder is saved", async () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date('2024-01-01T00:00:00Z'))
      const { Movie, Director, store } = createMovieDomain()
      const director = await Director.create({ _id: 'd1', name: 'John G. Avildsen' })

      vi.setSystemTime(new Date('2024-03-01T00:00:00Z'))
      const movie = Movie.build({ title: 'Rocky' })
      movie.refOne('director').assign(director)
      await movie.save()

      expect((await store.findOne('directors', { _id: 'd1' }))?.updated_at).toEqual(new Date('2024-03-01T00:00:00Z'))
      expect(director.get('updated_at')).toEqual(new Date('2024-03-01T00:00:00Z'))
      expect(director.get('created_at')).toEqual(new Date('2024-01-01T00:00:00Z'))
    })

    it('skips targets without timestamps', async () => {
      const debug = vi.fn()
      const logger: Logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const { dm, Writer, store } = createMovieDomain({ logger })
      const Draft = dm.define({
        name: 'Draft',
        fields: { title: field('string') },
        relations: { author: belongsTo('Writer', { touch: true }) },
      })
      await Writer.create({ _id: 'w1', name: 'Sylvester Stallone' })
      const draft = Draft.build({ title: 'Rocky' })
      draft.set('author_id', 'w1')
      const updateOne = vi.spyOn(store, 'updateOne')

      await draft.save()
      expect(updateOne).not.toHaveBeenCalled()
      expect(debug).toHaveBeenCalledWith('Not touching Writer w1: model has no timestamps')
    })
  })
})

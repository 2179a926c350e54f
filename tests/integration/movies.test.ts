/**
 * Movie catalog integration tests
 *
 * Several models working together through one MemoryDocumentStore: a movie
 * embeds its cast and location, references its director, shares writers
 * and is found again by the actors it embeds.
 */

import { describe, it, expect } from 'vitest'
import { createMovieDomain, type MovieDomain } from '../fixtures/movies'
import { Reconciler } from '../../src/repair'
import { CascadeRestrictedError, ErrorCode, ValidationError } from '../../src/errors'

async function castAndCrew(domain: MovieDomain) {
  const { Actor, Director } = domain
  const stallone = await Actor.create({ _id: 'a1', name: 'Sylvester Stallone' })
  const shire = await Actor.create({ _id: 'a2', name: 'Talia Shire' })
  const director = await Director.create({ _id: 'd1', name: 'John G. Avildsen' })
  return { stallone, shire, director }
}

async function saveRocky(domain: MovieDomain) {
  const { Movie, Writer } = domain
  const crew = await castAndCrew(domain)
  const rocky = Movie.build({
    _id: 'm1',
    title: 'Rocky',
    year: 1976,
    runtime: { amount: 119, units: 'min' },
    genres: 'Drama, Sport',
    plot: 'A small-time boxer gets a title shot.',
  })
  rocky.refOne('director').assign(crew.director)
  const roles = rocky.embedMany('roles')
  roles.build({ _id: 'a1', character: 'Rocky Balboa' })
  roles.build({ _id: 'a2', character: 'Adrian' })
  rocky.manyToMany('writers').append(Writer.build({ _id: 'w1', name: 'Sylvester Stallone' }))
  rocky.embedOne('location').build({ city: 'Philadelphia', state: 'PA' })
  expect(await rocky.save()).toBe(true)
  return { ...crew, rocky }
}

describe('movie catalog', () => {
  it('stores a movie with everything it embeds and references', async () => {
    const domain = createMovieDomain()
    await saveRocky(domain)

    expect(await domain.store.findOne('movies', { _id: 'm1' })).toEqual({
      _id: 'm1',
      title: 'Rocky',
      year: 1976,
      runtime: { amount: 119, units: 'min' },
      genres: ['Drama', 'Sport'],
      simple_plot: 'A small-time boxer gets a title shot.',
      roles: [
        { _id: 'a1', character: 'Rocky Balboa' },
        { _id: 'a2', character: 'Adrian' },
      ],
      location: { _id: 'Philadelphia', city: 'Philadelphia', state: 'PA' },
      director_id: 'd1',
      writer_ids: ['w1'],
    })
    expect(await domain.store.findOne('writers', { _id: 'w1' })).toEqual({
      _id: 'w1',
      name: 'Sylvester Stallone',
      movie_ids: ['m1'],
    })
  })

  it('loads it back through every relation', async () => {
    const domain = createMovieDomain()
    await saveRocky(domain)
    const rocky = await domain.Movie.find('m1')

    expect(rocky.get('plot')).toBe('A small-time boxer gets a title shot.')
    expect(String(rocky.get('runtime'))).toBe('119 (min)')
    expect(rocky.get('genres')).toEqual(['Drama', 'Sport'])

    const roles = rocky.embedMany('roles')
    expect(roles.size).toBe(2)
    expect(roles.find('a2')?.get('character')).toBe('Adrian')
    expect((await roles.find('a1')?.refOne('actor').get())?.get('name')).toBe('Sylvester Stallone')

    expect((await rocky.refOne('director').get())?.get('name')).toBe('John G. Avildsen')
    expect((await rocky.manyToMany('writers').all()).map(writer => writer.id)).toEqual(['w1'])
    expect(rocky.embedOne('location').get()?.id).toBe('Philadelphia')
    expect(rocky.embedOne('location').get()?.embeddedAs).toBe('locatable')
  })

  it('finds the movies an actor appears in from the actor side', async () => {
    const domain = createMovieDomain()
    const { shire } = await saveRocky(domain)
    const sequel = domain.Movie.build({ _id: 'm2', title: 'Rocky II', year: 1979 })
    sequel.embedMany('roles').build({ _id: 'a2', character: 'Adrian' })
    sequel.refOne('sequelTo').assign(await domain.Movie.find('m1'))
    await sequel.save()

    const roles = await shire.embeddedRefs('roles').all()
    expect(roles.map(role => role.parent?.get('title'))).toEqual(['Rocky', 'Rocky II'])

    const rocky = await domain.Movie.find('m1')
    expect((await rocky.refMany('sequel').get())?.get('title')).toBe('Rocky II')
    expect(await rocky.refOne('sequelTo').get()).toBeUndefined()
  })

  it('queries by alias and through scopes', async () => {
    const domain = createMovieDomain()
    await saveRocky(domain)
    await domain.Movie.create({ _id: 'm2', title: 'Creed', year: 2015, rated: 'PG-13' })
    await domain.Movie.create({ _id: 'm3', title: 'Inside Out', year: 2015, rated: 'PG' })

    expect((await domain.Movie.findBy({ plot: 'A small-time boxer gets a title shot.' }))?.id).toBe('m1')
    expect((await domain.Movie.scope('modern').toArray()).map(movie => movie.id)).toEqual(['m2', 'm3'])
    expect((await domain.Movie.scope('modern').where({ rated: 'PG' }).first())?.get('title')).toBe('Inside Out')
    expect(await domain.Movie.count({ genres: 'Sport' })).toBe(1)
  })

  describe('embedded values', () => {
    it('keeps a hollow value apart from an absent one', async () => {
      const { Movie, store } = createMovieDomain()
      const hollow = Movie.build({ _id: 'm1', title: 'Rocky' })
      hollow.embedOne('location').build()
      await hollow.save()
      await Movie.create({ _id: 'm2', title: 'Creed' })

      expect((await store.findOne('movies', { _id: 'm1' }))?.location).toEqual({})
      expect(await store.count('movies', { location: { $exists: true } })).toBe(1)
      expect((await Movie.find('m1')).embedOne('location').hasValue).toBe(true)
      expect((await Movie.find('m2')).embedOne('location').hasValue).toBe(false)
    })

    it('derives an embedded id once its source field is set', async () => {
      const { Actor, store } = createMovieDomain()
      const shire = Actor.build({ _id: 'a2', name: 'Talia Shire' })
      const place = shire.embedOne('placeOfBirth').build({ state: 'NY' })
      expect(place.id).toBeUndefined()

      place.set('city', 'Lake Success')
      await shire.save()
      expect((await store.findOne('actors', { _id: 'a2' }))?.place_of_birth).toEqual({
        _id: 'Lake Success',
        city: 'Lake Success',
        state: 'NY',
      })
    })
  })

  describe('proximity', () => {
    async function actorsWithBirthplaces(domain: MovieDomain) {
      const births: [string, string, string, { lat: number; lng: number }][] = [
        ['a1', 'Sylvester Stallone', 'New York', { lat: 40.78, lng: -73.97 }],
        ['a2', 'Talia Shire', 'Lake Success', { lat: 40.77, lng: -73.71 }],
        ['a3', 'Burt Young', 'Philadelphia', { lat: 39.95, lng: -75.17 }],
      ]
      for (const [id, name, city, geolocation] of [...births].reverse()) {
        const actor = domain.Actor.build({ _id: id, name })
        actor.embedOne('placeOfBirth').build({ city, geolocation })
        await actor.save()
      }
    }

    it('needs the declared index to be synced', async () => {
      const domain = createMovieDomain()
      await actorsWithBirthplaces(domain)
      const query = domain.Actor.all().near('place_of_birth.geolocation', { lat: 40.75, lng: -73.99 })
      await expect(query.toArray()).rejects.toBeDocmapError(ErrorCode.INDEX_NOT_FOUND)
    })

    it('returns the nearest birthplaces first', async () => {
      const domain = createMovieDomain()
      await domain.dm.syncIndexes()
      await actorsWithBirthplaces(domain)

      const near = domain.Actor.all().near('place_of_birth.geolocation', { lat: 40.75, lng: -73.99 })
      expect((await near.toArray()).map(actor => actor.id)).toEqual(['a1', 'a2', 'a3'])
      expect((await near.maxDistance('place_of_birth.geolocation', 50000).toArray()).map(actor => actor.id)).toEqual([
        'a1',
        'a2',
      ])
    })
  })

  describe('validation', () => {
    it('refuses to store an invalid movie', async () => {
      const { Movie, store } = createMovieDomain()
      const movie = Movie.build({ year: 1850 })
      expect(await movie.save()).toBe(false)
      expect(movie).toHaveIssueOn('title', "can't be blank")
      expect(movie).toHaveIssueOn('year', 'is before the first film')
      await expect(movie.saveStrict()).rejects.toThrow(ValidationError)
      expect(await store.count('movies', {})).toBe(0)
    })

    it('checks embedded elements with the root', async () => {
      const { Movie } = createMovieDomain()
      const movie = Movie.build({ title: 'Rocky' })
      movie.embedMany('roles').build({ _id: 'a1' })
      expect(await movie.save()).toBe(false)
      expect(movie).toHaveIssueOn('roles.character', "can't be blank")
    })
  })

  describe('removal', () => {
    it('keeps a director while movies refer to it', async () => {
      const domain = createMovieDomain()
      const { director, rocky } = await saveRocky(domain)

      await expect(director.destroy()).rejects.toThrow(CascadeRestrictedError)
      await expect(director.destroy()).rejects.toThrow(
        'Director.movies: cannot destroy Director d1: 1 related document(s) still exist'
      )

      await rocky.destroy()
      await director.destroy()
      expect(await domain.store.count('directors', {})).toBe(0)
      expect((await domain.store.findOne('writers', { _id: 'w1' }))?.movie_ids).toEqual([])
    })

    it('leaves embedded roles with the movie that held them', async () => {
      const domain = createMovieDomain()
      const { stallone, rocky } = await saveRocky(domain)
      await rocky.delete()
      expect(await stallone.embeddedRefs('roles').all()).toEqual([])
      expect(await domain.store.count('actors', {})).toBe(2)
    })
  })

  describe('repair', () => {
    it('restores a one-sided writer link', async () => {
      const domain = createMovieDomain()
      await saveRocky(domain)
      // Simulate a save interrupted before the partner update
      await domain.store.updateOne('writers', { _id: 'w1' }, { $set: { movie_ids: [] } })

      const reconciler = new Reconciler(domain.dm)
      expect(await reconciler.checkManyToMany(domain.Movie, 'writers')).toEqual([
        { ownerId: 'm1', partnerId: 'w1', missing: 'inverse' },
      ])
      await reconciler.repairManyToMany(domain.Movie, 'writers')

      const writer = await domain.Writer.find('w1')
      expect((await writer.manyToMany('movies').all()).map(movie => movie.get('title'))).toEqual(['Rocky'])
    })
  })
})

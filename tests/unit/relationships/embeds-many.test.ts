/**
 * Embed-many Slot Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createMovieDomain } from '../../fixtures/movies'
import { ErrorCode, UnsavedParentError } from '../../../src/errors'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('EmbedManySlot', () => {
  it('stages elements on a transient owner', async () => {
    const { Movie, store } = createMovieDomain()
    const movie = Movie.build({ _id: 'm1', title: 'Rocky' })
    const roles = movie.embedMany('roles')
    roles.build({ _id: 'a1', character: 'Rocky Balboa' })
    roles.build({ _id: 'a2', character: 'Adrian' })
    expect(roles.size).toBe(2)

    await movie.save()
    expect((await store.findOne('movies', { _id: 'm1' }))?.roles).toEqual([
      { _id: 'a1', character: 'Rocky Balboa' },
      { _id: 'a2', character: 'Adrian' },
    ])
    expect(roles.all().every(role => role.isPersisted)).toBe(true)
  })

  it('gives every element an id', () => {
    const { Movie } = createMovieDomain()
    const role = Movie.build({ title: 'Rocky' }).embedMany('roles').build({ character: 'Apollo Creed' })
    expect(typeof role.id).toBe('string')
  })

  it('rejects a duplicate id', () => {
    const { Movie } = createMovieDomain()
    const roles = Movie.build({ title: 'Rocky' }).embedMany('roles')
    roles.build({ _id: 'a1', character: 'Rocky Balboa' })
    try {
      roles.build({ _id: 'a1', character: 'Rocky' })
      expect.unreachable('build should throw')
    } catch (error) {
      expect(error).toBeDocmapError(ErrorCode.DUPLICATE_EMBEDDED_ID)
    }
    expect(roles.size).toBe(1)
  })

  it('rejects an element id changed to a sibling id', () => {
    const { Movie, Actor } = createMovieDomain()
    const roles = Movie.build({ title: 'Rocky' }).embedMany('roles')
    roles.build({ _id: 'a1', character: 'Rocky Balboa' })
    const adrian = roles.build({ _id: 'a2', character: 'Adrian' })

    expect(() => adrian.set('_id', 'a1')).toThrow('Movie.roles: duplicate embedded _id "a1"')
    try {
      adrian.refOne('actor').assign(Actor.build({ _id: 'a1', name: 'Sylvester Stallone' }))
      expect.unreachable('assign should throw')
    } catch (error) {
      expect(error).toBeDocmapError(ErrorCode.DUPLICATE_EMBEDDED_ID)
    }
    expect(adrian.id).toBe('a2')
    expect(roles.all().map(role => role.id)).toEqual(['a1', 'a2'])

    adrian.refOne('actor').assign(Actor.build({ _id: 'a3', name: 'Talia Shire' }))
    expect(adrian.id).toBe('a3')
    expect(roles.find('a3')).toBe(adrian)
  })

  it('appends to a stored owner with $push', async () => {
    const { Movie, MovieRole, store } = createMovieDomain()
    const movie = await Movie.create({ _id: 'm1', title: 'Rocky' })
    const updateOne = vi.spyOn(store, 'updateOne')

    const role = MovieRole.build({ _id: 'a1', character: 'Rocky Balboa' })
    await movie.embedMany('roles').append(role)
    expect(updateOne).toHaveBeenCalledWith('movies', { _id: 'm1' }, {
      $push: { roles: { _id: 'a1', character: 'Rocky Balboa' } },
    })
    expect(role).toBePersisted()
    expect(role.parent).toBe(movie)

    updateOne.mockClear()
    await movie.save()
    expect(updateOne).not.toHaveBeenCalled()
  })

  it('creates on a stored owner only', async () => {
    const { Movie, store } = createMovieDomain()
    await expect(Movie.build({ title: 'Rocky' }).embedMany('roles').create({ character: 'Mickey' })).rejects.toThrow(
      UnsavedParentError
    )

    const movie = await Movie.create({ _id: 'm1', title: 'Rocky' })
    await movie.embedMany('roles').create({ _id: 'a3', character: 'Mickey' })
    expect((await store.findOne('movies', { _id: 'm1' }))?.roles).toEqual([{ _id: 'a3', character: 'Mickey' }])
  })

  it('removes by reference or id with $pull', async () => {
    const { Movie, store } = createMovieDomain()
    const movie = Movie.build({ _id: 'm1', title: 'Rocky' })
    const roles = movie.embedMany('roles')
    const rocky = roles.build({ _id: 'a1', character: 'Rocky Balboa' })
    roles.build({ _id: 'a2', character: 'Adrian' })
    await movie.save()
    const updateOne = vi.spyOn(store, 'updateOne')

    expect(await roles.remove('a2')).toBe(true)
    expect(updateOne).toHaveBeenCalledWith('movies', { _id: 'm1' }, { $pull: { roles: { _id: 'a2' } } })
    expect(await roles.remove(rocky)).toBe(true)
    expect(await roles.remove('a9')).toBe(false)
    expect(rocky.parent).toBeUndefined()
    expect((await store.findOne('movies', { _id: 'm1' }))?.roles).toEqual([])
  })

  it('removes a staged element without touching the store', async () => {
    const { Movie, store } = createMovieDomain()
    const movie = await Movie.create({ _id: 'm1', title: 'Rocky' })
    const roles = movie.embedMany('roles')
    const role = roles.build({ character: 'Spider Rico' })
    const updateOne = vi.spyOn(store, 'updateOne')

    expect(await roles.remove(role)).toBe(true)
    expect(updateOne).not.toHaveBeenCalled()
    expect(roles.size).toBe(0)
  })

  it('looks elements up', () => {
    const { Movie } = createMovieDomain()
    const roles = Movie.build({ title: 'Rocky' }).embedMany('roles')
    const rocky = roles.build({ _id: 'a1', character: 'Rocky Balboa' })
    const adrian = roles.build({ _id: 'a2', character: 'Adrian' })

    expect(roles.find('a2')).toBe(adrian)
    expect(roles.indexOf(rocky)).toBe(0)
    expect(roles.where({ character: /^Rocky/ })).toEqual([rocky])
    expect(roles.where({ _id: { $in: ['a1', 'a2'] } })).toEqual([rocky, adrian])
  })

  it('loads stored elements as persisted embedded entities', async () => {
    const { Movie, store } = createMovieDomain()
    await store.insert('movies', {
      _id: 'm1',
      title: 'Rocky',
      roles: [{ _id: 'a1', character: 'Rocky Balboa' }],
    })
    const movie = await Movie.find('m1')
    const [role] = movie.embedMany('roles').all()
    expect(role?.get('character')).toBe('Rocky Balboa')
    expect(role).toBePersisted()
    expect(role?.isEmbedded).toBe(true)
  })

  it('destroys an element through its parent', async () => {
    const { Movie, MovieRole, store } = createMovieDomain()
    const movie = Movie.build({ _id: 'm1', title: 'Rocky' })
    const role = movie.embedMany('roles').build({ _id: 'a1', character: 'Rocky Balboa' })
    await movie.save()
    const observer = vi.fn()
    MovieRole.on('afterDestroy', observer)

    await role.destroy()
    expect(observer).toHaveBeenCalledTimes(1)
    expect(role.isDestroyed).toBe(true)
    expect((await store.findOne('movies', { _id: 'm1' }))?.roles).toEqual([])
  })

  it('writes nested element changes on the root save', async () => {
    const { Movie, store } = createMovieDomain()
    const movie = Movie.build({ _id: 'm1', title: 'Rocky' })
    const role = movie.embedMany('roles').build({ _id: 'a1', character: 'Rocky' })
    await movie.save()

    role.set('character', 'Rocky Balboa')
    await role.save()
    expect((await store.findOne('movies', { _id: 'm1' }))?.roles).toEqual([{ _id: 'a1', character: 'Rocky Balboa' }])
  })
})

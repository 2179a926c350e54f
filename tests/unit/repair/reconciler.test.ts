/**
 * Reconciler Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { createMovieDomain } from '../../fixtures/movies'
import { Reconciler } from '../../../src/repair'
import { RelationshipError } from '../../../src/errors'
import type { Logger } from '../../../src/utils/logger'

function quietLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('Reconciler', () => {
  describe('many-to-many links', () => {
    async function seed() {
      const logger = quietLogger()
      const domain = createMovieDomain({ logger })
      const { store } = domain
      await store.insert('movies', { _id: 'm1', title: 'Rocky', writer_ids: ['w1', 'w2', 'w9'] })
      await store.insert('movies', { _id: 'm2', title: 'Creed' })
      await store.insert('writers', { _id: 'w1', name: 'Sylvester Stallone', movie_ids: ['m1'] })
      await store.insert('writers', { _id: 'w2', name: 'Aaron Covington', movie_ids: [] })
      return { ...domain, logger, reconciler: new Reconciler(domain.dm) }
    }

    it('reports links missing on the partner side', async () => {
      const { Movie, reconciler, logger } = await seed()
      expect(await reconciler.checkManyToMany(Movie, 'writers')).toEqual([
        { ownerId: 'm1', partnerId: 'w2', missing: 'inverse' },
        { ownerId: 'm1', partnerId: 'w9', missing: 'partner' },
      ])
      expect(logger.warn).toHaveBeenCalledWith('Movie.writers: 2 one-sided link(s)')
    })

    it('writes nothing on a dry run', async () => {
      const { reconciler, store } = await seed()
      expect(await reconciler.repairManyToMany('Movie', 'writers', { dryRun: true })).toEqual({
        found: 2,
        repaired: 0,
        skipped: 1,
        dryRun: true,
      })
      expect((await store.findOne('writers', { _id: 'w2' }))?.movie_ids).toEqual([])
    })

    it('adds the missing inverse ids once', async () => {
      const { reconciler, store } = await seed()
      expect(await reconciler.repairManyToMany('Movie', 'writers')).toEqual({
        found: 2,
        repaired: 1,
        skipped: 1,
        dryRun: false,
      })
      expect((await store.findOne('writers', { _id: 'w2' }))?.movie_ids).toEqual(['m1'])

      expect(await reconciler.repairManyToMany('Movie', 'writers')).toEqual({
        found: 1,
        repaired: 0,
        skipped: 1,
        dryRun: false,
      })
    })
  })

  describe('dangling references', () => {
    async function seed() {
      const domain = createMovieDomain({ logger: quietLogger() })
      const { store } = domain
      await store.insert('directors', { _id: 'd1', name: 'John G. Avildsen' })
      await store.insert('movies', { _id: 'm1', title: 'Rocky', director_id: 'd1' })
      await store.insert('movies', { _id: 'm2', title: 'Creed', director_id: 'gone' })
      await store.insert('movies', { _id: 'm3', title: 'Toy Story', director_id: null })
      await store.insert('movies', { _id: 'm4', title: 'Inside Out' })
      return { ...domain, reconciler: new Reconciler(domain.dm) }
    }

    it('finds keys naming removed documents', async () => {
      const { reconciler } = await seed()
      expect(await reconciler.findDanglingReferences('Movie', 'director')).toEqual([{ id: 'm2', targetId: 'gone' }])
    })

    it('nullifies them unless dry-running', async () => {
      const { reconciler, store } = await seed()
      expect(await reconciler.nullifyDanglingReferences('Movie', 'director', { dryRun: true })).toEqual({
        found: 1,
        repaired: 0,
        skipped: 0,
        dryRun: true,
      })
      expect((await store.findOne('movies', { _id: 'm2' }))?.director_id).toBe('gone')

      expect(await reconciler.nullifyDanglingReferences('Movie', 'director')).toEqual({
        found: 1,
        repaired: 1,
        skipped: 0,
        dryRun: false,
      })
      expect((await store.findOne('movies', { _id: 'm2' }))?.director_id).toBeNull()
      expect((await store.findOne('movies', { _id: 'm1' }))?.director_id).toBe('d1')
    })
  })

  describe('argument checks', () => {
    it('rejects a relation of the wrong kind', async () => {
      const { dm } = createMovieDomain()
      const reconciler = new Reconciler(dm)
      await expect(reconciler.checkManyToMany('Movie', 'director')).rejects.toThrow(
        'Movie.director: is ref-one, expected many-to-many'
      )
      await expect(reconciler.findDanglingReferences('Movie', 'writers')).rejects.toThrow(RelationshipError)
    })

    it('rejects embedded models', async () => {
      const { dm } = createMovieDomain()
      await expect(new Reconciler(dm).findDanglingReferences('MovieRole', 'actor')).rejects.toThrow(
        'MovieRole.actor: embedded models have no collection to reconcile'
      )
    })
  })
})

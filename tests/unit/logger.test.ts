/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { consoleLogger, createLevelLogger, logger, noopLogger, setLogger, type Logger } from '../../src/utils/logger'

function recordingLogger(): Logger & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    debug: message => calls.push(`debug ${message}`),
    info: message => calls.push(`info ${message}`),
    warn: message => calls.push(`warn ${message}`),
    error: message => calls.push(`error ${message}`),
  }
}

describe('createLevelLogger', () => {
  it('drops messages below the level', () => {
    const base = recordingLogger()
    const log = createLevelLogger('warn', base)
    log.debug('a')
    log.info('b')
    log.warn('c')
    log.error('d')
    expect(base.calls).toEqual(['warn c', 'error d'])
  })

  it('passes everything at debug', () => {
    const base = recordingLogger()
    const log = createLevelLogger('debug', base)
    log.debug('a')
    log.error('b', new Error('boom'))
    expect(base.calls).toEqual(['debug a', 'error b'])
  })

  it('is the noop logger when silent', () => {
    expect(createLevelLogger('silent')).toBe(noopLogger)
  })
})

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    consoleLogger.warn('slow query', { ms: 12 })
    expect(warn).toHaveBeenCalledWith('[WARN] slow query', { ms: 12 })
  })

  it('passes the error when one is given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const cause = new Error('boom')
    consoleLogger.error('save failed', cause)
    consoleLogger.error('no cause')
    expect(error).toHaveBeenNthCalledWith(1, '[ERROR] save failed', cause)
    expect(error).toHaveBeenNthCalledWith(2, '[ERROR] no cause')
  })
})

describe('setLogger', () => {
  it('replaces the global logger', () => {
    const custom = recordingLogger()
    setLogger(custom)
    expect(logger).toBe(custom)
  })
})

import { describe, expect, it, vi } from 'vitest'
import { filteredLogger, isLogLevel, type Logger, prefixedLogger } from './logger.js'

function recordingLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

describe('prefixedLogger', () => {
  it('prefixes the message and passes extra args through', () => {
    const base = recordingLogger()
    const err = new Error('boom')

    prefixedLogger('serve', base).error('failed', err)

    expect(base.error).toHaveBeenCalledWith('[serve] failed', err)
  })
})

describe('filteredLogger', () => {
  it('drops messages below the level', () => {
    const base = recordingLogger()
    const logger = filteredLogger('warn', base)

    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    logger.error('e')

    expect(base.debug).not.toHaveBeenCalled()
    expect(base.info).not.toHaveBeenCalled()
    expect(base.warn).toHaveBeenCalledWith('w')
    expect(base.error).toHaveBeenCalledWith('e')
  })
})

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('trace')).toBe(false)
  })
})

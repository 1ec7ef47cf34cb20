import util from 'node:util'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const mocks = vi.hoisted(() => {
  const child = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    isLevelEnabled: vi.fn(() => true),
  }
  return { child, base: { child: vi.fn(() => child) } }
})

vi.mock('pino', () => ({
  default: vi.fn(() => mocks.base),
}))

import createLogger, { stringifyArgs } from '../src/logger.js'

describe('logger', () => {
  beforeEach(() => {
    // pino itself is called once at import, keep that call
    for (const fn of Object.values(mocks.child)) {
      fn.mockClear()
    }
    mocks.child.isLevelEnabled.mockReturnValue(true)
  })

  it('should configure pino with the pretty transport', async () => {
    const pino = (await import('pino')).default

    expect(pino).toHaveBeenCalledWith(
      expect.objectContaining({
        transport: expect.objectContaining({ target: 'pino-pretty' }),
      }),
    )
  })

  it('should name the child logger in upper case', () => {
    createLogger('thinq')
    expect(mocks.base.child).toHaveBeenCalledWith({ name: 'THINQ' })
  })

  it('should join the arguments into one message', () => {
    const logger = createLogger('app')

    logger.info('Starting', 'version', 1)
    logger.warn('No supported devices found')
    logger.error('Failed:', null)

    expect(mocks.child.info).toHaveBeenCalledWith('Starting version 1')
    expect(mocks.child.warn).toHaveBeenCalledWith('No supported devices found')
    expect(mocks.child.error).toHaveBeenCalledWith('Failed: null')
  })

  it('should skip debug output when the level is disabled', () => {
    const logger = createLogger('app')
    mocks.child.isLevelEnabled.mockReturnValue(false)

    logger.debug('Payload', { State: '2' })

    expect(mocks.child.isLevelEnabled).toHaveBeenCalledWith('debug')
    expect(mocks.child.debug).not.toHaveBeenCalled()
  })

  it('should write debug output when the level is enabled', () => {
    createLogger('app').debug('State', '@STATE_CLEANING_W')
    expect(mocks.child.debug).toHaveBeenCalledWith('State @STATE_CLEANING_W')
  })

  describe('stringifyArgs', () => {
    it('should inspect objects', () => {
      const payload = { State: { state: 'STATE_END' } }
      expect(stringifyArgs(['Data', payload])).toBe(`Data ${util.inspect(payload, { colors: true, depth: null })}`)
    })

    it('should print primitives as strings', () => {
      expect(stringifyArgs(['a', 1, true, undefined])).toBe('a 1 true undefined')
    })
  })
})

import { describe, expect, it, vi } from 'vitest'
import { Cache } from '../src/cache.js'

vi.mock('../src/logger.js', () => ({
  default: vi.fn(() => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  })),
}))

describe('Cache', () => {
  it('should store and retrieve values', () => {
    const cache = new Cache<{ name: string }>()
    cache.set('test-key', { name: 'value' })
    expect(cache.get('test-key')).toEqual({ name: 'value' })
  })

  it('should return undefined for non-existent keys', () => {
    const cache = new Cache()
    expect(cache.get('non-existent')).toBeUndefined()
  })

  it('should detect when value has not changed', () => {
    const cache = new Cache<{ runState: string }>()
    const value = { runState: '@STATE_CLEANING_W' }

    // First call stores the value
    expect(cache.matchByValue('key', value)).toBe(false)
    expect(cache.matchByValue('key', { runState: '@STATE_CLEANING_W' })).toBe(true)
  })

  it('should store the new value when it changed', () => {
    const cache = new Cache<{ runState: string }>()

    cache.matchByValue('key', { runState: '@STATE_CLEANING_W' })
    expect(cache.matchByValue('key', { runState: '@STATE_END_W' })).toBe(false)
    expect(cache.get('key')).toEqual({ runState: '@STATE_END_W' })
  })

  it('should generate consistent cache keys', () => {
    const cache = new Cache()

    expect(cache.cacheKey('robot-1')).toEqual({
      state: 'robot-1:state',
      autoDiscovery: 'robot-1:auto-discovery',
    })
    expect(cache.cacheKey('robot-1', 'run_state').autoDiscovery).toBe('robot-1:auto-discovery:run_state')
  })

  it('should delete and clear values', () => {
    const cache = new Cache<{ val: string }>()
    cache.set('key1', { val: 'value1' }).set('key2', { val: 'value2' })

    cache.delete('key1')
    expect(cache.has('key1')).toBe(false)
    expect(cache.has('key2')).toBe(true)

    cache.clear()
    expect(cache.has('key2')).toBe(false)
  })

  it('should evict the least recently used entry past its size', () => {
    const cache = new Cache<number>(2)
    cache.set('a', 1).set('b', 2).set('c', 3)

    expect(cache.has('a')).toBe(false)
    expect(cache.get('c')).toBe(3)
  })

  it('should expire entries after the ttl', () => {
    vi.useFakeTimers()
    try {
      const cache = new Cache<number>(10, 1000)
      cache.set('a', 1)

      vi.advanceTimersByTime(1001)
      expect(cache.get('a')).toBeUndefined()
    } finally {
      vi.useRealTimers()
    }
  })
})

import { LRU } from 'tiny-lru'
import createLogger from './logger.js'

const logger = createLogger('cache')

const maxItems = 1000
const defaultTtl = 1000 * 60 * 60 * 24 // 24 hours

type CacheKeys = {
  state: string
  autoDiscovery: string
}

/**
 * Last published values, stored serialized so comparisons are structural
 */
export class Cache<T = unknown> {
  private readonly lru: LRU<string>

  constructor(max = maxItems, ttl = defaultTtl) {
    this.lru = new LRU<string>(max, ttl, true)
  }

  cacheKey(deviceId: string, objectId?: string): CacheKeys {
    return {
      state: `${deviceId}:state`,
      autoDiscovery: objectId ? `${deviceId}:auto-discovery:${objectId}` : `${deviceId}:auto-discovery`,
    }
  }

  /**
   * True when the stored value equals `value`; otherwise stores it and returns false
   */
  matchByValue(key: string, value: T): boolean {
    if (this.lru.get(key) === JSON.stringify(value)) {
      logger.debug(`Key "${key}" value has not changed.`)
      return true
    }

    this.set(key, value)
    return false
  }

  get(key: string): T | undefined {
    const value = this.lru.get(key)
    if (value === undefined) {
      return undefined
    }
    return JSON.parse(value) as T
  }

  set(key: string, value: T): this {
    this.lru.set(key, JSON.stringify(value))
    logger.debug(`Set "${key}" value:`, value)
    return this
  }

  has(key: string): boolean {
    return this.lru.has(key)
  }

  delete(key: string): this {
    this.lru.delete(key)
    return this
  }

  clear(): this {
    this.lru.clear()
    return this
  }
}

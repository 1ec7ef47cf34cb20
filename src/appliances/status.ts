import type { DeviceInfo } from '../device-info.js'
import type { Logger } from '../logger.js'
import type { RawPayload } from '../types/device.js'
import type { FeatureKey } from './vocabulary.js'

/**
 * What a status snapshot needs from the device that created it
 */
export interface StatusContext {
  readonly deviceInfo: DeviceInfo
  readonly logger: Logger
}

const isRecord = (value: unknown): value is RawPayload =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isEmpty = (value: unknown) => value === undefined || value === null || value === ''

/**
 * Base class for a snapshot of one device payload.
 * Owns a private copy of the payload, resolves fields through the device metadata
 * and records the feature values exposed to consumers.
 */
export abstract class DeviceStatus {
  protected readonly device: StatusContext
  private readonly data: RawPayload
  private readonly features = new Map<FeatureKey, string>()

  constructor(device: StatusContext, data: RawPayload | null = null) {
    this.device = device
    this.data = data ? { ...data } : {}
  }

  public get payload(): Readonly<RawPayload> {
    return this.data
  }

  public get deviceFeatures(): Partial<Record<FeatureKey, string>> {
    const features: Partial<Record<FeatureKey, string>> = {}
    for (const [key, value] of this.features) {
      features[key] = value
    }
    return features
  }

  /**
   * First non-empty value among the key aliases. A nested mapping is searched again with the same aliases,
   * so `{ State: 'x' }`, `{ state: 'x' }` and `{ State: { state: 'x' } }` all resolve to `'x'`.
   */
  protected lookup(keys: readonly string[], source: RawPayload = this.data): unknown {
    for (const key of keys) {
      const value = source[key]
      if (isEmpty(value)) continue

      if (isRecord(value)) {
        const nested = this.lookup(keys, value)
        if (nested !== null) {
          return nested
        }
        continue
      }
      return value
    }
    return null
  }

  protected lookupEnum(keys: readonly string[]): string | null {
    const code = this.lookup(keys)
    if (code === null) return null
    return this.device.deviceInfo.enumName(keys, code)
  }

  protected lookupReference(keys: readonly string[], refKey = 'title'): string | null {
    const code = this.lookup(keys)
    if (code === null) return null
    return this.device.deviceInfo.referenceName(keys, code, refKey)
  }

  /**
   * Write one field of the payload store, returning whether the stored value changed
   */
  public set(key: string, value: unknown): boolean {
    if (key in this.data && JSON.stringify(this.data[key]) === JSON.stringify(value)) {
      return false
    }
    this.data[key] = value
    return true
  }

  /**
   * Patch a field addressed by its aliases: the alias already present in the payload, else the first one
   */
  public updateStatus(keys: string | readonly string[], value: unknown): boolean {
    const aliases = typeof keys === 'string' ? [keys] : keys
    const key = aliases.find((alias) => alias in this.data) ?? aliases[0]
    if (key === undefined) return false
    return this.set(key, value)
  }

  protected updateFeature(key: FeatureKey, value: string): string {
    this.features.set(key, value)
    return value
  }

  /**
   * Evaluate every feature so `deviceFeatures` is populated without a reader touching them
   */
  public abstract updateFeatures(): void
}

import { z } from 'zod'
import type { BaseDevice } from './appliances/base.js'
import { Cache } from './cache.js'
import { InvalidDeviceStatus } from './errors.js'
import type { Logger } from './logger.js'
import type { IMqtt } from './mqtt.js'
import { formatAxiosError } from './thinq.js'
import type { HADiscoveryEntry } from './types/homeassistant.js'
import type { NormalizedState } from './types/normalized.js'

export type StateDifference = { from: unknown; to: unknown }

export interface BridgeOptions {
  topicPrefix: string
  showChanges?: boolean
  ignoredKeys?: string[]
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const commandSchema = z.object({
  command: z.enum(['wake_up']),
})

/**
 * Compare two states and return the flattened differences, skipping ignored keys and their children
 */
export function getStateDifferences(
  oldState: NormalizedState | null,
  newState: NormalizedState,
  ignoredKeys: string[] = [],
): Record<string, StateDifference> {
  const differences: Record<string, StateDifference> = {}

  if (!oldState) {
    return differences
  }

  // Exact match, or a parent path is ignored ("features" ignores "features.RUN_STATE")
  const shouldIgnore = (path: string): boolean => {
    const parts = path.split('.')
    return parts.some((_, i) => ignoredKeys.includes(parts.slice(0, i + 1).join('.')))
  }

  const compareValues = (oldVal: unknown, newVal: unknown, path: string): void => {
    if (path && shouldIgnore(path)) return

    const normalizedOld = oldVal ?? null
    const normalizedNew = newVal ?? null
    if (JSON.stringify(normalizedOld) === JSON.stringify(normalizedNew)) return

    if (isRecord(normalizedOld) && isRecord(normalizedNew)) {
      for (const key of new Set([...Object.keys(normalizedOld), ...Object.keys(normalizedNew)])) {
        compareValues(normalizedOld[key], normalizedNew[key], path ? `${path}.${key}` : key)
      }
      return
    }

    differences[path] = { from: oldVal, to: newVal }
  }

  compareValues(oldState, newState, '')

  return differences
}

export function formatStateDifferences(differences: Record<string, StateDifference>): string {
  return Object.entries(differences)
    .map(([key, { from, to }]) => `\n  ${key}: ${from} → ${to}`)
    .join('')
}

/**
 * Connects one device to MQTT: publishes its normalized state and discovery configs,
 * and runs the commands received on its command topic
 */
export class DeviceBridge {
  private readonly device: BaseDevice
  private readonly mqtt: IMqtt
  private readonly logger: Logger
  private readonly options: BridgeOptions
  private readonly states = new Cache<NormalizedState>()
  private readonly discovery = new Cache<HADiscoveryEntry['config']>()
  private pending: Promise<NormalizedState | null> | null = null
  private timer: NodeJS.Timeout | null = null
  private stopped = false

  constructor(device: BaseDevice, mqtt: IMqtt, logger: Logger, options: BridgeOptions) {
    this.device = device
    this.mqtt = mqtt
    this.logger = logger
    this.options = options
  }

  private get deviceId() {
    return this.device.getDeviceId()
  }

  private publishState(state: NormalizedState) {
    this.states.set(this.states.cacheKey(this.deviceId).state, state)
    this.mqtt.publish(`${this.deviceId}/state`, JSON.stringify(state))
  }

  private logStateChanges(differences: Record<string, StateDifference>): boolean {
    const hasChanges = Object.keys(differences).length > 0

    if (hasChanges) {
      if (this.options.showChanges) {
        this.logger.info(`State changed for device ${this.deviceId}: ${formatStateDifferences(differences)}`)
      } else {
        this.logger.info(`State changed for device ${this.deviceId}`)
      }
    } else {
      this.logger.debug('State checked, no changes detected')
    }

    return hasChanges
  }

  /**
   * Poll the device and publish the state when it changed or was never published.
   * Resolves null without polling while another refresh is in flight.
   * Transport errors propagate to the caller.
   */
  public refresh(): Promise<NormalizedState | null> {
    if (this.pending) {
      this.logger.debug(`Refresh of device ${this.deviceId} still running, skipping`)
      return Promise.resolve(null)
    }

    this.pending = this.pollAndPublish().finally(() => {
      this.pending = null
    })
    return this.pending
  }

  private async pollAndPublish(): Promise<NormalizedState | null> {
    const status = await this.device.poll()
    if (!status) {
      this.logger.debug(`Nothing new for device ${this.deviceId}, keeping the published state`)
      return null
    }

    const state = this.device.normalizeState()
    const cachedState = this.states.get(this.states.cacheKey(this.deviceId).state) ?? null
    const differences = getStateDifferences(cachedState, state, this.options.ignoredKeys)
    const hasChanges = this.logStateChanges(differences)

    if (hasChanges || !cachedState) {
      this.publishState(state)
    }
    return state
  }

  /**
   * Refresh after `initialDelay` ms, then `interval` ms after each refresh settles.
   * A failed refresh is logged and publishes the idle state.
   */
  public start(initialDelay: number, interval: number): void {
    if (this.stopped) return

    const tick = async () => {
      try {
        await this.refresh()
      } catch (error) {
        this.logger.error(`Refreshing device ${this.deviceId} failed:`, formatAxiosError(error))
        this.reset()
      } finally {
        this.schedule(tick, interval)
      }
    }
    this.schedule(tick, initialDelay)
  }

  private schedule(tick: () => Promise<void>, delay: number) {
    if (this.stopped) return

    this.timer = setTimeout(() => {
      tick().catch((error: unknown) => {
        this.logger.error(`Refresh loop of device ${this.deviceId} failed:`, error)
      })
    }, delay)
  }

  public stop(): void {
    this.stopped = true
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  /**
   * Publish the idle state without polling, e.g. after the device stopped answering
   */
  public reset(): NormalizedState {
    this.device.resetStatus()
    const state = this.device.normalizeState()
    this.publishState(state)
    return state
  }

  public async handleCommand(message: Buffer | string): Promise<void> {
    let payload: unknown
    try {
      payload = JSON.parse(message.toString())
    } catch {
      this.logger.error(`Ignoring command for device ${this.deviceId}, not valid JSON:`, message.toString())
      return
    }

    const parsed = commandSchema.safeParse(payload)
    if (!parsed.success) {
      this.logger.error(`Ignoring unknown command for device ${this.deviceId}:`, payload)
      return
    }

    this.logger.info(`Running command "${parsed.data.command}" on device ${this.deviceId}`)
    try {
      await this.device.wakeUp()
    } catch (error) {
      if (error instanceof InvalidDeviceStatus) {
        this.logger.warn(error.message)
        return
      }
      throw error
    }

    this.publishState(this.device.normalizeState())
  }

  public publishAutoDiscovery(): void {
    for (const { component, objectId, config } of this.device.generateAutoDiscoveryConfig(this.mqtt.topicPrefix)) {
      const cacheKey = this.discovery.cacheKey(this.deviceId, objectId).autoDiscovery
      if (this.discovery.matchByValue(cacheKey, config)) {
        continue
      }
      this.mqtt.autoDiscovery(component, this.deviceId, objectId, JSON.stringify(config))
    }
  }
}

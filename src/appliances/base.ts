import type { DeviceInfo } from '../device-info.js'
import { CommandNotSupportedError } from '../errors.js'
import type { Logger } from '../logger.js'
import type { DeviceTransport, PollOptions, RawPayload } from '../types/device.js'
import type { HADiscoveryEntry } from '../types/homeassistant.js'
import type { NormalizedState } from '../types/normalized.js'
import type { DeviceStatus } from './status.js'
import type { CommandCandidate, CommandTemplate } from './vocabulary.js'

/**
 * Base class for all ThinQ devices
 * Specific device types should extend this class and implement the abstract methods
 */
export abstract class BaseDevice<TStatus extends DeviceStatus = DeviceStatus> {
  public readonly deviceInfo: DeviceInfo
  public readonly logger: Logger
  protected readonly transport: DeviceTransport
  protected standBy = true
  protected status: TStatus

  constructor(transport: DeviceTransport, deviceInfo: DeviceInfo, logger: Logger) {
    this.transport = transport
    this.deviceInfo = deviceInfo
    this.logger = logger
    this.status = this.createStatus(null)
  }

  public getDeviceId(): string {
    return this.deviceInfo.deviceId
  }

  public getDeviceName(): string {
    return this.deviceInfo.name
  }

  public isStandBy(): boolean {
    return this.standBy
  }

  public getStatus(): TStatus {
    return this.status
  }

  /**
   * Build a snapshot for this device type, without payload for the idle state
   */
  protected abstract createStatus(data: RawPayload | null): TStatus

  /**
   * Replace the current snapshot with a payload-less one, so every derived value falls back to off / none
   */
  public resetStatus(): TStatus {
    this.status = this.createStatus(null)
    return this.status
  }

  protected async devicePoll(category: string, options: PollOptions = {}): Promise<RawPayload | null> {
    const payload = await this.transport.requestPayload({
      deviceId: this.getDeviceId(),
      category,
      additionalPollIntervalV1: options.additionalPollIntervalV1 ?? 0,
      additionalPollIntervalV2: options.additionalPollIntervalV2 ?? 0,
      queryDevice: options.queryDevice ?? false,
    })
    this.logger.debug('Payload', payload)
    return payload
  }

  protected async set(group: string, command: string | null, value: string | null): Promise<void> {
    this.logger.debug(`Sending command ${group}/${command ?? '-'} with value ${value ?? '-'}`)
    await this.transport.sendCommand(this.getDeviceId(), group, command, value)
  }

  /**
   * Pick the first candidate the device supports. A device whose metadata has no control
   * table gets the first candidate.
   */
  protected getCmdKeys(template: CommandTemplate): CommandCandidate {
    const candidates = template.map(([group, command]) => (command ? `${group}/${command}` : group))
    if (template.length === 0) {
      throw new CommandNotSupportedError(candidates)
    }
    if (!this.deviceInfo.hasControls) {
      return template[0]
    }

    const match = template.find(([group, command]) => this.deviceInfo.supportsCommand(group, command))
    if (!match) {
      throw new CommandNotSupportedError(candidates)
    }
    return match
  }

  /**
   * Raw code for a state label, e.g. the code that resolves to "@STATE_INITIAL_W"
   */
  protected getStateKey(keys: readonly string[], label: string): string {
    return this.deviceInfo.enumValue(keys, label)
  }

  protected updateStatus(keys: readonly string[], value: unknown): boolean {
    return this.status.updateStatus(keys, value)
  }

  /**
   * Poll the device's current state; null when the transport returned nothing and the snapshot was kept
   */
  abstract poll(): Promise<TStatus | null>

  /**
   * Leave standby; rejects with InvalidDeviceStatus when the device is not in standby
   */
  abstract wakeUp(): Promise<void>

  /**
   * Normalize the current snapshot to the published format
   */
  abstract normalizeState(): NormalizedState

  /**
   * Generate the Home Assistant MQTT auto-discovery entries for this device
   */
  abstract generateAutoDiscoveryConfig(topicPrefix: string): HADiscoveryEntry[]
}

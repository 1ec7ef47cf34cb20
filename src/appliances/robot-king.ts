import { InvalidDeviceStatus } from '../errors.js'
import type { RawPayload } from '../types/device.js'
import type { HADeviceConfig, HADiscoveryEntry } from '../types/homeassistant.js'
import type { NormalizedState } from '../types/normalized.js'
import { BaseDevice } from './base.js'
import { normalizeRobotKingState } from './normalizers.js'
import { DeviceStatus, type StatusContext } from './status.js'
import {
  ADDITIONAL_POLL_INTERVAL,
  CMD_WAKE_UP,
  ERROR_OFF,
  ERROR_STATUS_KEY,
  POWER_STATUS_KEY,
  ROBOT_KING_CATEGORY,
  STATE_INITIAL,
  STATE_POWER_OFF,
  StateOptions,
  classifyRunState,
  isNoErrorState,
} from './vocabulary.js'

/**
 * LG RobotKing cleaning robot
 * Category: robotKing
 */
export class RobotKingDevice extends BaseDevice<RobotKingStatus> {
  protected createStatus(data: RawPayload | null): RobotKingStatus {
    return new RobotKingStatus(this, data)
  }

  public async poll(): Promise<RobotKingStatus | null> {
    const payload = await this.devicePoll(ROBOT_KING_CATEGORY, {
      additionalPollIntervalV1: ADDITIONAL_POLL_INTERVAL,
      additionalPollIntervalV2: ADDITIONAL_POLL_INTERVAL,
      queryDevice: true,
    })

    if (!payload) {
      return null
    }

    this.status = this.createStatus(payload)
    return this.status
  }

  /**
   * Wake the robot from standby. The snapshot is moved to the initial run state right away
   * so it does not read as off until the next poll.
   */
  public async wakeUp(): Promise<void> {
    if (!this.standBy) {
      throw new InvalidDeviceStatus(`Device ${this.getDeviceId()} is not in standby`)
    }

    const [group, command, value] = this.getCmdKeys(CMD_WAKE_UP)
    await this.set(group, command, value)
    this.standBy = false
    this.updateStatus(POWER_STATUS_KEY, this.getStateKey(POWER_STATUS_KEY, STATE_INITIAL))
  }

  public normalizeState(): NormalizedState {
    return normalizeRobotKingState(this.getDeviceId(), this.status, this.standBy)
  }

  public generateAutoDiscoveryConfig(topicPrefix: string): HADiscoveryEntry[] {
    // Ensure topicPrefix ends with /
    const prefix = topicPrefix.endsWith('/') ? topicPrefix : `${topicPrefix}/`
    const deviceId = this.getDeviceId()
    const stateTopic = `${prefix}${deviceId}/state`
    const commandTopic = `${prefix}${deviceId}/command`
    const device: HADeviceConfig = {
      identifiers: [deviceId],
      manufacturer: 'LG',
      model: this.deviceInfo.modelName,
      name: this.getDeviceName(),
    }
    const ids = (objectId: string) => ({
      object_id: `${deviceId}_${objectId}`,
      uniq_id: `thinq_${deviceId}_${objectId}`,
    })

    return [
      {
        component: 'binary_sensor',
        objectId: 'power',
        config: {
          name: 'Power',
          ...ids('power'),
          device,
          device_class: 'power',
          state_topic: stateTopic,
          value_template: '{{ value_json.applianceState }}',
          payload_on: 'on',
          payload_off: 'off',
        },
      },
      {
        component: 'binary_sensor',
        objectId: 'run_completed',
        config: {
          name: 'Run completed',
          ...ids('run_completed'),
          device,
          state_topic: stateTopic,
          value_template: '{{ value_json.runCompleted }}',
          payload_on: 'on',
          payload_off: 'off',
        },
      },
      {
        component: 'binary_sensor',
        objectId: 'error',
        config: {
          name: 'Error',
          ...ids('error'),
          device,
          device_class: 'problem',
          state_topic: stateTopic,
          value_template: '{{ value_json.error }}',
          payload_on: 'on',
          payload_off: 'off',
        },
      },
      {
        component: 'sensor',
        objectId: 'run_state',
        config: {
          name: 'Run state',
          ...ids('run_state'),
          device,
          icon: 'mdi:robot-vacuum',
          state_topic: stateTopic,
          value_template: '{{ value_json.runState }}',
          json_attributes_topic: stateTopic,
        },
      },
      {
        component: 'sensor',
        objectId: 'error_msg',
        config: {
          name: 'Error message',
          ...ids('error_msg'),
          device,
          icon: 'mdi:alert-circle-outline',
          state_topic: stateTopic,
          value_template: '{{ value_json.errorMsg }}',
        },
      },
      {
        component: 'button',
        objectId: 'wake_up',
        config: {
          name: 'Wake up',
          ...ids('wake_up'),
          device,
          icon: 'mdi:power',
          command_topic: commandTopic,
          payload_press: '{ "command": "wake_up" }',
        },
      },
    ]
  }
}

interface StatusMemo {
  runState: string | null
  error: string | null
}

/**
 * Higher-level information about a RobotKing's current status, built from one payload.
 * Run state and error are resolved lazily and memoized for the snapshot's lifetime;
 * a status update clears the run state memo only.
 */
export class RobotKingStatus extends DeviceStatus {
  private readonly memo: StatusMemo = { runState: null, error: null }

  constructor(device: StatusContext, data: RawPayload | null = null) {
    super(device, data)
    device.logger.debug('Data', data)
  }

  private getRunState(): string {
    if (this.memo.runState === null) {
      const state = this.lookupEnum(POWER_STATUS_KEY)
      this.device.logger.debug('State', state)
      this.memo.runState = state || STATE_POWER_OFF
    }
    return this.memo.runState
  }

  private getError(): string {
    if (this.memo.error === null) {
      const error = this.lookupReference(ERROR_STATUS_KEY, 'title')
      this.memo.error = error || ERROR_OFF
    }
    return this.memo.error
  }

  // Clears the run state memo only, the error memo lives as long as the snapshot
  public updateStatus(keys: string | readonly string[], value: unknown): boolean {
    if (!super.updateStatus(keys, value)) {
      return false
    }
    this.memo.runState = null
    return true
  }

  public get isOn(): boolean {
    return !this.getRunState().includes(STATE_POWER_OFF)
  }

  public get isRunCompleted(): boolean {
    return classifyRunState(this.getRunState()).kind !== 'running'
  }

  public get isError(): boolean {
    if (!this.isOn) {
      return false
    }
    return !isNoErrorState(this.getError())
  }

  public get runState(): string {
    const runState = this.getRunState()
    return this.updateFeature('RUN_STATE', runState.includes(STATE_POWER_OFF) ? StateOptions.NONE : runState)
  }

  public get errorMsg(): string {
    const error = this.isError ? this.getError() : StateOptions.NONE
    return this.updateFeature('ERROR_MSG', error)
  }

  public updateFeatures(): void {
    const features = [this.runState, this.errorMsg]
    this.device.logger.debug('Features', features)
  }
}

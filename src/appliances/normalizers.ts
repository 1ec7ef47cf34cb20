import type { NormalizedState, OnOffState } from '../types/normalized.js'
import type { RobotKingStatus } from './robot-king.js'

/**
 * Utility functions for turning a status snapshot into the published format
 */

export function toOnOff(value: boolean): OnOffState {
  return value ? 'on' : 'off'
}

/**
 * Normalize a RobotKing snapshot, evaluating its features first so `features` is complete
 */
export function normalizeRobotKingState(deviceId: string, status: RobotKingStatus, standBy: boolean): NormalizedState {
  status.updateFeatures()
  const runState = status.runState
  const errorMsg = status.errorMsg

  return {
    deviceId,
    applianceState: toOnOff(status.isOn),
    standBy: toOnOff(standBy),
    runState,
    runCompleted: toOnOff(status.isRunCompleted),
    error: toOnOff(status.isError),
    errorMsg,
    features: status.deviceFeatures,
  }
}

/**
 * Normalized state types
 * These represent the standardized format published over MQTT
 * after classifying the raw ThinQ payload
 */

import type { FeatureKey } from '../appliances/vocabulary.js'

export type OnOffState = 'on' | 'off'

/**
 * Normalized robot state
 * `runState` and `errorMsg` carry the feature values, "-" when there is nothing to report
 */
export interface NormalizedState {
  deviceId: string
  applianceState: OnOffState
  standBy: OnOffState
  runState: string
  runCompleted: OnOffState
  error: OnOffState
  errorMsg: string
  features: Partial<Record<FeatureKey, string>>
}

/**
 * Home Assistant MQTT discovery types for the entities a robot exposes
 * Based on: https://www.home-assistant.io/integrations/mqtt/#mqtt-discovery
 */

export type HAComponent = 'sensor' | 'binary_sensor' | 'button'

export interface HADeviceConfig {
  identifiers: string[]
  manufacturer: string
  model: string
  name: string
}

interface HABaseDiscoveryConfig {
  name: string
  object_id: string
  uniq_id: string
  device: HADeviceConfig
  icon?: string
}

export interface HASensorDiscoveryConfig extends HABaseDiscoveryConfig {
  state_topic: string
  value_template: string
  json_attributes_topic?: string
}

export interface HABinarySensorDiscoveryConfig extends HABaseDiscoveryConfig {
  state_topic: string
  value_template: string
  payload_on: string
  payload_off: string
  device_class?: 'power' | 'problem' | 'running'
}

export interface HAButtonDiscoveryConfig extends HABaseDiscoveryConfig {
  command_topic: string
  payload_press: string
}

export type HADiscoveryEntry =
  | { component: 'sensor'; objectId: string; config: HASensorDiscoveryConfig }
  | { component: 'binary_sensor'; objectId: string; config: HABinarySensorDiscoveryConfig }
  | { component: 'button'; objectId: string; config: HAButtonDiscoveryConfig }

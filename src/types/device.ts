/**
 * Contracts between the robot controller and the transport that fetches payloads and sends commands
 */

/** Raw telemetry as received from the cloud: string keys to nested mappings, strings or numbers */
export type RawPayload = Record<string, unknown>

export interface PollOptions {
  additionalPollIntervalV1?: number
  additionalPollIntervalV2?: number
  queryDevice?: boolean
}

export interface PollRequest extends Required<PollOptions> {
  deviceId: string
  category: string
}

export interface DeviceTransport {
  /**
   * Fetch the latest payload, or null when the cloud has nothing new for the device
   */
  requestPayload(request: PollRequest): Promise<RawPayload | null>

  /**
   * Dispatch a command; rejects when the cloud refuses it
   */
  sendCommand(deviceId: string, group: string, command: string | null, value: string | null): Promise<void>
}

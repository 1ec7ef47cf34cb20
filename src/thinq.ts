import { randomUUID } from 'node:crypto'
import axios, { type AxiosInstance } from 'axios'
import { z } from 'zod'
import { DeviceInfo, EMPTY_MODEL, parseModelInfo, type DeviceDescriptor, type Platform } from './device-info.js'
import { ThinQApiError } from './errors.js'
import createLogger from './logger.js'
import type { DeviceTransport, PollRequest, RawPayload } from './types/device.js'

const logger = createLogger('thinq')

const API_TIMEOUT_MS = 10_000 // Default timeout for API requests
const ERROR_RESPONSE_MAX_LENGTH = 200 // Max length of error response to include in logs
const RESULT_OK = '0000'

// ThinQ numeric device types to snapshot categories
const DEVICE_CATEGORIES: Record<string, string> = {
  '501': 'robotKing',
  ROBOT_KING: 'robotKing',
}

const envelopeSchema = z.object({
  resultCode: z.string(),
  result: z.unknown().optional(),
})

const deviceRecordSchema = z
  .object({
    deviceId: z.string(),
    alias: z.string().optional(),
    modelName: z.string().optional(),
    deviceType: z.union([z.number(), z.string()]).optional(),
    platformType: z.string().optional(),
    modelJsonUri: z.string().optional(),
    online: z.boolean().optional(),
    snapshot: z.record(z.string(), z.unknown()).nullable().optional(),
  })
  .passthrough()

const dashboardSchema = z.object({
  item: z.array(deviceRecordSchema).default([]),
})

export type DeviceRecord = z.infer<typeof deviceRecordSchema>

export interface ThinQClientOptions {
  apiUrl: string
  apiKey: string
  accessToken: string
  userNumber: string
  clientId?: string
  countryCode: string
  languageCode?: string
}

const isRecord = (value: unknown): value is RawPayload =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

// Helper to extract URL path from absolute or relative URLs
function extractUrlPath(url: string | undefined): string {
  if (!url) return ''

  try {
    return new URL(url).pathname
  } catch {
    // If url is a relative path, use it directly
    return url
  }
}

export function formatAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status
    const statusText = error.response?.statusText
    const method = error.config?.method?.toUpperCase()
    const url = error.config?.url

    let formatted = error.message
    if (status) {
      const statusPart = statusText ? ` ${statusText}` : ''
      formatted += ` (${status}${statusPart})`
    }
    if (method && url) {
      formatted += ` [${method} ${extractUrlPath(url)}]`
    }

    // Add response data if available and not too large
    if (error.response?.data && typeof error.response.data === 'object') {
      const responseStr = JSON.stringify(error.response.data)
      if (responseStr.length < ERROR_RESPONSE_MAX_LENGTH) {
        formatted += ` - ${responseStr}`
      }
    }

    return formatted
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return String(error)
}

export function toPlatform(platformType: string | undefined): Platform {
  return platformType?.toLowerCase() === 'thinq1' ? 'thinq1' : 'thinq2'
}

export function toDescriptor(record: DeviceRecord): DeviceDescriptor {
  const deviceType = record.deviceType === undefined ? '' : String(record.deviceType)
  return {
    deviceId: record.deviceId,
    alias: record.alias ?? record.deviceId,
    modelName: record.modelName ?? 'unknown',
    category: DEVICE_CATEGORIES[deviceType] ?? deviceType,
    platform: toPlatform(record.platformType),
  }
}

/**
 * HTTP transport for the ThinQ v2 service API.
 * The access token is taken as configured, acquiring and refreshing it is not handled here.
 */
export class ThinQClient implements DeviceTransport {
  private readonly client: AxiosInstance
  private readonly platforms = new Map<string, Platform>()
  private readonly lastDeviceQuery = new Map<string, number>()

  constructor(options: ThinQClientOptions) {
    this.client = axios.create({
      baseURL: options.apiUrl,
      timeout: API_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'x-api-key': options.apiKey,
        'x-emp-token': options.accessToken,
        'x-user-no': options.userNumber,
        'x-client-id': options.clientId ?? options.userNumber,
        'x-country-code': options.countryCode,
        'x-language-code': options.languageCode ?? 'en-US',
        'x-service-code': 'SVC202',
        'x-service-phase': 'OP',
        'x-thinq-app-level': 'PRD',
        'x-thinq-app-os': 'ANDROID',
        'x-thinq-app-type': 'NUTS',
      },
    })

    this.client.interceptors.request.use((request) => {
      request.headers.set('x-message-id', randomUUID())
      return request
    })
  }

  private unwrap(path: string, data: unknown): unknown {
    const envelope = envelopeSchema.parse(data)
    if (envelope.resultCode !== RESULT_OK) {
      throw new ThinQApiError(envelope.resultCode, path)
    }
    return envelope.result
  }

  private async get(path: string): Promise<unknown> {
    const response = await this.client.get(path)
    return this.unwrap(path, response.data)
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await this.client.post(path, body)
    return this.unwrap(path, response.data)
  }

  private remember(record: DeviceRecord) {
    this.platforms.set(record.deviceId, toPlatform(record.platformType))
  }

  public async getDevices(): Promise<DeviceRecord[]> {
    const { item } = dashboardSchema.parse(await this.get('service/application/dashboard'))
    for (const record of item) {
      this.remember(record)
    }
    return item
  }

  public async getDevice(deviceId: string): Promise<DeviceRecord> {
    const record = deviceRecordSchema.parse(await this.get(`service/devices/${deviceId}`))
    this.remember(record)
    return record
  }

  /**
   * Device record plus the model metadata downloaded from its modelJsonUri
   */
  public async getDeviceInfo(deviceId: string): Promise<DeviceInfo> {
    const record = await this.getDevice(deviceId)
    const descriptor = toDescriptor(record)

    if (!record.modelJsonUri) {
      logger.warn(`Device ${deviceId} has no model metadata, enum codes will not be resolved`)
      return new DeviceInfo(descriptor, EMPTY_MODEL)
    }

    // Plain request, the ThinQ headers only go to the API host
    const response = await axios.get(record.modelJsonUri, { timeout: API_TIMEOUT_MS })
    logger.debug('Model info:', response.data)
    return new DeviceInfo(descriptor, parseModelInfo(response.data))
  }

  /**
   * The rich per-device query runs at most once per additional poll interval (seconds) of the
   * device's platform; other polls read the dashboard snapshot.
   */
  public async requestPayload(request: PollRequest): Promise<RawPayload | null> {
    const { deviceId, category } = request
    const platform = this.platforms.get(deviceId) ?? 'thinq2'
    const interval = platform === 'thinq1' ? request.additionalPollIntervalV1 : request.additionalPollIntervalV2
    const lastQuery = this.lastDeviceQuery.get(deviceId)
    const now = Date.now()
    const queryDue = request.queryDevice && (lastQuery === undefined || now - lastQuery >= interval * 1000)

    let record: DeviceRecord | undefined
    if (queryDue) {
      record = await this.getDevice(deviceId)
      this.lastDeviceQuery.set(deviceId, now)
    } else {
      const devices = await this.getDevices()
      record = devices.find((device) => device.deviceId === deviceId)
    }

    const snapshot = record?.snapshot
    if (!snapshot) {
      logger.debug(`No snapshot for device ${deviceId}`)
      return null
    }

    const payload = snapshot[category]
    return isRecord(payload) ? payload : snapshot
  }

  public async sendCommand(deviceId: string, group: string, command: string | null, value: string | null) {
    logger.info('Sending command to device:', deviceId, 'Command:', { group, command, value })
    await this.post(`service/devices/${deviceId}/control-sync`, {
      ctrlKey: group,
      command,
      dataKey: null,
      dataValue: value,
    })
  }
}

export default ThinQClient

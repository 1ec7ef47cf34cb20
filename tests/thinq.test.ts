import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ThinQApiError } from '../src/errors.js'
import ThinQClient, { formatAxiosError, toDescriptor, toPlatform } from '../src/thinq.js'
import { v1Model } from './fixtures/devices.js'

const mocks = vi.hoisted(() => ({
  get: vi.fn(),
  plainGet: vi.fn(),
  post: vi.fn(),
  use: vi.fn(),
}))

vi.mock('axios', () => ({
  default: {
    get: mocks.plainGet,
    create: vi.fn(() => ({
      get: mocks.get,
      post: mocks.post,
      interceptors: { request: { use: mocks.use } },
    })),
    isAxiosError: (error: unknown) => typeof error === 'object' && error !== null && 'isAxiosError' in error,
  },
}))

vi.mock('../src/logger.js', () => ({
  default: vi.fn(() => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  })),
}))

const ok = (result?: unknown) => ({ data: { resultCode: '0000', result } })

const options = {
  apiUrl: 'https://thinq.example.test/v1/',
  apiKey: 'test-api-key',
  accessToken: 'test-token',
  userNumber: 'test-user',
  countryCode: 'FI',
}

const robotRecord = {
  deviceId: 'robot-1',
  alias: 'Hallway robot',
  modelName: 'RK-TEST',
  deviceType: 501,
  platformType: 'thinq2',
}

describe('ThinQClient', () => {
  let client: ThinQClient

  beforeEach(() => {
    vi.clearAllMocks()
    mocks.get.mockReset()
    mocks.post.mockReset()
    mocks.plainGet.mockReset()
    client = new ThinQClient(options)
  })

  it('should configure the API headers', async () => {
    const axios = (await import('axios')).default

    expect(axios.create).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://thinq.example.test/v1/',
        timeout: 10000,
        headers: expect.objectContaining({
          'x-api-key': 'test-api-key',
          'x-emp-token': 'test-token',
          'x-user-no': 'test-user',
          'x-client-id': 'test-user',
          'x-country-code': 'FI',
          'x-language-code': 'en-US',
        }),
      }),
    )
  })

  it('should tag every request with a message id', () => {
    const [interceptor] = mocks.use.mock.calls[0]
    const request = { headers: { set: vi.fn() } }

    expect(interceptor(request)).toBe(request)
    expect(request.headers.set).toHaveBeenCalledWith('x-message-id', expect.any(String))
  })

  describe('getDevices', () => {
    it('should read the dashboard', async () => {
      mocks.get.mockResolvedValueOnce(ok({ item: [robotRecord] }))

      const devices = await client.getDevices()

      expect(mocks.get).toHaveBeenCalledWith('service/application/dashboard')
      expect(devices).toEqual([robotRecord])
    })

    it('should reject a non-success result code', async () => {
      mocks.get.mockResolvedValueOnce({ data: { resultCode: '0110' } })

      const request = client.getDevices()
      await expect(request).rejects.toBeInstanceOf(ThinQApiError)
      await expect(request).rejects.toThrow('ThinQ API returned result code 0110 for service/application/dashboard')
    })
  })

  describe('getDeviceInfo', () => {
    it('should download and parse the model metadata', async () => {
      mocks.get.mockResolvedValueOnce(
        ok({ ...robotRecord, modelJsonUri: 'https://models.example.test/rk.json' }),
      )
      mocks.plainGet.mockResolvedValueOnce({ data: v1Model })

      const info = await client.getDeviceInfo('robot-1')

      expect(mocks.get).toHaveBeenCalledTimes(1)
      expect(mocks.get).toHaveBeenCalledWith('service/devices/robot-1')
      // Fetched without the API instance, so no ThinQ headers are attached
      expect(mocks.plainGet).toHaveBeenCalledWith('https://models.example.test/rk.json', { timeout: 10000 })
      expect(info.name).toBe('Hallway robot')
      expect(info.category).toBe('robotKing')
      expect(info.productType).toBe('ROBOT_KING')
      expect(info.hasControls).toBe(true)
    })

    it('should fall back to empty metadata without a model uri', async () => {
      mocks.get.mockResolvedValueOnce(ok(robotRecord))

      const info = await client.getDeviceInfo('robot-1')

      expect(mocks.get).toHaveBeenCalledTimes(1)
      expect(mocks.plainGet).not.toHaveBeenCalled()
      expect(info.productType).toBeNull()
      expect(info.enumName(['State'], '3')).toBe('3')
    })
  })

  describe('requestPayload', () => {
    const request = {
      deviceId: 'robot-1',
      category: 'robotKing',
      additionalPollIntervalV1: 300,
      additionalPollIntervalV2: 300,
      queryDevice: true,
    }

    it('should query the device first, then read the dashboard within the interval', async () => {
      mocks.get
        .mockResolvedValueOnce(ok({ ...robotRecord, snapshot: { robotKing: { State: '2' }, online: true } }))
        .mockResolvedValueOnce(ok({ item: [{ ...robotRecord, snapshot: { State: '3' } }] }))

      expect(await client.requestPayload(request)).toEqual({ State: '2' })
      expect(await client.requestPayload(request)).toEqual({ State: '3' })
      expect(mocks.get.mock.calls.map(([path]) => path)).toEqual([
        'service/devices/robot-1',
        'service/application/dashboard',
      ])
    })

    it('should query the device again once the interval elapsed', async () => {
      vi.useFakeTimers()
      try {
        mocks.get.mockResolvedValue(ok({ ...robotRecord, snapshot: { robotKing: { State: '2' } } }))

        await client.requestPayload(request)
        vi.advanceTimersByTime(300_000)
        await client.requestPayload(request)

        expect(mocks.get).toHaveBeenCalledTimes(2)
        expect(mocks.get).toHaveBeenLastCalledWith('service/devices/robot-1')
      } finally {
        vi.useRealTimers()
      }
    })

    it('should read the dashboard when device queries are off', async () => {
      mocks.get.mockResolvedValueOnce(ok({ item: [] }))

      expect(await client.requestPayload({ ...request, queryDevice: false })).toBeNull()
      expect(mocks.get).toHaveBeenCalledWith('service/application/dashboard')
    })

    it('should return null for a device without snapshot', async () => {
      mocks.get.mockResolvedValueOnce(ok({ ...robotRecord, snapshot: null }))

      expect(await client.requestPayload(request)).toBeNull()
    })
  })

  describe('sendCommand', () => {
    it('should post a control request', async () => {
      mocks.post.mockResolvedValueOnce(ok())

      await client.sendCommand('robot-1', 'Set', 'Wakeup', null)

      expect(mocks.post).toHaveBeenCalledWith('service/devices/robot-1/control-sync', {
        ctrlKey: 'Set',
        command: 'Wakeup',
        dataKey: null,
        dataValue: null,
      })
    })

    it('should reject when the cloud refuses the command', async () => {
      mocks.post.mockResolvedValueOnce({ data: { resultCode: '0106' } })

      await expect(client.sendCommand('robot-1', 'Set', 'Wakeup', null)).rejects.toThrow(ThinQApiError)
    })
  })
})

describe('thinq helpers', () => {
  it('should map platform types', () => {
    expect(toPlatform('THINQ1')).toBe('thinq1')
    expect(toPlatform('thinq2')).toBe('thinq2')
    expect(toPlatform(undefined)).toBe('thinq2')
  })

  it('should build a descriptor from a device record', () => {
    expect(toDescriptor(robotRecord)).toEqual({
      deviceId: 'robot-1',
      alias: 'Hallway robot',
      modelName: 'RK-TEST',
      category: 'robotKing',
      platform: 'thinq2',
    })
    expect(toDescriptor({ deviceId: 'washer-1', deviceType: 201 })).toEqual({
      deviceId: 'washer-1',
      alias: 'washer-1',
      modelName: 'unknown',
      category: '201',
      platform: 'thinq2',
    })
  })

  describe('formatAxiosError', () => {
    it('should summarize an HTTP error', () => {
      const error = {
        isAxiosError: true,
        message: 'Request failed with status code 404',
        response: { status: 404, statusText: 'Not Found', data: { resultCode: '0106' } },
        config: { method: 'get', url: 'https://thinq.example.test/v1/service/devices/robot-1' },
      }

      expect(formatAxiosError(error)).toBe(
        'Request failed with status code 404 (404 Not Found) [GET /v1/service/devices/robot-1] - {"resultCode":"0106"}',
      )
    })

    it('should format other errors', () => {
      expect(formatAxiosError(new ThinQApiError('0110', 'service/application/dashboard'))).toBe(
        'ThinQApiError: ThinQ API returned result code 0110 for service/application/dashboard',
      )
      expect(formatAxiosError('offline')).toBe('offline')
    })
  })
})

import fs from 'node:fs'
import { z } from 'zod'
import { ApplianceFactory } from './appliances/factory.js'
import { DeviceBridge } from './bridge.js'
import config from './config.js'
import createLogger from './logger.js'
import Mqtt from './mqtt.js'
import ThinQClient, { formatAxiosError, toDescriptor } from './thinq.js'

const packageSchema = z.object({ version: z.string() })
const packageVersion = packageSchema.parse(
  JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8')),
).version

const appVersion = process.env.APP_VERSION ?? packageVersion
const logger = createLogger('app')
const mqtt = new Mqtt()
const client = new ThinQClient(config.thinq)

const refreshInterval = (config.thinq.refreshInterval ?? 60) * 1000
const bridges: DeviceBridge[] = []
let stopping = false

const resolveDeviceIds = async (): Promise<string[]> => {
  if (config.thinq.devices && config.thinq.devices.length > 0) {
    return config.thinq.devices
  }

  const supported = ApplianceFactory.getSupportedCategories()
  const records = await client.getDevices()
  return records.filter((record) => supported.includes(toDescriptor(record).category)).map(({ deviceId }) => deviceId)
}

const startBridge = async (deviceId: string, index: number, intervalDelay: number) => {
  const info = await client.getDeviceInfo(deviceId)
  const device = ApplianceFactory.create(client, info)
  const bridge = new DeviceBridge(device, mqtt, createLogger(`bridge:${deviceId}`), {
    topicPrefix: mqtt.topicPrefix,
    showChanges: config.logging?.showChanges,
    ignoredKeys: config.logging?.ignoredKeys,
  })

  // Shutdown may have started while the device info was loading
  if (stopping) return

  if (config.homeAssistant.autoDiscovery) {
    bridge.publishAutoDiscovery()
  }

  bridges.push(bridge)
  bridge.start(index * intervalDelay, refreshInterval)

  mqtt.subscribe(`${deviceId}/command`, (topic, message) => {
    logger.info('Received command on topic:', topic, 'Message:', message.toString())
    bridge.handleCommand(message).catch((error: unknown) => {
      logger.error(`Command for device ${deviceId} failed:`, formatAxiosError(error))
    })
  })
}

const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down`)
  stopping = true
  for (const bridge of bridges) {
    bridge.stop()
  }
  mqtt.disconnect()
}

const main = async () => {
  logger.info(
    `Starting ThinQ robot to MQTT version: "${appVersion}", with refresh interval: ${refreshInterval / 1000} seconds`,
  )

  const deviceIds = await resolveDeviceIds()
  if (deviceIds.length === 0) {
    logger.warn('No supported devices found')
    return
  }

  const intervalDelay = refreshInterval / deviceIds.length
  for (const [index, deviceId] of deviceIds.entries()) {
    if (stopping) break
    try {
      await startBridge(deviceId, index, intervalDelay)
    } catch (error) {
      logger.error(`Failed to set up device ${deviceId}:`, formatAxiosError(error))
    }
  }
}

process.once('SIGINT', () => shutdown('SIGINT'))
process.once('SIGTERM', () => shutdown('SIGTERM'))

main().catch((error: unknown) => {
  logger.error('Startup failed:', formatAxiosError(error))
  process.exitCode = 1
})

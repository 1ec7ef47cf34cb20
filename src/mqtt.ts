import mqtt, { type IClientPublishOptions, type MqttClient } from 'mqtt'
import config from './config.js'
import createLogger from './logger.js'
import type { HAComponent } from './types/homeassistant.js'

type QoS = 0 | 1 | 2

const logger = createLogger('mqtt')

const retain = config.mqtt.retain ?? false
const qos: QoS = config.mqtt.qos ?? 0

const defaultOptions: IClientPublishOptions = {
  retain,
  qos,
}

const client = mqtt.connect(config.mqtt.url, {
  clientId: `${config.mqtt.clientId ?? config.mqtt.username}-thinq`,
  username: config.mqtt.username,
  password: config.mqtt.password,
  clean: true,
})

// Exact-topic router: topic -> handler(topic, payload)
const topicHandlers = new Map<string, (topic: string, message: Buffer) => void>()

client
  .on('connect', () => {
    logger.info(`Connected to MQTT broker: ${config.mqtt.url}`)
  })
  .on('error', (error) => {
    logger.error('MQTT connection error:', error)
  })
  .on('reconnect', () => {
    logger.info('Reconnecting to MQTT broker...')
  })
  .on('close', () => {
    logger.info('MQTT connection closed')
  })
  .on('offline', () => {
    logger.warn('MQTT client is offline')
  })
  .on('message', (incomingTopic, message) => {
    const handler = topicHandlers.get(incomingTopic)
    if (!handler) return

    logger.debug('Received message on topic:', incomingTopic, 'Message:', message.toString())
    try {
      handler(incomingTopic, message)
    } catch (e) {
      logger.error('Handler error for topic', incomingTopic, e)
    }
  })

export interface IMqtt {
  topicPrefix: string
  resolveDeviceTopic(topic: string): string
  publish(topic: string, message: string, options?: IClientPublishOptions): void
  autoDiscovery(component: HAComponent, deviceId: string, objectId: string, message: string): void
  subscribe(topic: string, callback: (topic: string, message: Buffer) => void): void
  unsubscribe(topic: string): void
  disconnect(): void
}

class Mqtt implements IMqtt {
  public client: MqttClient
  public topicPrefix: string

  constructor() {
    this.client = client
    this.topicPrefix = `${config.mqtt.topicPrefix ?? 'thinq_'}robots`
  }

  private _publish(topic: string, message: string, options?: IClientPublishOptions) {
    logger.debug('Publishing to topic:', topic, 'Message:', message)
    const publishOptions = {
      ...defaultOptions,
      ...options,
    }
    this.client.publish(topic, message, publishOptions, (error) => {
      if (error) {
        logger.error('Error publishing message:', error)
      } else {
        logger.debug(`Message published to topic "${topic}" successfully`, publishOptions)
      }
    })
  }

  public resolveDeviceTopic(topic: string) {
    return `${this.topicPrefix}/${topic}`
  }

  public publish(topic: string, message: string, options?: IClientPublishOptions) {
    this._publish(this.resolveDeviceTopic(topic), message, options)
  }

  public autoDiscovery(component: HAComponent, deviceId: string, objectId: string, message: string) {
    logger.info(`Publishing auto-discovery config for ${component} "${objectId}" of device: ${deviceId}`)
    this._publish(`homeassistant/${component}/${deviceId}/${objectId}/config`, message, {
      retain: true,
      qos: 2,
    })
  }

  public subscribe(topic: string, callback: (topic: string, message: Buffer) => void) {
    const fullTopic = this.resolveDeviceTopic(topic)
    logger.debug('Subscribing to topic:', fullTopic)

    this.client.subscribe(fullTopic, (error) => {
      if (error) {
        logger.error('Error subscribing to topic:', error)
        return
      }

      logger.info(`Subscribed to topic "${fullTopic}" successfully`)
      topicHandlers.set(fullTopic, callback)
    })
  }

  public unsubscribe(topic: string) {
    const fullTopic = this.resolveDeviceTopic(topic)
    logger.debug('Unsubscribing from topic:', fullTopic)

    this.client.unsubscribe(fullTopic, (error) => {
      if (error) {
        logger.error('Error unsubscribing from topic:', error)
      } else {
        logger.info(`Unsubscribed from topic "${fullTopic}" successfully`)
      }
    })

    topicHandlers.delete(fullTopic)
  }

  public disconnect() {
    this.client.end(() => {
      logger.info('Disconnected from MQTT broker')
    })
  }
}

export default Mqtt

import type { DeviceInfo } from '../device-info.js'
import createLogger, { type Logger } from '../logger.js'
import type { DeviceTransport } from '../types/device.js'
import type { BaseDevice } from './base.js'
import { RobotKingDevice } from './robot-king.js'
import { ROBOT_KING_CATEGORY } from './vocabulary.js'

const logger = createLogger('factory')

/**
 * Factory for creating device instances based on the device metadata
 * The device category comes from the ThinQ device record, the product type from the model JSON
 */
export class ApplianceFactory {
  /**
   * Create a device instance
   * @param deviceLogger - Logger handed to the device, defaults to one named after the device id
   * @throws Error when no device class handles the category
   */
  public static create(transport: DeviceTransport, info: DeviceInfo, deviceLogger?: Logger): BaseDevice {
    const { deviceId, category, productType, modelName } = info

    logger.debug(`Creating device instance for model: ${modelName}, category: ${category}, productType: ${productType}`)

    if (category === ROBOT_KING_CATEGORY || productType === 'ROBOT_KING') {
      logger.info(`Matched device ${deviceId} to RobotKing`)
      return new RobotKingDevice(transport, info, deviceLogger ?? createLogger(`robot-king:${deviceId}`))
    }

    throw new Error(`Unsupported device ${deviceId}: category ${category}, product type ${productType ?? 'unknown'}`)
  }

  /**
   * Get a list of all supported device categories
   */
  public static getSupportedCategories(): string[] {
    return [ROBOT_KING_CATEGORY]
  }
}

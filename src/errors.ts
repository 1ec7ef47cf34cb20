/**
 * Error types raised by the robot controller and the ThinQ transport
 */

/**
 * Thrown when a command is requested while the appliance is in a state that does not accept it,
 * e.g. waking up a robot that is not in standby. Not retriable: re-check the state first.
 */
export class InvalidDeviceStatus extends Error {
  constructor(message = 'Device is not in a valid status for this command') {
    super(message)
    this.name = 'InvalidDeviceStatus'
  }
}

/**
 * Thrown when the device metadata declares a control table but none of the candidate command keys are in it
 */
export class CommandNotSupportedError extends Error {
  public readonly candidates: string[]

  constructor(candidates: string[]) {
    super(`None of the command keys are supported by the device: ${candidates.join(', ')}`)
    this.name = 'CommandNotSupportedError'
    this.candidates = candidates
  }
}

/**
 * The ThinQ API answered with a non-success result code
 */
export class ThinQApiError extends Error {
  public readonly resultCode: string

  constructor(resultCode: string, path: string) {
    super(`ThinQ API returned result code ${resultCode} for ${path}`)
    this.name = 'ThinQApiError'
    this.resultCode = resultCode
  }
}

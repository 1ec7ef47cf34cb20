import fs from 'node:fs'
import util from 'node:util'
import pino from 'pino'

export interface Logger {
  info: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

const getTimezone = () => {
  if (process.env.TZ) {
    return process.env.TZ
  }
  try {
    return fs.readFileSync('/etc/timezone', 'utf8').trim()
  } catch {
    // macOS has no /etc/timezone, /etc/localtime is a symlink into zoneinfo
    try {
      const match = fs.readlinkSync('/etc/localtime').match(/zoneinfo\/(.*)/)
      if (match) {
        return match[1]
      }
    } catch {
      // fall through to UTC
    }
    return 'UTC'
  }
}

const timeZone = getTimezone()

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  timestamp: () =>
    `,"time":"${new Date().toLocaleString(undefined, {
      timeZone,
    })}"`,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
    },
  },
})

export const stringifyArgs = (args: unknown[]): string => {
  return args
    .map((arg) => {
      if (typeof arg === 'object' && arg !== null) {
        return util.inspect(arg, { colors: true, depth: null })
      }
      return String(arg)
    })
    .join(' ')
}

const createLogger = (name: string): Logger => {
  const logger = baseLogger.child({
    name: name.toUpperCase(),
  })

  return {
    info: (...args: unknown[]) => logger.info(stringifyArgs(args)),
    error: (...args: unknown[]) => logger.error(stringifyArgs(args)),
    warn: (...args: unknown[]) => logger.warn(stringifyArgs(args)),
    debug: (...args: unknown[]) => {
      // Payload dumps are large, skip inspecting them when debug is off
      if (logger.isLevelEnabled('debug')) {
        logger.debug(stringifyArgs(args))
      }
    },
  }
}

export default createLogger

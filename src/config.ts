import fs from 'node:fs'
import path from 'node:path'
import yaml from 'yaml'
import { z } from 'zod'

const configSchema = z.object({
  mqtt: z.object({
    url: z.string().regex(/^mqtts?:\/\/.+/, 'mqtt.url must start with mqtt:// or mqtts://'),
    clientId: z.string().optional(),
    username: z.string(),
    password: z.string(),
    topicPrefix: z.string().optional(),
    retain: z.boolean().optional(),
    qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
  }),
  thinq: z.object({
    apiUrl: z.string().url('thinq.apiUrl must be a valid URL'),
    apiKey: z.string(),
    accessToken: z.string(),
    userNumber: z.string(),
    clientId: z.string().optional(),
    countryCode: z.string().length(2, 'thinq.countryCode must be a two letter country code'),
    languageCode: z.string().optional(),
    refreshInterval: z
      .number()
      .int()
      .min(10, 'thinq.refreshInterval must be at least 10 seconds')
      .max(3600, 'thinq.refreshInterval should not exceed 3600 seconds')
      .optional(),
    devices: z.array(z.string()).optional(),
  }),
  homeAssistant: z.object({
    autoDiscovery: z.boolean(),
  }),
  logging: z
    .object({
      showChanges: z.boolean().optional(),
      ignoredKeys: z.array(z.string()).optional(),
    })
    .optional(),
})

export type AppConfig = z.infer<typeof configSchema>

const envSchema = z.object({
  MQTT_URL: z.string(),
  MQTT_USERNAME: z.string(),
  MQTT_PASSWORD: z.string(),
  THINQ_API_URL: z.string().url('THINQ_API_URL must be a valid URL'),
  THINQ_API_KEY: z.string(),
  THINQ_ACCESS_TOKEN: z.string(),
  THINQ_USER_NUMBER: z.string(),
  THINQ_COUNTRY_CODE: z.string().length(2, 'THINQ_COUNTRY_CODE must be a two letter country code'),
  MQTT_CLIENT_ID: z.string().default('thinq-robot'),
  MQTT_TOPIC_PREFIX: z.string().default('thinq_'),
  MQTT_RETAIN: z
    .string()
    .default('false')
    .transform((val) => val.toLowerCase() === 'true'),
  MQTT_QOS: z.coerce.number().int().min(0).max(2).default(2),
  THINQ_LANGUAGE_CODE: z.string().default('en-US'),
  THINQ_REFRESH_INTERVAL: z.coerce
    .number()
    .int()
    .min(10, 'THINQ_REFRESH_INTERVAL must be at least 10 seconds')
    .max(3600, 'THINQ_REFRESH_INTERVAL should not exceed 3600 seconds')
    .default(60),
  THINQ_DEVICES: z
    .string()
    .default('')
    .transform((val) => (val ? val.split(',').map((id) => id.trim()) : [])),
  HOME_ASSISTANT_AUTO_DISCOVERY: z
    .string()
    .default('true')
    .transform((val) => val.toLowerCase() === 'true'),
  LOGGING_SHOW_CHANGES: z
    .string()
    .default('true')
    .transform((val) => val.toLowerCase() === 'true'),
  LOGGING_IGNORED_KEYS: z
    .string()
    .default('')
    .transform((val) => (val ? val.split(',').map((k) => k.trim()) : [])),
})

const isTestEnvironment = () => process.env.NODE_ENV === 'test' || !!process.env.VITEST

// Which config file to use
// - CONFIG_FILE_OVERRIDE: explicitly set config file (for testing)
// - Regular tests: tests/config.yml (committed to repo)
// - Production: config.yml
const getConfigFilename = (): string => {
  if (process.env.CONFIG_FILE_OVERRIDE) {
    return process.env.CONFIG_FILE_OVERRIDE
  }
  if (isTestEnvironment()) {
    return 'tests/config.yml'
  }
  return 'config.yml'
}

const configFilename = getConfigFilename()
const configPath = path.resolve(path.dirname(new URL(import.meta.url).pathname), `../${configFilename}`)

const reportIssues = (title: string, error: z.ZodError) => {
  console.error(title)
  for (const issue of error.issues) {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`)
  }
}

export function createConfigFromEnv(): void {
  console.info('Config file not found. Creating from environment variables...')

  let envConfig: z.infer<typeof envSchema>
  try {
    envConfig = envSchema.parse(process.env)
  } catch (error) {
    if (error instanceof z.ZodError) {
      reportIssues('Environment variable validation failed:', error)
      if (!isTestEnvironment()) {
        process.exit(1)
      }
      return
    }
    throw error
  }

  const devices = envConfig.THINQ_DEVICES.length > 0 ? `  devices: [${envConfig.THINQ_DEVICES.join(', ')}]\n` : ''

  const configContent = `mqtt:
  clientId: ${envConfig.MQTT_CLIENT_ID}
  url: ${envConfig.MQTT_URL}
  username: ${envConfig.MQTT_USERNAME}
  password: ${envConfig.MQTT_PASSWORD}
  topicPrefix: ${envConfig.MQTT_TOPIC_PREFIX}
  retain: ${envConfig.MQTT_RETAIN}
  qos: ${envConfig.MQTT_QOS}

thinq:
  apiUrl: ${envConfig.THINQ_API_URL}
  apiKey: ${envConfig.THINQ_API_KEY}
  accessToken: ${envConfig.THINQ_ACCESS_TOKEN}
  userNumber: '${envConfig.THINQ_USER_NUMBER}'
  countryCode: ${envConfig.THINQ_COUNTRY_CODE}
  languageCode: ${envConfig.THINQ_LANGUAGE_CODE}
  refreshInterval: ${envConfig.THINQ_REFRESH_INTERVAL}
${devices}
homeAssistant:
  autoDiscovery: ${envConfig.HOME_ASSISTANT_AUTO_DISCOVERY}

logging:
  showChanges: ${envConfig.LOGGING_SHOW_CHANGES}
  ignoredKeys: [${envConfig.LOGGING_IGNORED_KEYS.join(', ')}]
`

  fs.writeFileSync(configPath, configContent, 'utf8')
  console.info('Config file created successfully.')
}

/**
 * Validate a parsed YAML document, reporting every issue before rethrowing
 */
export function parseConfig(rawConfig: unknown): AppConfig {
  try {
    return configSchema.parse(rawConfig)
  } catch (error) {
    if (error instanceof z.ZodError) {
      reportIssues('Configuration validation failed:', error)
      if (!isTestEnvironment()) {
        process.exit(1)
      }
    }
    throw error
  }
}

// Create config from environment variables if it doesn't exist
if (!fs.existsSync(configPath)) {
  createConfigFromEnv()
}

const config = parseConfig(yaml.parse(fs.readFileSync(configPath, 'utf8')))

export default config

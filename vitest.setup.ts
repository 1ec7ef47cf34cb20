// Console output of the config loader is silenced unless LOG_LEVEL asks for it:
//   debug -> everything, info -> info/warn/error, warn -> warn/error, error -> error only
const logLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'off'

const levelMap: Record<string, Set<string>> = {
  debug: new Set(['log', 'info', 'debug', 'warn', 'error']),
  info: new Set(['info', 'warn', 'error']),
  warn: new Set(['warn', 'error']),
  error: new Set(['error']),
  off: new Set(),
}

const activeLevel = levelMap[logLevel] ?? levelMap.off
const silence = () => {}

if (!activeLevel.has('log')) console.log = silence
if (!activeLevel.has('info')) console.info = silence
if (!activeLevel.has('debug')) console.debug = silence
if (!activeLevel.has('warn')) console.warn = silence
if (!activeLevel.has('error')) console.error = silence

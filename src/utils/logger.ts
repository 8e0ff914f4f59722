import pino from 'pino'
import type { Config } from '@/types/index'

/** Subset of {@link Config} consumed by the logger. */
type LoggerConfig = Pick<Config, 'logFile' | 'logLevel' | 'logPretty'>

let _loggerConfig: LoggerConfig | null = null

/**
 * Injects runtime config into the logger subsystem.
 *
 * Must be called before the first log line of any logger is written, so the
 * CLI calls it right after loading `.shelfrc`. Priority for each setting:
 * config value → environment variable → built-in default.
 *
 * @param config - Logger-relevant slice of the loaded {@link Config}.
 */
export function setLoggerConfig(config: LoggerConfig): void {
  _loggerConfig = config
}

function buildLogger(name: string): pino.Logger {
  const level = _loggerConfig?.logLevel ?? process.env.LOG_LEVEL ?? 'info'
  const pretty = _loggerConfig?.logPretty ?? process.env.LOG_PRETTY === '1'
  const logFile = _loggerConfig?.logFile || process.env.SHELF_LOG_FILE || ''

  if (pretty) {
    try {
      return pino(
        { name, level },
        pino.transport({ target: 'pino-pretty', options: { colorize: true, destination: 2 } })
      )
    } catch {
      // pino-pretty not resolvable; fall through to JSON lines
    }
  }

  // Stream entries pass everything through; the logger's own level filters.
  const destinations: Parameters<typeof pino.multistream>[0] = [
    { level: 'trace', stream: pino.destination(2) }
  ]
  if (logFile) {
    destinations.push({
      level: 'trace',
      stream: pino.destination({ dest: logFile, mkdir: true })
    })
  }
  return pino({ name, level }, pino.multistream(destinations))
}

/**
 * Create a named child logger. The underlying pino instance is built lazily
 * on first use so that {@link setLoggerConfig} can run after module load.
 *
 * Environment overrides: `LOG_LEVEL`, `LOG_PRETTY=1`, `SHELF_LOG_FILE=/abs/path`.
 *
 * @category Utilities
 */
export function createLogger(name: string): pino.Logger {
  let instance: pino.Logger | null = null
  const get = () => (instance ??= buildLogger(name))
  return new Proxy({} as pino.Logger, {
    get: (_t, prop) => {
      const val = get()[prop as keyof pino.Logger]
      return typeof val === 'function' ? (val as Function).bind(get()) : val
    }
  })
}

/**
 * Root logger for src/index.ts and top-level use.
 *
 * @category Utilities
 */
export const logger = createLogger('shelf')

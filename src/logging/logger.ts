/**
 * Logging for quality evaluation and consistency checks
 * @module logging/logger
 */

/**
 * Logger interface accepted by every component
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Creates a console logger that drops messages below `level`
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel) =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level]

  return {
    debug: (message, context) => {
      if (enabled('debug')) console.log(`[DEBUG] ${message}`, context ?? '')
    },
    info: (message, context) => {
      if (enabled('info')) console.log(`[INFO] ${message}`, context ?? '')
    },
    warn: (message, context) => {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, context ?? '')
    },
    error: (message, context) => {
      if (enabled('error')) console.error(`[ERROR] ${message}`, context ?? '')
    },
  }
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger('info')

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(
  componentName: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${componentName}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}

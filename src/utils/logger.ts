/**
 * Logger interface for pipeline logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Console logger with level prefixes
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

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
 * Creates a logger that tags messages with a component or source name
 */
export function createPrefixedLogger(name: string, baseLogger: Logger): Logger {
  const prefix = `[${name}]`
  return {
    debug: (message, context) => baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) => baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) => baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) => baseLogger.error(`${prefix} ${message}`, context),
  }
}

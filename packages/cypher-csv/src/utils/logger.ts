/**
 * Logging
 *
 * Leveled, component-scoped logging for the codec. Output goes to the
 * console unless a custom handler is configured.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface LogContext {
  [key: string]: unknown
}

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel
  /** Custom log handler (for testing or custom output) */
  handler?: (level: LogLevel, message: string, context?: LogContext) => void
}

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const DEFAULT_CONFIG: LoggerConfig = { level: 'warn' }

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG }

/**
 * Configure the global logger.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config }
}

/**
 * Reset logger to default configuration.
 */
export function resetLogger(): void {
  globalConfig = { ...DEFAULT_CONFIG }
}

/**
 * BigInt values are not JSON-serializable, so render them as text.
 */
function stringifyContext(context: LogContext): string {
  return JSON.stringify(context, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  )
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[globalConfig.level]) {
    return
  }

  if (globalConfig.handler) {
    globalConfig.handler(level, message, context)
    return
  }

  let formatted = `[${level.toUpperCase()}] ${message}`
  if (context && Object.keys(context).length > 0) {
    formatted += ` ${stringifyContext(context)}`
  }

  switch (level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
      console.error(formatted)
      break
  }
}

/**
 * Create a logger whose entries carry the component name in their context.
 */
export function createLogger(component: string): Logger {
  return {
    debug(message, context) {
      log('debug', message, { component, ...context })
    },
    info(message, context) {
      log('info', message, { component, ...context })
    },
    warn(message, context) {
      log('warn', message, { component, ...context })
    },
    error(message, context) {
      log('error', message, { component, ...context })
    },
  }
}

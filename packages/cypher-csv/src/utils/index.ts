/**
 * Utilities Module
 */

export { configureLogger, resetLogger, createLogger } from './logger'
export type { Logger, LoggerConfig, LogLevel, LogContext } from './logger'

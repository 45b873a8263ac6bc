/**
 * Logger Utility
 *
 * pino with pretty-print in development, silent under test runs.
 */

import { pino, type Logger } from 'pino'

const env = process.env.NODE_ENV
const isDev = env !== 'production' && env !== 'test'

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (env === 'test' ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): Logger {
  return baseLogger
}

/**
 * Shared Structured Logger using pino
 *
 * import { createLogger, type Logger } from '@pkgshelf/shared/logger'
 */

import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent']

function resolveEnvLevel(): string {
  const level = process.env.LOG_LEVEL
  return level && LOG_LEVELS.includes(level) ? level : 'info'
}

// pino-pretty runs in a worker thread, keep it out of production and test runs
const usePretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'

const baseLogger = pino({
  level: resolveEnvLevel(),
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
})

export interface Logger {
  trace: (message: string, data?: Record<string, unknown>) => void
  debug: (message: string, data?: Record<string, unknown>) => void
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, data?: Record<string, unknown>) => void
}

export interface LoggerConfig {
  silent?: boolean
}

type PinoMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error'

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(service: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ service })

  if (config?.silent) {
    logger.level = 'silent'
  }

  const emit =
    (method: PinoMethod) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (data) {
        logger[method](data, message)
      } else {
        logger[method](message)
      }
    }

  return {
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  }
}

/**
 * Set the level inherited by loggers created after this call.
 */
export function setRootLogLevel(level: LogLevel | 'silent'): void {
  baseLogger.level = level
}

export function getRootLogLevel(): string {
  return baseLogger.level
}

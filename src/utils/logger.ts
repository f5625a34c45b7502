/**
 * Logger Utility
 *
 * pino with pretty-print in development.
 */

import { pino } from 'pino'

const isDev = process.env.NODE_ENV === 'development'

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL
  if (process.env.NODE_ENV === 'test') return 'silent'
  return isDev ? 'debug' : 'info'
}

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: defaultLevel(),
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

const children = new Set<pino.Logger>()

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  const child = baseLogger.child({ component })
  children.add(child)
  return child
}

/**
 * Apply a level to the base logger and every component logger created so far.
 * Children keep their own level once created, so each one is updated.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
  for (const child of children) {
    child.level = level
  }
}

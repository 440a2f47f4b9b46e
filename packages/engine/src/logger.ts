/**
 * Shared pino logger
 */

import { pino, type Logger } from 'pino'

export type { Logger }

let root: Logger | null = null

function createRoot(): Logger {
  const pretty = process.env.LOG_PRETTY !== 'false'
  return pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  })
}

/**
 * Get a child logger bound to a module name
 */
export function createLogger(name: string): Logger {
  if (!root) {
    root = createRoot()
  }
  return root.child({ module: name })
}

/**
 * Logger that drops everything (tests, embedding hosts)
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

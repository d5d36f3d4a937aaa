/**
 * Logger
 *
 * pino logger shared by the planner, notifier and CLI.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino'

export type { Logger } from 'pino'

export type LoggerOptions = {
  level?: LevelWithSilent
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'meeting-rotation',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
  })
}

/** Logger that discards everything; the default when a caller supplies none */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

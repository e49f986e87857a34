/**
 * Leveled logger built from a LoggingConfig
 */

import type { LoggingConfig, LogLevel } from '../types'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

export interface Logger {
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
  isEnabled(level: LogLevel): boolean
}

/**
 * Create a logger that forwards to `config.logger` every message at or above
 * `config.level`. Without a config or a logger function nothing is emitted.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const sink = config?.logger
  const threshold = LEVEL_PRIORITY[config?.level ?? 'info']

  const isEnabled = (level: LogLevel): boolean =>
    sink !== undefined && LEVEL_PRIORITY[level] <= threshold

  const emit = (level: LogLevel, message: string): void => {
    if (sink && isEnabled(level)) {
      sink(level, message)
    }
  }

  return {
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
    isEnabled,
  }
}

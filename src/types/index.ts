/**
 * Shared Types
 */

export type { ParameterValue, ParameterMap, ParameterKind } from './parameter-value'
export { parameterKind, isParameterValue, freezeParameter, freezeParameters } from './parameter-value'

// Auth token types
export interface AuthToken {
  scheme: string
  principal?: string
  credentials?: string
  realm?: string
}

// Logging configuration
export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export interface LoggingConfig {
  level: LogLevel
  logger?: (level: LogLevel, message: string) => void
}

/**
 * cypher-http-client - typed client for the transactional Cypher HTTP endpoint
 */

export * from './client'
export * from './statement'
export * from './result'
export * from './transaction'

export { auth } from './auth'
export { parameterKind, isParameterValue } from './types'
export type { ParameterValue, ParameterMap, ParameterKind, LogLevel } from './types'

export const VERSION = '0.1.0'

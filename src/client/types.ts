/**
 * Client Types
 * Wire shapes of the transactional HTTP endpoint and the client configuration
 */

import type { AuthToken, LoggingConfig } from '../types'
import type { ParameterMap } from '../types/parameter-value'
import type { CypherResult } from '../result/result'

/**
 * HTTP methods used by the protocol
 */
export type HttpMethod = 'GET' | 'POST' | 'DELETE'

/**
 * One request handed to a transport
 */
export interface TransportRequest {
  method: HttpMethod
  url: string
  body?: unknown
}

/**
 * What a transport hands back: the status code, the body and the `Location`
 * header. The body is the decoded JSON value, `undefined` when it was empty,
 * or the raw text when it was not JSON.
 */
export interface TransportResponse {
  status: number
  body: unknown
  location?: string
}

/**
 * The single collaborator that performs HTTP exchanges.
 * A transport rejects only for failures below HTTP (network, timeout);
 * every status code is returned to the caller.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>
}

/**
 * HTTP configuration
 */
export interface HttpConfig {
  /** Custom fetch implementation (for environments without global fetch) */
  fetch?: typeof fetch
  /** Request timeout in milliseconds */
  timeout?: number
  /** Additional headers to send with each request */
  headers?: Record<string, string>
}

/**
 * Configuration for GraphClient
 */
export interface GraphClientConfig extends HttpConfig {
  /** Database name substituted into a discovered transaction URL */
  database?: string
  /** Logging hook */
  logging?: LoggingConfig
  /** Transport to use instead of the fetch based one */
  transport?: Transport
}

/**
 * Error reported by the endpoint for a statement or for the request as a whole
 */
export interface EndpointError {
  code: string
  message: string
}

/**
 * One statement as it is written on the wire
 */
export interface WireStatement {
  statement: string
  parameters: ParameterMap
}

/**
 * Request body of every statement-carrying call
 */
export interface StatementsPayload {
  statements: WireStatement[]
}

/**
 * Columns and rows of one executed statement, as received
 */
export interface RawResultTable {
  readonly columns: readonly string[]
  readonly rows: readonly (readonly unknown[])[]
}

/**
 * Decoded response body
 */
export interface DecodedResponse {
  results: RawResultTable[]
  errors: EndpointError[]
  /** Commit URL, present while a transaction is open */
  commit?: string
  /** Expiry of the transaction, present while a transaction is open */
  expires?: Date
}

/**
 * Results of a batch together with the errors the endpoint reported for it.
 * There is one result per submitted statement, in submission order.
 */
export interface QueryResponse {
  results: CypherResult[]
  errors: EndpointError[]
}

/**
 * Service root document of the server
 */
export interface ServiceRoot {
  transaction: string
  neo4jVersion?: string
  neo4jEdition?: string
}

/**
 * Parsed server version
 */
export interface ServerVersion {
  major: number
  minor: number
  patch: number
  raw: string
}

export type { AuthToken, LoggingConfig }

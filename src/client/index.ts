/**
 * Cypher HTTP Client
 *
 * Runs Cypher statements against the transactional HTTP endpoint of a graph
 * database and exposes typed, by-name addressable results.
 *
 * @example
 * ```typescript
 * import { GraphClient, Statement, Types, basicAuth } from 'cypher-http-client'
 *
 * const client = new GraphClient('http://localhost:7474/db/neo4j/tx', basicAuth('neo4j', 'secret'))
 *
 * const { transaction } = await client.beginTransaction([
 *   new Statement('CREATE (n:LANG {name: $name, safe: $safe})')
 *     .withParam('name', 'TypeScript')
 *     .withParam('safe', true),
 * ])
 *
 * const { results } = await transaction.execute([
 *   new Statement('MATCH (n:LANG {safe: $safe}) RETURN n.name').withParam('safe', true),
 * ])
 * for (const row of results[0].rows()) {
 *   console.log(row.get('n.name', Types.string))
 * }
 *
 * await transaction.commit()
 * ```
 */

// Main client exports
export {
  GraphClient,
  CypherQuery,
  TransactionBuilder,
  createGraphClient,
  basicAuth,
  bearerAuth,
  parseVersion,
} from './graph-client'

// Transport
export { FetchTransport, type FetchTransportConfig } from './http-client'

// Wire codec
export {
  SUCCESS_STATUS,
  encodeStatements,
  decodeResponse,
  decodeServiceRoot,
  parseExpiry,
  peekErrors,
  assertStatus,
  emptyTable,
  type ProtocolOperation,
} from './codec'

export { createLogger, type Logger } from './logger'
export { parseEndpoint, joinUrl, type ParsedEndpoint } from './uri'

// Error classes
export {
  GraphClientError,
  DriverClosedError,
  NetworkError,
  TimeoutError,
  HttpStatusError,
  AuthenticationError,
  ProtocolError,
  StatementError,
  InvalidTransactionStateError,
  ExpiredTransactionError,
  TypeCoercionError,
  TRANSACTION_GONE_CODES,
  isTransactionGone,
} from './errors'

// Types
export type {
  HttpMethod,
  Transport,
  TransportRequest,
  TransportResponse,
  HttpConfig,
  GraphClientConfig,
  EndpointError,
  WireStatement,
  StatementsPayload,
  RawResultTable,
  DecodedResponse,
  QueryResponse,
  ServiceRoot,
  ServerVersion,
  AuthToken,
  LoggingConfig,
} from './types'

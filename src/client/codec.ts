/**
 * Request Codec
 *
 * Writes statement batches in the shape the transactional endpoint expects and
 * reads its responses back into raw result tables and error lists.
 */

import { z } from 'zod'
import type { Statement } from '../statement/statement'
import { HttpStatusError, AuthenticationError, ProtocolError } from './errors'
import type {
  DecodedResponse,
  EndpointError,
  RawResultTable,
  ServiceRoot,
  StatementsPayload,
  TransportResponse,
} from './types'

/**
 * Success status codes of each protocol operation
 */
export const SUCCESS_STATUS = {
  begin: [201],
  execute: [200],
  commit: [200],
  rollback: [200],
  autocommit: [200],
  discovery: [200],
} as const

export type ProtocolOperation = keyof typeof SUCCESS_STATUS

const endpointErrorSchema = z.object({
  code: z.string(),
  message: z.string().default(''),
})

const rowSchema = z.object({
  // Cells stay opaque until a caller extracts them
  row: z.array(z.unknown()),
}).passthrough()

const resultSchema = z.object({
  columns: z.array(z.string()),
  data: z.array(rowSchema).default([]),
}).passthrough()

const responseSchema = z.object({
  results: z.array(resultSchema).default([]),
  errors: z.array(endpointErrorSchema).default([]),
  commit: z.string().optional(),
  transaction: z.object({ expires: z.string() }).passthrough().optional(),
}).passthrough()

const errorsOnlySchema = z.object({
  errors: z.array(endpointErrorSchema),
}).passthrough()

const serviceRootSchema = z.object({
  transaction: z.string(),
  neo4j_version: z.string().optional(),
  neo4j_edition: z.string().optional(),
}).passthrough()

/**
 * Encode statements into a single request body, one entry per statement
 */
export function encodeStatements(statements: readonly Statement[]): StatementsPayload {
  return {
    statements: statements.map((statement) => statement.toJSON()),
  }
}

/**
 * Parse an expiry timestamp such as `Fri, 16 Oct 2026 10:00:00 +0000`
 */
export function parseExpiry(value: string): Date {
  const time = Date.parse(value)
  if (Number.isNaN(time)) {
    throw new ProtocolError(`Unparseable transaction expiry "${value}"`)
  }
  return new Date(time)
}

/**
 * Decode a response body into raw result tables and the endpoint's errors.
 *
 * When `expected` is given, the result list is padded with empty tables so
 * there is at least one table per submitted statement.
 *
 * @throws ProtocolError when the body is missing or is not a response envelope
 */
export function decodeResponse(body: unknown, expected?: number): DecodedResponse {
  if (body === undefined) {
    throw new ProtocolError('Empty response body')
  }
  if (typeof body === 'string') {
    throw new ProtocolError('Response body is not JSON')
  }

  const parsed = responseSchema.safeParse(body)
  if (!parsed.success) {
    throw new ProtocolError(
      `Malformed response body: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      parsed.error.issues
    )
  }

  const results: RawResultTable[] = parsed.data.results.map((result) => ({
    columns: Object.freeze([...result.columns]),
    rows: Object.freeze(result.data.map((entry) => Object.freeze([...entry.row]))),
  }))

  if (expected !== undefined) {
    while (results.length < expected) {
      results.push(emptyTable())
    }
  }

  const decoded: DecodedResponse = {
    results,
    errors: parsed.data.errors,
  }
  if (parsed.data.commit !== undefined) {
    decoded.commit = parsed.data.commit
  }
  if (parsed.data.transaction !== undefined) {
    decoded.expires = parseExpiry(parsed.data.transaction.expires)
  }
  return decoded
}

/**
 * Read the error list of a body without requiring the rest of the envelope.
 * Bodies without a well-formed `errors` list yield no errors.
 */
export function peekErrors(body: unknown): EndpointError[] {
  const parsed = errorsOnlySchema.safeParse(body)
  return parsed.success ? parsed.data.errors : []
}

/**
 * Decode the service root document
 */
export function decodeServiceRoot(body: unknown): ServiceRoot {
  const parsed = serviceRootSchema.safeParse(body)
  if (!parsed.success) {
    throw new ProtocolError(
      'Service root does not name a transaction endpoint',
      parsed.error.issues
    )
  }
  return {
    transaction: parsed.data.transaction,
    neo4jVersion: parsed.data.neo4j_version,
    neo4jEdition: parsed.data.neo4j_edition,
  }
}

/**
 * Throw the transport-level error for a status that is not a success code of
 * the operation. Returns normally on success.
 */
export function assertStatus(operation: ProtocolOperation, response: TransportResponse): void {
  const expected: readonly number[] = SUCCESS_STATUS[operation]
  if (expected.includes(response.status)) {
    return
  }
  const errors = peekErrors(response.body)
  if (response.status === 401) {
    throw new AuthenticationError(expected, errors)
  }
  throw new HttpStatusError(response.status, expected, errors)
}

/**
 * A table with no columns and no rows
 */
export function emptyTable(): RawResultTable {
  return { columns: Object.freeze([]), rows: Object.freeze([]) }
}

/**
 * Client Errors
 * Error classes raised by the transport, the codec, the transaction state
 * machine and row extraction.
 */

import type { ZodIssue } from 'zod'
import type { EndpointError } from './types'

/**
 * Error codes the endpoint uses when the addressed transaction no longer exists
 */
export const TRANSACTION_GONE_CODES: ReadonlySet<string> = new Set([
  'Neo.ClientError.Transaction.TransactionNotFound',
  'Neo.ClientError.Transaction.UnknownId',
  'Neo.ClientError.Transaction.TransactionExpired',
  'Neo.ClientError.Transaction.TransactionTimedOut',
])

/**
 * Check whether an endpoint error reports the transaction as gone
 */
export function isTransactionGone(error: EndpointError): boolean {
  return TRANSACTION_GONE_CODES.has(error.code)
}

/**
 * Base class for all client errors
 */
export class GraphClientError extends Error {
  readonly code: string

  constructor(message: string, code: string = 'GRAPH_CLIENT_ERROR') {
    super(message)
    this.name = 'GraphClientError'
    this.code = code

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Error when the client is closed but an operation is attempted
 */
export class DriverClosedError extends GraphClientError {
  constructor(operation: string = 'operation') {
    super(`Cannot perform ${operation} on closed client`, 'DRIVER_CLOSED')
    this.name = 'DriverClosedError'
  }
}

/**
 * Error when a network request fails
 */
export class NetworkError extends GraphClientError {
  constructor(message: string, cause?: Error) {
    super(message, 'NETWORK_ERROR')
    this.name = 'NetworkError'
    if (cause) {
      this.cause = cause
    }
  }
}

/**
 * Error when a request times out
 */
export class TimeoutError extends GraphClientError {
  readonly timeout: number

  constructor(timeout: number, operation: string = 'request') {
    super(`${operation} timed out after ${timeout}ms`, 'TIMEOUT_ERROR')
    this.name = 'TimeoutError'
    this.timeout = timeout
  }
}

/**
 * Error when the endpoint answers with a status the protocol does not expect
 * for the operation. The body's error list, if any, is kept for inspection.
 */
export class HttpStatusError extends GraphClientError {
  readonly statusCode: number
  readonly expected: readonly number[]
  readonly errors: readonly EndpointError[]

  constructor(
    statusCode: number,
    expected: readonly number[],
    errors: readonly EndpointError[] = [],
    code: string = `HTTP_${statusCode}`
  ) {
    const detail = errors.length > 0 ? `: ${errors.map((e) => e.message).join('; ')}` : ''
    super(`Unexpected HTTP status ${statusCode} (expected ${expected.join(' or ')})${detail}`, code)
    this.name = 'HttpStatusError'
    this.statusCode = statusCode
    this.expected = expected
    this.errors = errors
  }
}

/**
 * Error when authentication fails
 */
export class AuthenticationError extends HttpStatusError {
  constructor(expected: readonly number[], errors: readonly EndpointError[] = []) {
    super(401, expected, errors, 'AUTHENTICATION_ERROR')
    this.name = 'AuthenticationError'
  }
}

/**
 * Error when a response body does not have the shape of the protocol
 */
export class ProtocolError extends GraphClientError {
  readonly issues: readonly ZodIssue[]

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message, 'PROTOCOL_ERROR')
    this.name = 'ProtocolError'
    this.issues = issues
  }
}

/**
 * Error carrying the endpoint's error list for a batch that had to succeed
 * as a whole (beginning a transaction, a single autocommit statement).
 */
export class StatementError<R = unknown> extends GraphClientError {
  readonly errors: readonly EndpointError[]
  readonly results: readonly R[]

  constructor(errors: readonly EndpointError[], results: readonly R[] = []) {
    const first = errors[0]
    super(
      first ? `${first.code}: ${first.message}` : 'Statement failed',
      first?.code ?? 'STATEMENT_ERROR'
    )
    this.name = 'StatementError'
    this.errors = errors
    this.results = results
  }
}

/**
 * Error when an operation is attempted on a transaction that is no longer open
 */
export class InvalidTransactionStateError extends GraphClientError {
  readonly currentState: string
  readonly operation: string

  constructor(
    currentState: string,
    operation: string,
    message: string = `Cannot ${operation} transaction: transaction is ${currentState}, expected open`,
    code: string = 'INVALID_TRANSACTION_STATE'
  ) {
    super(message, code)
    this.name = 'InvalidTransactionStateError'
    this.currentState = currentState
    this.operation = operation
  }
}

/**
 * Error when a transaction has expired, either by its expiry time passing on
 * the client or by the endpoint no longer knowing it. Raised by the call that
 * detects the expiry and by every later call on the same transaction.
 */
export class ExpiredTransactionError extends InvalidTransactionStateError {
  readonly transactionId: string
  readonly errors: readonly EndpointError[]

  constructor(transactionId: string, operation: string, errors: readonly EndpointError[] = []) {
    super(
      'expired',
      operation,
      `Cannot ${operation} transaction: transaction ${transactionId} has expired`,
      'TRANSACTION_EXPIRED'
    )
    this.name = 'ExpiredTransactionError'
    this.transactionId = transactionId
    this.errors = errors
  }
}

/**
 * Error when a cell cannot be extracted as the requested type
 */
export class TypeCoercionError extends GraphClientError {
  readonly key: string | number
  readonly reason: 'missing' | 'shape'
  readonly issues: readonly ZodIssue[]

  constructor(
    key: string | number,
    reason: 'missing' | 'shape',
    message: string,
    issues: readonly ZodIssue[] = []
  ) {
    super(message, 'TYPE_COERCION_ERROR')
    this.name = 'TypeCoercionError'
    this.key = key
    this.reason = reason
    this.issues = issues
  }
}

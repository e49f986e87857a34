/**
 * Transaction - client-side mirror of a transaction held by the server
 *
 * Handles:
 * - Opening a transaction with an initial batch of statements
 * - Executing batches, each of which refreshes the expiry
 * - Commit, optionally with a last batch
 * - Rollback, which succeeds when the server has already dropped the transaction
 * - Expiry detected from the local clock or from the server's answer
 *
 * A transaction is owned by one caller. Operations issued concurrently on the
 * same transaction are run one after another in the order they were issued.
 */

import { Statement } from '../statement/statement'
import type { StatementLike } from '../statement/statement'
import { CypherResult } from '../result/result'
import {
  encodeStatements,
  decodeResponse,
  peekErrors,
  assertStatus,
} from '../client/codec'
import type { ProtocolOperation } from '../client/codec'
import {
  ExpiredTransactionError,
  InvalidTransactionStateError,
  ProtocolError,
  StatementError,
  isTransactionGone,
} from '../client/errors'
import type { Logger } from '../client/logger'
import type {
  DecodedResponse,
  EndpointError,
  QueryResponse,
  Transport,
  TransportResponse,
} from '../client/types'

/**
 * Transaction state
 */
export type TransactionState = 'open' | 'committed' | 'rolled_back' | 'expired'

/**
 * What a transaction needs from the client that opened it
 */
export interface TransactionContext {
  transport: Transport
  /** URL of the transaction collection, e.g. `http://localhost:7474/db/neo4j/tx` */
  endpoint: string
  logger: Logger
}

/**
 * A freshly opened transaction and the results of its initial statements
 */
export interface BeginResult {
  transaction: Transaction
  results: CypherResult[]
}

export class Transaction {
  private readonly context: TransactionContext
  private readonly _transactionUrl: string
  private readonly _commitUrl: string
  private _expiresAt: Date
  private _state: TransactionState = 'open'
  private pending: Promise<void> = Promise.resolve()

  private constructor(
    context: TransactionContext,
    transactionUrl: string,
    commitUrl: string,
    expiresAt: Date
  ) {
    this.context = context
    this._transactionUrl = transactionUrl
    this._commitUrl = commitUrl
    this._expiresAt = expiresAt
  }

  /**
   * Open a transaction, executing `statements` in it.
   *
   * @throws StatementError when the endpoint reports errors; no transaction is returned
   * @throws HttpStatusError, NetworkError, TimeoutError on transport failures
   * @throws ProtocolError when the answer lacks the commit URL or the expiry
   */
  static async begin(
    context: TransactionContext,
    statements: readonly StatementLike[] = []
  ): Promise<BeginResult> {
    const batch = statements.map((statement) => Statement.from(statement))
    context.logger.debug(`POST ${context.endpoint} (begin, ${batch.length} statements)`)

    const response = await context.transport.send({
      method: 'POST',
      url: context.endpoint,
      body: encodeStatements(batch),
    })
    assertStatus('begin', response)

    const decoded = decodeResponse(response.body, batch.length)
    const results = decoded.results.map((table) => new CypherResult(table))
    if (decoded.errors.length > 0) {
      throw new StatementError(decoded.errors, results)
    }
    if (decoded.commit === undefined) {
      throw new ProtocolError('No commit URL returned from server')
    }
    if (decoded.expires === undefined) {
      throw new ProtocolError('No transaction expiry returned from server')
    }

    const transactionUrl = response.location ?? decoded.commit.replace(/\/commit\/?$/, '')
    const transaction = new Transaction(context, transactionUrl, decoded.commit, decoded.expires)
    context.logger.debug(`Transaction ${transaction.id} opened, expires ${decoded.expires.toISOString()}`)

    return { transaction, results }
  }

  /**
   * Identifier of the transaction: the last path segment of its URL
   */
  get id(): string {
    const segments = this._transactionUrl.split('/').filter((segment) => segment.length > 0)
    return segments[segments.length - 1] ?? this._transactionUrl
  }

  get transactionUrl(): string {
    return this._transactionUrl
  }

  get commitUrl(): string {
    return this._commitUrl
  }

  get expiresAt(): Date {
    return new Date(this._expiresAt.getTime())
  }

  get state(): TransactionState {
    return this._state
  }

  isOpen(): boolean {
    return this._state === 'open'
  }

  /**
   * Whether the expiry time has passed, or the transaction was found expired
   */
  isExpired(): boolean {
    return this._state === 'expired' || (this._state === 'open' && Date.now() >= this._expiresAt.getTime())
  }

  /**
   * Execute a batch in this transaction. Endpoint errors are returned with the
   * results and leave the transaction open.
   *
   * @throws ExpiredTransactionError when the transaction has expired
   * @throws InvalidTransactionStateError when the transaction is committed or rolled back
   */
  execute(statements: readonly StatementLike[]): Promise<QueryResponse> {
    return this.serialize(async () => {
      this.assertLive('execute')
      const batch = statements.map((statement) => Statement.from(statement))
      const decoded = await this.post('execute', this._transactionUrl, batch)
      if (decoded.expires !== undefined) {
        this._expiresAt = decoded.expires
      }
      return toQueryResponse(decoded)
    })
  }

  /**
   * Execute one statement and return its result.
   *
   * @throws StatementError when the endpoint reports errors
   */
  async run(statement: StatementLike): Promise<CypherResult> {
    const { results, errors } = await this.execute([statement])
    if (errors.length > 0) {
      throw new StatementError(errors, results)
    }
    return results[0]
  }

  /**
   * Commit the transaction, first executing `statements` if any are given.
   * The transaction is committed even if the last batch reported errors; they
   * are returned with the results.
   */
  commit(statements: readonly StatementLike[] = []): Promise<QueryResponse> {
    return this.serialize(async () => {
      this.assertLive('commit')
      const batch = statements.map((statement) => Statement.from(statement))
      const decoded = await this.post('commit', this._commitUrl, batch)
      this._state = 'committed'
      this.context.logger.debug(`Transaction ${this.id} committed`)
      return toQueryResponse(decoded)
    })
  }

  /**
   * Roll the transaction back. When the server no longer knows the
   * transaction the rollback still succeeds: nothing is left open either way.
   * The request is sent even after the local expiry time has passed.
   */
  rollback(): Promise<void> {
    return this.serialize(async () => {
      this.assertOpen('rollback')
      this.context.logger.debug(`DELETE ${this._transactionUrl}`)

      const response = await this.context.transport.send({
        method: 'DELETE',
        url: this._transactionUrl,
      })

      if (reportsGone(response)) {
        this._state = 'rolled_back'
        this.context.logger.debug(`Transaction ${this.id} was already gone on rollback`)
        return
      }

      assertStatus('rollback', response)
      // The protocol allows an empty answer to DELETE
      if (response.body !== undefined) {
        decodeResponse(response.body)
      }
      this._state = 'rolled_back'
      this.context.logger.debug(`Transaction ${this.id} rolled back`)
    })
  }

  /**
   * Keep the transaction alive by sending an empty batch
   *
   * @returns The new expiry time
   */
  resetTimeout(): Promise<Date> {
    return this.serialize(async () => {
      this.assertLive('reset timeout of')
      const decoded = await this.post('execute', this._transactionUrl, [])
      if (decoded.expires !== undefined) {
        this._expiresAt = decoded.expires
      }
      return this.expiresAt
    })
  }

  /**
   * Send a batch to an URL of this transaction and decode the answer,
   * moving to `expired` when the server reports the transaction gone.
   */
  private async post(
    operation: ProtocolOperation,
    url: string,
    batch: Statement[]
  ): Promise<DecodedResponse> {
    this.context.logger.debug(`POST ${url} (${operation}, ${batch.length} statements)`)
    const response = await this.context.transport.send({
      method: 'POST',
      url,
      body: encodeStatements(batch),
    })

    if (reportsGone(response)) {
      throw this.expire(operation, peekErrors(response.body))
    }

    assertStatus(operation, response)
    return decodeResponse(response.body, batch.length)
  }

  private expire(operation: string, errors: readonly EndpointError[] = []): ExpiredTransactionError {
    this._state = 'expired'
    this.context.logger.warn(`Transaction ${this.id} expired`)
    return new ExpiredTransactionError(this.id, operation, errors)
  }

  private assertOpen(operation: string): void {
    if (this._state === 'expired') {
      throw new ExpiredTransactionError(this.id, operation)
    }
    if (this._state !== 'open') {
      throw new InvalidTransactionStateError(this._state, operation)
    }
  }

  /**
   * Open and not past its expiry time
   */
  private assertLive(operation: string): void {
    this.assertOpen(operation)
    if (Date.now() >= this._expiresAt.getTime()) {
      throw this.expire(operation)
    }
  }

  /**
   * Run operations on this transaction one at a time, in call order
   */
  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.pending.then(operation)
    // The outcome reaches the caller through `run`; the chain only orders calls
    this.pending = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}

function toQueryResponse(decoded: DecodedResponse): QueryResponse {
  return {
    results: decoded.results.map((table) => new CypherResult(table)),
    errors: decoded.errors,
  }
}

/**
 * Whether a response says the addressed transaction does not exist
 */
function reportsGone(response: TransportResponse): boolean {
  return response.status === 404 || peekErrors(response.body).some(isTransactionGone)
}

/**
 * Transactions
 */

export { Transaction } from './transaction'
export type { TransactionState, TransactionContext, BeginResult } from './transaction'

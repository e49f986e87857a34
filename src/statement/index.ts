/**
 * Statements
 */

export { Statement, StatementBuilder, cypher } from './statement'
export type { StatementLike } from './statement'

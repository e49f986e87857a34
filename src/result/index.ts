/**
 * Result Types
 */

export { CypherResult } from './result'
export { Row, buildFieldLookup } from './row'
export type { RowKey, SafeGetResult } from './row'
export { Types, describeCell } from './coerce'
export type { Coercer, JsonValue } from './coerce'

/**
 * Cell coercers
 *
 * A coercer turns an opaque cell into a typed value or reports why it cannot.
 * Every zod schema is a coercer, so callers can extract whole nodes into
 * their own shapes:
 *
 * @example
 * ```typescript
 * const Language = z.object({ name: z.string(), safe: z.boolean() })
 * const lang = row.get('n', Language)
 * const name = row.get('n.name', Types.string)
 * ```
 */

import { z } from 'zod'
import type { ZodType, ZodTypeDef } from 'zod'

/**
 * Converts an opaque cell value into a `T`
 */
export type Coercer<T> = ZodType<T, ZodTypeDef, unknown>

/**
 * Any JSON value a cell can hold
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue }

const json: Coercer<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(json),
    z.record(json),
  ])
)

/**
 * Built-in coercers. All of them are exact: no value is converted from one
 * JSON type to another, and integers are never produced by truncation.
 */
export const Types = {
  boolean: z.boolean(),
  /** A number with no fractional part that JSON parsing kept exact */
  integer: z.number().int().safe(),
  /** Any number, integral or not */
  float: z.number(),
  number: z.number(),
  string: z.string(),
  /** Any JSON value */
  json,
  nullable<T>(inner: Coercer<T>): Coercer<T | null> {
    return inner.nullable()
  },
  list<T>(inner: Coercer<T>): Coercer<T[]> {
    return z.array(inner)
  },
  map<T>(inner: Coercer<T>): Coercer<Record<string, T>> {
    return z.record(inner)
  },
  /** The property map of a node or relationship returned as a whole */
  node(): Coercer<Record<string, JsonValue>> {
    return z.record(json)
  },
}

/**
 * Describe the JSON type of a cell for error messages
 */
export function describeCell(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (Array.isArray(value)) {
    return 'list'
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float'
  }
  if (typeof value === 'object') {
    return 'map'
  }
  return typeof value
}

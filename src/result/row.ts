/**
 * Row
 *
 * A view over one row of a result table. Cells can be addressed by column
 * name or by position (0-indexed) and are extracted with a coercer, which
 * either yields the typed value or raises a TypeCoercionError.
 */

import { TypeCoercionError } from '../client/errors'
import { describeCell } from './coerce'
import type { Coercer } from './coerce'

export type RowKey = string | number

/**
 * Outcome of `Row.safeGet`
 */
export type SafeGetResult<T> =
  | { success: true; data: T }
  | { success: false; error: TypeCoercionError }

export class Row {
  private readonly _keys: readonly string[]
  private readonly _fields: readonly unknown[]
  private readonly _fieldLookup: ReadonlyMap<string, number>

  /**
   * Create a new Row.
   *
   * @param keys - Column names, shared by every row of a result
   * @param fields - Cells of this row
   * @param fieldLookup - Column name to index map, shared by every row of a result
   */
  constructor(
    keys: readonly string[],
    fields: readonly unknown[],
    fieldLookup?: ReadonlyMap<string, number>
  ) {
    this._keys = keys
    this._fields = fields
    this._fieldLookup = fieldLookup ?? buildFieldLookup(keys)
  }

  /**
   * Column names in order of appearance
   */
  get keys(): readonly string[] {
    return this._keys
  }

  get length(): number {
    return this._fields.length
  }

  /**
   * Extract a cell as `T`.
   *
   * @throws TypeCoercionError when the column or index does not exist, or the
   *   cell's shape does not match the coercer
   */
  get<T>(key: RowKey, coercer: Coercer<T>): T {
    const result = this.safeGet(key, coercer)
    if (!result.success) {
      throw result.error
    }
    return result.data
  }

  /**
   * Extract a cell as `T`, reporting failure as a value instead of throwing
   */
  safeGet<T>(key: RowKey, coercer: Coercer<T>): SafeGetResult<T> {
    const located = this.locate(key)
    if (!located.success) {
      return located
    }

    const value = this._fields[located.data]
    const parsed = coercer.safeParse(value)
    if (parsed.success) {
      return { success: true, data: parsed.data }
    }

    const expected = parsed.error.issues.map((issue) => issue.message).join('; ')
    return {
      success: false,
      error: new TypeCoercionError(
        key,
        'shape',
        `Cannot coerce ${describeCell(value)} cell '${String(key)}': ${expected}`,
        parsed.error.issues
      ),
    }
  }

  /**
   * Get the raw cell value by column name or index
   *
   * @throws TypeCoercionError when the column or index does not exist
   */
  value(key: RowKey): unknown {
    const located = this.locate(key)
    if (!located.success) {
      throw located.error
    }
    return this._fields[located.data]
  }

  /**
   * Check if this row has a column with the given name
   */
  has(key: string): boolean {
    return this._fieldLookup.has(key)
  }

  /**
   * Convert this row to a plain object keyed by column name.
   * With duplicate column names the last cell wins.
   */
  toObject(): Record<string, unknown> {
    return Object.fromEntries(this._keys.map((key, i): [string, unknown] => [key, this._fields[i]]))
  }

  private locate(key: RowKey): SafeGetResult<number> {
    if (typeof key === 'number') {
      if (!Number.isInteger(key)) {
        return missing(key, `Row index must be an integer, got '${key}'`)
      }
      const length = this._fields.length
      if (key < 0 || key >= length) {
        const rangeMsg = length === 0 ? 'This row is empty' : `Valid indices are 0..${length - 1}`
        return missing(key, `Row has no field with index '${key}'. ${rangeMsg}`)
      }
      return { success: true, data: key }
    }

    const index = this._fieldLookup.get(key)
    if (index === undefined || index >= this._fields.length) {
      return missing(
        key,
        `Row has no field with key '${key}'. Available keys: [${this._keys.join(', ')}]`
      )
    }
    return { success: true, data: index }
  }
}

function missing(key: RowKey, message: string): { success: false; error: TypeCoercionError } {
  return { success: false, error: new TypeCoercionError(key, 'missing', message) }
}

/**
 * Map each column name to its position. With duplicate names the first wins.
 */
export function buildFieldLookup(keys: readonly string[]): Map<string, number> {
  const lookup = new Map<string, number>()
  for (let i = 0; i < keys.length; i++) {
    if (!lookup.has(keys[i])) {
      lookup.set(keys[i], i)
    }
  }
  return lookup
}

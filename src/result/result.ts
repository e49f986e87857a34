/**
 * CypherResult
 *
 * The columns and rows returned for one statement. The table is fully
 * materialized and read-only, so it can be iterated any number of times;
 * Row views are created as the iteration reaches them.
 */

import type { RawResultTable } from '../client/types'
import { TypeCoercionError } from '../client/errors'
import { Row, buildFieldLookup } from './row'
import type { Coercer } from './coerce'

export class CypherResult implements Iterable<Row> {
  private readonly _table: RawResultTable
  private readonly _fieldLookup: ReadonlyMap<string, number>

  constructor(table: RawResultTable) {
    this._table = table
    this._fieldLookup = buildFieldLookup(table.columns)
  }

  /**
   * Column names in order
   */
  get columns(): readonly string[] {
    return this._table.columns
  }

  /**
   * Number of rows
   */
  get length(): number {
    return this._table.rows.length
  }

  /**
   * The underlying table
   */
  get raw(): RawResultTable {
    return this._table
  }

  isEmpty(): boolean {
    return this._table.rows.length === 0
  }

  /**
   * Iterate over the rows. Each call starts a new pass from the first row.
   */
  *rows(): Generator<Row, void, undefined> {
    for (const fields of this._table.rows) {
      yield new Row(this._table.columns, fields, this._fieldLookup)
    }
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows()
  }

  /**
   * Get the row at `index`
   *
   * @throws TypeCoercionError when the index is out of range
   */
  row(index: number): Row {
    if (!Number.isInteger(index) || index < 0 || index >= this._table.rows.length) {
      throw new TypeCoercionError(
        index,
        'missing',
        `Result has no row with index '${index}' (${this._table.rows.length} rows)`
      )
    }
    return new Row(this._table.columns, this._table.rows[index], this._fieldLookup)
  }

  /**
   * First row, or `undefined` for an empty result
   */
  first(): Row | undefined {
    return this.isEmpty() ? undefined : this.row(0)
  }

  toArray(): Row[] {
    return [...this.rows()]
  }

  /**
   * Rows as plain objects keyed by column name
   */
  toObjects(): Record<string, unknown>[] {
    return this.toArray().map((row) => row.toObject())
  }

  /**
   * Extract one column from every row
   *
   * @throws TypeCoercionError on the first cell that does not match
   */
  column<T>(name: string, coercer: Coercer<T>): T[] {
    return this.toArray().map((row) => row.get(name, coercer))
  }
}

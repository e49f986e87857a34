/**
 * Statement
 *
 * A Cypher statement is its text plus the parameters bound to it. Statements
 * are immutable: parameters are copied and frozen on construction,
 * `withParam` returns a new statement, and `StatementBuilder` accumulates
 * parameters before producing one.
 *
 * @example
 * ```typescript
 * const stmt = new Statement('MATCH (n:LANG {safe: $safe}) RETURN n.name')
 *   .withParam('safe', true)
 *
 * const built = Statement.builder('CREATE (n:LANG $props)')
 *   .param('props', { name: 'TypeScript', safe: true })
 *   .build()
 * ```
 */

import { freezeParameters } from '../types/parameter-value'
import type { ParameterMap, ParameterValue } from '../types/parameter-value'
import type { WireStatement } from '../client/types'

/**
 * Anything that can be turned into a Statement
 */
export type StatementLike =
  | string
  | Statement
  | { text: string; parameters?: ParameterMap }

export class Statement {
  readonly text: string
  readonly parameters: Readonly<ParameterMap>

  constructor(text: string, parameters: ParameterMap = {}) {
    this.text = text
    this.parameters = freezeParameters(parameters)
    Object.freeze(this)
  }

  /**
   * Convert a string, statement or plain `{ text, parameters }` object
   */
  static from(input: StatementLike): Statement {
    if (input instanceof Statement) {
      return input
    }
    if (typeof input === 'string') {
      return new Statement(input)
    }
    return new Statement(input.text, input.parameters)
  }

  /**
   * Start a mutable builder for a statement with the given text
   */
  static builder(text: string): StatementBuilder {
    return new StatementBuilder(text)
  }

  /**
   * Return a statement with `name` bound to `value`, replacing any earlier value
   */
  withParam(name: string, value: ParameterValue): Statement {
    return new Statement(this.text, { ...this.parameters, [name]: value })
  }

  /**
   * Return a statement with every entry of `params` bound
   */
  withParams(params: ParameterMap): Statement {
    return new Statement(this.text, { ...this.parameters, ...params })
  }

  getParam(name: string): ParameterValue | undefined {
    return Object.prototype.hasOwnProperty.call(this.parameters, name)
      ? this.parameters[name]
      : undefined
  }

  hasParam(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.parameters, name)
  }

  get parameterNames(): string[] {
    return Object.keys(this.parameters)
  }

  /**
   * Wire form of the statement
   */
  toJSON(): WireStatement {
    return {
      statement: this.text,
      parameters: this.parameters,
    }
  }

  toString(): string {
    return this.text
  }
}

/**
 * Accumulates parameters, then yields an immutable Statement.
 * Statements already built are not affected by later calls.
 */
export class StatementBuilder {
  private readonly text: string
  private readonly entries = new Map<string, ParameterValue>()

  constructor(text: string) {
    this.text = text
  }

  param(name: string, value: ParameterValue): this {
    this.entries.set(name, value)
    return this
  }

  params(params: ParameterMap): this {
    for (const [name, value] of Object.entries(params)) {
      this.entries.set(name, value)
    }
    return this
  }

  build(): Statement {
    return new Statement(this.text, Object.fromEntries(this.entries))
  }
}

/**
 * Shorthand for `new Statement(text, params)`
 *
 * @example
 * ```typescript
 * client.exec(cypher('MATCH (n:LANG {name: $name}) RETURN n', { name: 'Haskell' }))
 * ```
 */
export function cypher(text: string, params?: ParameterMap): Statement {
  return new Statement(text, params)
}

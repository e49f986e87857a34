/**
 * Parameter Values
 *
 * The values a statement parameter may hold. They map one-to-one onto JSON:
 * null, booleans, numbers (integral or not), strings, lists and string-keyed
 * maps of the same, nested to any depth.
 */

/**
 * A value that can be bound to a statement parameter
 */
export type ParameterValue =
  | null
  | boolean
  | number
  | string
  | readonly ParameterValue[]
  | ParameterMap

/**
 * A mapping of parameter names (or map keys) to parameter values
 */
export interface ParameterMap {
  readonly [name: string]: ParameterValue
}

/**
 * Tag of a parameter value
 */
export type ParameterKind = 'null' | 'boolean' | 'integer' | 'float' | 'string' | 'list' | 'map'

/**
 * Get the tag of a parameter value
 *
 * @example
 * ```typescript
 * parameterKind(42)      // 'integer'
 * parameterKind(4.2)     // 'float'
 * parameterKind([1, 2])  // 'list'
 * ```
 */
export function parameterKind(value: ParameterValue): ParameterKind {
  if (value === null) {
    return 'null'
  }
  if (isParameterList(value)) {
    return 'list'
  }
  switch (typeof value) {
    case 'boolean':
      return 'boolean'
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float'
    case 'string':
      return 'string'
    default:
      return 'map'
  }
}

function isParameterList(value: ParameterValue): value is readonly ParameterValue[] {
  return Array.isArray(value)
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Runtime guard for values that arrive untyped.
 * Rejects non-finite numbers, `undefined`, class instances and cyclic structures.
 */
export function isParameterValue(value: unknown): value is ParameterValue {
  return check(value, new Set())
}

function check(value: unknown, ancestors: Set<object>): boolean {
  if (value === null) {
    return true
  }
  if (typeof value === 'boolean' || typeof value === 'string') {
    return true
  }
  if (typeof value === 'number') {
    return Number.isFinite(value)
  }
  if (typeof value !== 'object') {
    return false
  }

  if (ancestors.has(value)) {
    return false
  }
  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      return value.every((item) => check(item, ancestors))
    }
    if (!isPlainObject(value)) {
      return false
    }
    return Object.values(value).every((item) => check(item, ancestors))
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Copy a parameter value, freezing every list and map in the copy
 */
export function freezeParameter(value: ParameterValue): ParameterValue {
  if (value === null || typeof value !== 'object') {
    return value
  }
  if (isParameterList(value)) {
    return Object.freeze(value.map(freezeParameter))
  }
  return freezeParameters(value)
}

/**
 * Copy a parameter map, freezing it and every value nested in it
 */
export function freezeParameters(params: ParameterMap): ParameterMap {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(params).map(([name, item]): [string, ParameterValue] => [name, freezeParameter(item)])
    )
  )
}

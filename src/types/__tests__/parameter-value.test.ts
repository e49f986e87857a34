import { describe, it, expect } from 'vitest'
import { parameterKind, isParameterValue } from '../parameter-value'
import type { ParameterKind, ParameterValue } from '../parameter-value'

describe('parameterKind', () => {
  const cases: [ParameterValue, ParameterKind][] = [
    [null, 'null'],
    [true, 'boolean'],
    [42, 'integer'],
    [-7, 'integer'],
    [4.25, 'float'],
    ['Haskell', 'string'],
    [[1, 'a'], 'list'],
    [{ name: 'Haskell' }, 'map'],
  ]

  it.each(cases)('should tag %j as %s', (value, kind) => {
    expect(parameterKind(value)).toBe(kind)
  })
})

describe('isParameterValue', () => {
  it('should accept nested values', () => {
    expect(isParameterValue({ a: [1, 2.5, { b: null, c: 'x' }], d: false })).toBe(true)
  })

  it('should reject undefined, functions and symbols', () => {
    expect(isParameterValue(undefined)).toBe(false)
    expect(isParameterValue(() => 1)).toBe(false)
    expect(isParameterValue(Symbol('x'))).toBe(false)
    expect(isParameterValue({ a: undefined })).toBe(false)
  })

  it('should reject non-finite numbers', () => {
    expect(isParameterValue(NaN)).toBe(false)
    expect(isParameterValue([Infinity])).toBe(false)
  })

  it('should reject class instances', () => {
    expect(isParameterValue(new Date(0))).toBe(false)
    expect(isParameterValue(new Map())).toBe(false)
  })

  it('should accept objects without a prototype', () => {
    const value: Record<string, unknown> = Object.create(null)
    value.name = 'Haskell'
    expect(isParameterValue(value)).toBe(true)
  })

  it('should reject cycles', () => {
    const cyclic: Record<string, unknown> = { name: 'loop' }
    cyclic.self = cyclic
    expect(isParameterValue(cyclic)).toBe(false)
  })

  it('should accept the same object reached twice without a cycle', () => {
    const shared = { x: 1 }
    expect(isParameterValue({ a: shared, b: [shared] })).toBe(true)
  })
})

describe('JSON form', () => {
  it('should survive a JSON round trip unchanged', () => {
    const value: ParameterValue = {
      name: 'Haskell',
      safe: true,
      year: 2015,
      score: 9.5,
      tags: ['systems', ['nested', null]],
      meta: { empty: {}, list: [] },
    }
    expect(JSON.parse(JSON.stringify(value))).toEqual(value)
  })
})

import { describe, it, expect } from 'vitest'
import { tryToBigInt, tryToBigUint } from '../fallible'

describe('tryToBigInt', () => {
  it('passes bigints through', () => {
    expect(tryToBigInt(-5n)).toBe(-5n)
    expect(tryToBigInt(2n ** 200n)).toBe(2n ** 200n)
  })

  it('converts integral numbers', () => {
    expect(tryToBigInt(0)).toBe(0n)
    expect(tryToBigInt(-2147483648)).toBe(-2147483648n)
    expect(tryToBigInt(Number.MAX_SAFE_INTEGER)).toBe(9007199254740991n)
  })

  it('fails for fractional numbers', () => {
    expect(tryToBigInt(1.5)).toBeUndefined()
    expect(tryToBigInt(-0.1)).toBeUndefined()
  })

  it('fails for NaN and the infinities', () => {
    expect(tryToBigInt(Number.NaN)).toBeUndefined()
    expect(tryToBigInt(Number.POSITIVE_INFINITY)).toBeUndefined()
    expect(tryToBigInt(Number.NEGATIVE_INFINITY)).toBeUndefined()
  })
})

describe('tryToBigUint', () => {
  it('converts non-negative integers', () => {
    expect(tryToBigUint(0)?.toBigInt()).toBe(0n)
    expect(tryToBigUint(255)?.toBigInt()).toBe(255n)
    expect(tryToBigUint(2n ** 64n)?.toBigInt()).toBe(18446744073709551616n)
  })

  it('fails for negative values', () => {
    expect(tryToBigUint(-1)).toBeUndefined()
    expect(tryToBigUint(-1n)).toBeUndefined()
  })

  it('fails for values that are not integers', () => {
    expect(tryToBigUint(0.5)).toBeUndefined()
    expect(tryToBigUint(Number.NaN)).toBeUndefined()
    expect(tryToBigUint(Number.POSITIVE_INFINITY)).toBeUndefined()
  })
})

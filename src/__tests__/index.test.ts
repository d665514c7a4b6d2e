import { describe, it, expect } from 'vitest'
import * as lib from '../index'

describe('package entry point', () => {
  it('exports the conversions', () => {
    expect(typeof lib.toBigInt).toBe('function')
    expect(typeof lib.toBigUint).toBe('function')
    expect(typeof lib.tryToBigInt).toBe('function')
    expect(typeof lib.tryToBigUint).toBe('function')
  })

  it('exports every fixed-width class and factory', () => {
    for (const kind of lib.INT_KINDS) {
      const [min, max] = lib.boundsOf(kind)
      expect(lib.isFixedInt(min)).toBe(true)
      expect(lib.isFixedInt(max)).toBe(true)
    }
    expect(lib.u8(1)).toBeInstanceOf(lib.U8)
    expect(lib.i128(1n)).toBeInstanceOf(lib.I128)
  })

  it('does not export the sealed base classes as values', () => {
    expect('FixedInt' in lib).toBe(false)
    expect('UnsignedFixedInt' in lib).toBe(false)
  })

  it('converts through the public API', () => {
    expect(lib.toBigInt(lib.I32.MIN_VALUE)).toBe(-2147483648n)
    expect(lib.toBigUint(lib.U8.MAX_VALUE).equals(255)).toBe(true)
  })

  it('exports the error classes', () => {
    expect(new lib.IntegerRangeError('u8', 300, 0n, 255n)).toBeInstanceOf(lib.ConversionError)
    expect(new lib.ConversionInvariantError('i8', 'bigint', 'x')).toBeInstanceOf(lib.ConversionError)
  })
})

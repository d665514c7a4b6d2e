import { describe, it, expect } from 'vitest'
import { toBigInt } from '../infallible-to-big-int'
import { tryToBigInt } from '../fallible'
import { POINTER_WIDTH } from '../../platform'
import { I8, I16, I32, I64, I128, ISize, i8, i32, i64, i128 } from '../../types/signed'
import { U8, U16, U32, U64, U128, USize, u8, u64 } from '../../types/unsigned'
import { INT_KINDS } from '../../types/ranges'
import { boundsOf } from '../../types/factories'

describe('toBigInt', () => {
  describe('MIN and MAX values match the fallible conversion', () => {
    it.each(INT_KINDS)('%s', (kind) => {
      const [min, max] = boundsOf(kind)
      expect(toBigInt(min)).toBe(tryToBigInt(min.value))
      expect(toBigInt(max)).toBe(tryToBigInt(max.value))
    })
  })

  describe('signed types', () => {
    it('converts i8 bounds', () => {
      expect(I8.MIN_VALUE.toBigInt()).toBe(-128n)
      expect(I8.MAX_VALUE.toBigInt()).toBe(127n)
    })

    it('converts i16 bounds', () => {
      expect(I16.MIN_VALUE.toBigInt()).toBe(-32768n)
      expect(I16.MAX_VALUE.toBigInt()).toBe(32767n)
    })

    it('converts i32 minimum to the same negative value', () => {
      expect(toBigInt(I32.MIN_VALUE)).toBe(-2147483648n)
      expect(toBigInt(I32.MAX_VALUE)).toBe(2147483647n)
    })

    it('converts i64 bounds', () => {
      expect(toBigInt(I64.MIN_VALUE)).toBe(-9223372036854775808n)
      expect(toBigInt(I64.MAX_VALUE)).toBe(9223372036854775807n)
    })

    it('converts i128 maximum without truncation', () => {
      const max = toBigInt(I128.MAX_VALUE)
      expect(max).toBe(170141183460469231731687303715884105727n)
      expect(max).toBe(2n ** 127n - 1n)
      expect(toBigInt(I128.MIN_VALUE)).toBe(-(2n ** 127n))
    })

    it('converts isize bounds for the platform width', () => {
      const half = 2n ** BigInt(POINTER_WIDTH - 1)
      expect(toBigInt(ISize.MIN_VALUE)).toBe(-half)
      expect(toBigInt(ISize.MAX_VALUE)).toBe(half - 1n)
    })

    it('converts values between the bounds', () => {
      expect(toBigInt(i8(-1))).toBe(-1n)
      expect(toBigInt(i32(153830))).toBe(153830n)
      expect(toBigInt(i64(-42))).toBe(-42n)
      expect(toBigInt(i128(-(10n ** 30n)))).toBe(-(10n ** 30n))
    })
  })

  describe('unsigned types', () => {
    it('converts u8 bounds', () => {
      expect(toBigInt(U8.MIN_VALUE)).toBe(0n)
      expect(toBigInt(U8.MAX_VALUE)).toBe(255n)
    })

    it('converts u16 and u32 maxima', () => {
      expect(toBigInt(U16.MAX_VALUE)).toBe(65535n)
      expect(toBigInt(U32.MAX_VALUE)).toBe(4294967295n)
    })

    it('converts u64 and u128 maxima', () => {
      expect(toBigInt(U64.MAX_VALUE)).toBe(18446744073709551615n)
      expect(toBigInt(U128.MAX_VALUE)).toBe(2n ** 128n - 1n)
    })

    it('converts usize maximum for the platform width', () => {
      expect(toBigInt(USize.MAX_VALUE)).toBe(2n ** BigInt(POINTER_WIDTH) - 1n)
    })

    it('converts values between the bounds', () => {
      expect(toBigInt(u8(200))).toBe(200n)
      expect(toBigInt(u64(2n ** 63n))).toBe(9223372036854775808n)
    })
  })

  it('accepts any fixed-width integer through the shared type', () => {
    const sum = [i8(-3), u8(10), i64(-7n), u64(100n)].reduce((acc, value) => acc + toBigInt(value), 0n)
    expect(sum).toBe(100n)
  })

  it('is the same as calling the method directly', () => {
    const value = i32(-99)
    expect(toBigInt(value)).toBe(value.toBigInt())
  })
})

/**
 * Unsigned fixed-width integer types
 */

import { UnsignedFixedInt } from './fixed-int'
import { INT_RANGES, parseBigIntKind, parseNumberKind } from './ranges'

/** 8-bit unsigned integer */
export class U8 extends UnsignedFixedInt<'u8', number> {
  static readonly MIN_VALUE: U8 = new U8(Number(INT_RANGES.u8.min))
  static readonly MAX_VALUE: U8 = new U8(Number(INT_RANGES.u8.max))

  private constructor(value: number) {
    super('u8', value)
  }

  static from(value: number): U8 {
    return new U8(parseNumberKind('u8', value))
  }
}

/** 16-bit unsigned integer */
export class U16 extends UnsignedFixedInt<'u16', number> {
  static readonly MIN_VALUE: U16 = new U16(Number(INT_RANGES.u16.min))
  static readonly MAX_VALUE: U16 = new U16(Number(INT_RANGES.u16.max))

  private constructor(value: number) {
    super('u16', value)
  }

  static from(value: number): U16 {
    return new U16(parseNumberKind('u16', value))
  }
}

/** 32-bit unsigned integer */
export class U32 extends UnsignedFixedInt<'u32', number> {
  static readonly MIN_VALUE: U32 = new U32(Number(INT_RANGES.u32.min))
  static readonly MAX_VALUE: U32 = new U32(Number(INT_RANGES.u32.max))

  private constructor(value: number) {
    super('u32', value)
  }

  static from(value: number): U32 {
    return new U32(parseNumberKind('u32', value))
  }
}

/** 64-bit unsigned integer */
export class U64 extends UnsignedFixedInt<'u64', bigint> {
  static readonly MIN_VALUE: U64 = new U64(INT_RANGES.u64.min)
  static readonly MAX_VALUE: U64 = new U64(INT_RANGES.u64.max)

  private constructor(value: bigint) {
    super('u64', value)
  }

  static from(value: number | bigint): U64 {
    return new U64(parseBigIntKind('u64', value))
  }
}

/** 128-bit unsigned integer */
export class U128 extends UnsignedFixedInt<'u128', bigint> {
  static readonly MIN_VALUE: U128 = new U128(INT_RANGES.u128.min)
  static readonly MAX_VALUE: U128 = new U128(INT_RANGES.u128.max)

  private constructor(value: bigint) {
    super('u128', value)
  }

  static from(value: number | bigint): U128 {
    return new U128(parseBigIntKind('u128', value))
  }
}

/**
 * Unsigned integer as wide as a pointer on this platform (see POINTER_WIDTH)
 */
export class USize extends UnsignedFixedInt<'usize', bigint> {
  static readonly MIN_VALUE: USize = new USize(INT_RANGES.usize.min)
  static readonly MAX_VALUE: USize = new USize(INT_RANGES.usize.max)

  private constructor(value: bigint) {
    super('usize', value)
  }

  static from(value: number | bigint): USize {
    return new USize(parseBigIntKind('usize', value))
  }
}

// Factory functions
export const u8 = (value: number): U8 => U8.from(value)
export const u16 = (value: number): U16 => U16.from(value)
export const u32 = (value: number): U32 => U32.from(value)
export const u64 = (value: number | bigint): U64 => U64.from(value)
export const u128 = (value: number | bigint): U128 => U128.from(value)
export const usize = (value: number | bigint): USize => USize.from(value)

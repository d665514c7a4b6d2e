/**
 * Signed fixed-width integer types
 */

import { SignedFixedInt } from './fixed-int'
import { INT_RANGES, parseBigIntKind, parseNumberKind } from './ranges'

/** 8-bit signed integer */
export class I8 extends SignedFixedInt<'i8', number> {
  static readonly MIN_VALUE: I8 = new I8(Number(INT_RANGES.i8.min))
  static readonly MAX_VALUE: I8 = new I8(Number(INT_RANGES.i8.max))

  private constructor(value: number) {
    super('i8', value)
  }

  static from(value: number): I8 {
    return new I8(parseNumberKind('i8', value))
  }
}

/** 16-bit signed integer */
export class I16 extends SignedFixedInt<'i16', number> {
  static readonly MIN_VALUE: I16 = new I16(Number(INT_RANGES.i16.min))
  static readonly MAX_VALUE: I16 = new I16(Number(INT_RANGES.i16.max))

  private constructor(value: number) {
    super('i16', value)
  }

  static from(value: number): I16 {
    return new I16(parseNumberKind('i16', value))
  }
}

/** 32-bit signed integer */
export class I32 extends SignedFixedInt<'i32', number> {
  static readonly MIN_VALUE: I32 = new I32(Number(INT_RANGES.i32.min))
  static readonly MAX_VALUE: I32 = new I32(Number(INT_RANGES.i32.max))

  private constructor(value: number) {
    super('i32', value)
  }

  static from(value: number): I32 {
    return new I32(parseNumberKind('i32', value))
  }
}

/** 64-bit signed integer */
export class I64 extends SignedFixedInt<'i64', bigint> {
  static readonly MIN_VALUE: I64 = new I64(INT_RANGES.i64.min)
  static readonly MAX_VALUE: I64 = new I64(INT_RANGES.i64.max)

  private constructor(value: bigint) {
    super('i64', value)
  }

  static from(value: number | bigint): I64 {
    return new I64(parseBigIntKind('i64', value))
  }
}

/** 128-bit signed integer */
export class I128 extends SignedFixedInt<'i128', bigint> {
  static readonly MIN_VALUE: I128 = new I128(INT_RANGES.i128.min)
  static readonly MAX_VALUE: I128 = new I128(INT_RANGES.i128.max)

  private constructor(value: bigint) {
    super('i128', value)
  }

  static from(value: number | bigint): I128 {
    return new I128(parseBigIntKind('i128', value))
  }
}

/**
 * Signed integer as wide as a pointer on this platform (see POINTER_WIDTH)
 */
export class ISize extends SignedFixedInt<'isize', bigint> {
  static readonly MIN_VALUE: ISize = new ISize(INT_RANGES.isize.min)
  static readonly MAX_VALUE: ISize = new ISize(INT_RANGES.isize.max)

  private constructor(value: bigint) {
    super('isize', value)
  }

  static from(value: number | bigint): ISize {
    return new ISize(parseBigIntKind('isize', value))
  }
}

// Factory functions
export const i8 = (value: number): I8 => I8.from(value)
export const i16 = (value: number): I16 => I16.from(value)
export const i32 = (value: number): I32 => I32.from(value)
export const i64 = (value: number | bigint): I64 => I64.from(value)
export const i128 = (value: number | bigint): I128 => I128.from(value)
export const isize = (value: number | bigint): ISize => ISize.from(value)

import { I128, I16, I32, I64, I8, ISize } from './signed'
import { U128, U16, U32, U64, U8, USize } from './unsigned'
import type { IntKind } from './ranges'

// Class for each kind name
export interface FixedIntMap {
  i8: I8
  i16: I16
  i32: I32
  i64: I64
  i128: I128
  isize: ISize
  u8: U8
  u16: U16
  u32: U32
  u64: U64
  u128: U128
  usize: USize
}

// Accepted input for each kind name
export interface FixedIntInputs {
  i8: number
  i16: number
  i32: number
  i64: number | bigint
  i128: number | bigint
  isize: number | bigint
  u8: number
  u16: number
  u32: number
  u64: number | bigint
  u128: number | bigint
  usize: number | bigint
}

type FixedIntFactories = { [K in IntKind]: (value: FixedIntInputs[K]) => FixedIntMap[K] }

const FACTORIES: FixedIntFactories = {
  i8: (value) => I8.from(value),
  i16: (value) => I16.from(value),
  i32: (value) => I32.from(value),
  i64: (value) => I64.from(value),
  i128: (value) => I128.from(value),
  isize: (value) => ISize.from(value),
  u8: (value) => U8.from(value),
  u16: (value) => U16.from(value),
  u32: (value) => U32.from(value),
  u64: (value) => U64.from(value),
  u128: (value) => U128.from(value),
  usize: (value) => USize.from(value),
}

/**
 * Creates the fixed-width integer of the named kind
 * @throws IntegerRangeError if the value does not fit the kind
 *
 * @example
 * fixedInt('u16', 65535) // U16
 * fixedInt('i128', -1n)  // I128
 */
export function fixedInt<K extends IntKind>(kind: K, value: FixedIntInputs[K]): FixedIntMap[K] {
  const factory: FixedIntFactories[K] = FACTORIES[kind]
  return factory(value)
}

const BOUNDS: { [K in IntKind]: readonly [min: FixedIntMap[K], max: FixedIntMap[K]] } = {
  i8: [I8.MIN_VALUE, I8.MAX_VALUE],
  i16: [I16.MIN_VALUE, I16.MAX_VALUE],
  i32: [I32.MIN_VALUE, I32.MAX_VALUE],
  i64: [I64.MIN_VALUE, I64.MAX_VALUE],
  i128: [I128.MIN_VALUE, I128.MAX_VALUE],
  isize: [ISize.MIN_VALUE, ISize.MAX_VALUE],
  u8: [U8.MIN_VALUE, U8.MAX_VALUE],
  u16: [U16.MIN_VALUE, U16.MAX_VALUE],
  u32: [U32.MIN_VALUE, U32.MAX_VALUE],
  u64: [U64.MIN_VALUE, U64.MAX_VALUE],
  u128: [U128.MIN_VALUE, U128.MAX_VALUE],
  usize: [USize.MIN_VALUE, USize.MAX_VALUE],
}

/**
 * Returns the MIN_VALUE and MAX_VALUE constants of the named kind
 */
export function boundsOf<K extends IntKind>(kind: K): readonly [min: FixedIntMap[K], max: FixedIntMap[K]] {
  return BOUNDS[kind]
}

/**
 * Fixed-width integer types and the unsigned big integer
 */

export { BigUint, biguint, isBigUint } from './big-uint'
export type { BigUintable } from './big-uint'

// Base classes are exported as types only; the subclass set is closed
export { isFixedInt } from './fixed-int'
export type { FixedInt, SignedFixedInt, UnsignedFixedInt, AnyFixedInt, AnySignedFixedInt, AnyUnsignedFixedInt } from './fixed-int'

export { I8, I16, I32, I64, I128, ISize, i8, i16, i32, i64, i128, isize } from './signed'
export { U8, U16, U32, U64, U128, USize, u8, u16, u32, u64, u128, usize } from './unsigned'

export { fixedInt, boundsOf } from './factories'
export type { FixedIntMap, FixedIntInputs } from './factories'

export { INT_KINDS, SIGNED_KINDS, UNSIGNED_KINDS, INT_RANGES } from './ranges'
export type { IntKind, SignedKind, UnsignedKind, NumberKind, BigIntKind, IntRange } from './ranges'

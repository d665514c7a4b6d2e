/**
 * Conversion to bigint that cannot fail.
 *
 * Every fixed-width integer type, signed or unsigned, fits in a bigint, so
 * the conversion needs no error handling. Floating-point numbers are left
 * out on purpose: a fractional or non-finite value has no exact bigint.
 *
 * @example
 * ```ts
 * import { i32, toBigInt, type ToBigIntSource } from 'infallible-bigint'
 *
 * // use the conversion directly
 * i32(153830).toBigInt() // 153830n
 *
 * // or accept anything that converts
 * function doGreatThings(value: ToBigIntSource) {
 *   const big = toBigInt(value)
 *   // ...
 * }
 * doGreatThings(i32(153830))
 * ```
 */

import type { AnyFixedInt } from '../types/fixed-int'

export interface InfallibleToBigInt {
  toBigInt(): bigint
}

// Sealed: only the fixed-width integer classes are accepted, not every
// object that happens to have a toBigInt method
export type ToBigIntSource = AnyFixedInt

/**
 * Converts any fixed-width integer to a bigint
 */
export function toBigInt(value: ToBigIntSource): bigint {
  return value.toBigInt()
}

/**
 * Conversion to BigUint that cannot fail.
 *
 * Implemented only by the unsigned fixed-width types, whose values are never
 * negative, so there is no sign to check.
 *
 * @example
 * ```ts
 * import { u32, toBigUint } from 'infallible-bigint'
 *
 * toBigUint(u32(153830)).toString() // '153830'
 * ```
 */

import type { BigUint } from '../types/big-uint'
import type { AnyUnsignedFixedInt } from '../types/fixed-int'

export interface InfallibleToBigUint {
  toBigUint(): BigUint
}

export type ToBigUintSource = AnyUnsignedFixedInt

/**
 * Converts any unsigned fixed-width integer to a BigUint
 */
export function toBigUint(value: ToBigUintSource): BigUint {
  return value.toBigUint()
}

/**
 * Fallible conversions onto the arbitrary-precision types.
 *
 * These accept any JavaScript number, so they can fail: NaN, the infinities
 * and fractional values have no exact integer counterpart, and negative
 * values have no unsigned one. A failure is reported as undefined.
 */

import { BigUint } from '../types/big-uint'

/**
 * Converts a number or bigint to a bigint, or undefined if it is not an integer
 */
export function tryToBigInt(value: number | bigint): bigint | undefined {
  if (typeof value === 'bigint') {
    return value
  }
  if (!Number.isInteger(value)) {
    return undefined
  }
  return BigInt(value)
}

/**
 * Converts a number or bigint to a BigUint, or undefined if it is not a
 * non-negative integer
 */
export function tryToBigUint(value: number | bigint): BigUint | undefined {
  const signed = tryToBigInt(value)
  if (signed === undefined || signed < 0n) {
    return undefined
  }
  return BigUint.fromBigInt(signed)
}

/**
 * Base classes for the fixed-width integer types.
 *
 * The set of subclasses is closed: the twelve classes in signed.ts and
 * unsigned.ts. The private member makes the classes nominal, so no object
 * built elsewhere can stand in for one.
 */

import { expectConversion } from '../convert/expect'
import { tryToBigInt, tryToBigUint } from '../convert/fallible'
import type { InfallibleToBigInt } from '../convert/infallible-to-big-int'
import type { InfallibleToBigUint } from '../convert/infallible-to-big-uint'
import type { BigUint } from './big-uint'
import { INT_RANGES, type IntKind, type SignedKind, type UnsignedKind } from './ranges'

export abstract class FixedInt<K extends IntKind, V extends number | bigint> implements InfallibleToBigInt {
  private readonly sealed = true

  /** Name of the integer type, e.g. 'i32' */
  readonly kind: K
  /** The numeric value, already validated against the range of `kind` */
  readonly value: V

  protected constructor(kind: K, value: V) {
    this.kind = kind
    this.value = value
  }

  get bits(): number {
    return INT_RANGES[this.kind].bits
  }

  get signed(): boolean {
    return INT_RANGES[this.kind].signed
  }

  toBigInt(): bigint {
    return expectConversion(tryToBigInt(this.value), this.kind, 'bigint')
  }

  /**
   * Tests equality of both kind and value
   */
  equals(other: AnyFixedInt): boolean {
    return this.kind === other.kind && this.value === other.value
  }

  toString(radix: number = 10): string {
    return this.value.toString(radix)
  }

  valueOf(): V {
    return this.value
  }

  toJSON(): string {
    return this.toString()
  }
}

export abstract class SignedFixedInt<K extends SignedKind, V extends number | bigint> extends FixedInt<K, V> {}

export abstract class UnsignedFixedInt<K extends UnsignedKind, V extends number | bigint>
  extends FixedInt<K, V>
  implements InfallibleToBigUint
{
  toBigUint(): BigUint {
    return expectConversion(tryToBigUint(this.value), this.kind, 'biguint')
  }
}

export type AnyFixedInt = FixedInt<IntKind, number | bigint>
export type AnySignedFixedInt = SignedFixedInt<SignedKind, number | bigint>
export type AnyUnsignedFixedInt = UnsignedFixedInt<UnsignedKind, number | bigint>

/**
 * Type guard to check if value is one of the fixed-width integer classes
 */
export function isFixedInt(obj: unknown): obj is AnyFixedInt {
  return obj instanceof FixedInt
}

/**
 * Arbitrary-precision unsigned integer.
 *
 * A thin immutable wrapper over a non-negative bigint. The wrapper exists so
 * the type system can tell an unsigned big integer apart from a signed one;
 * all arithmetic is delegated to the built-in bigint.
 */

// Type for values that can be converted to BigUint
export type BigUintable = number | string | bigint | BigUint

const MAX_SAFE_BIGINT = BigInt(Number.MAX_SAFE_INTEGER)

/**
 * Represents a non-negative integer of unbounded size.
 */
export class BigUint {
  /** The underlying value, always >= 0 */
  readonly value: bigint

  // Static constants
  static readonly ZERO: BigUint = new BigUint(0n)
  static readonly ONE: BigUint = new BigUint(1n)

  private constructor(value: bigint) {
    this.value = value
  }

  // ==================== Static Factory Methods ====================

  /**
   * Creates BigUint from a bigint
   * @throws RangeError if the value is negative
   */
  static fromBigInt(value: bigint): BigUint {
    if (value < 0n) {
      throw new RangeError(`BigUint cannot hold negative value ${value}`)
    }
    return new BigUint(value)
  }

  /**
   * Creates BigUint from a number, which must be a non-negative integer
   */
  static fromNumber(value: number): BigUint {
    if (!Number.isInteger(value)) {
      throw new RangeError(`BigUint requires an integer, got ${value}`)
    }
    return BigUint.fromBigInt(BigInt(value))
  }

  /**
   * Creates BigUint from a string representation
   * @param str - Digits in the given radix, optionally prefixed with '+'
   * @param radix - Radix (2-36), defaults to 10
   */
  static fromString(str: string, radix: number = 10): BigUint {
    const value = parseDigits(str, radix)
    if (value === undefined) {
      throw new RangeError(`Invalid unsigned integer string "${str}" for radix ${radix}`)
    }
    return new BigUint(value)
  }

  /**
   * Creates BigUint from any valid input value
   */
  static fromValue(val: BigUintable): BigUint {
    if (val instanceof BigUint) {
      return val
    }
    if (typeof val === 'number') {
      return BigUint.fromNumber(val)
    }
    if (typeof val === 'string') {
      return BigUint.fromString(val)
    }
    return BigUint.fromBigInt(val)
  }

  /**
   * Like fromValue, but returns undefined instead of throwing
   */
  static tryFrom(val: BigUintable): BigUint | undefined {
    if (val instanceof BigUint) {
      return val
    }
    if (typeof val === 'string') {
      const parsed = parseDigits(val, 10)
      return parsed === undefined ? undefined : new BigUint(parsed)
    }
    if (typeof val === 'number' && !Number.isInteger(val)) {
      return undefined
    }
    const big = BigInt(val)
    return big < 0n ? undefined : new BigUint(big)
  }

  /**
   * Creates BigUint from big-endian bytes
   */
  static fromBytes(bytes: Uint8Array): BigUint {
    let result = 0n
    for (const byte of bytes) {
      result = (result << 8n) | BigInt(byte)
    }
    return new BigUint(result)
  }

  /**
   * Type guard to check if value is a BigUint
   */
  static isBigUint(obj: unknown): obj is BigUint {
    return obj instanceof BigUint
  }

  // ==================== Conversion Methods ====================

  toBigInt(): bigint {
    return this.value
  }

  /**
   * Converts to a JavaScript number (may lose precision for large values)
   */
  toNumber(): number {
    return Number(this.value)
  }

  /**
   * Checks if value is within JavaScript safe integer range
   */
  inSafeRange(): boolean {
    return this.value <= MAX_SAFE_BIGINT
  }

  /**
   * Converts to string with optional radix
   */
  toString(radix: number = 10): string {
    if (radix < 2 || radix > 36) {
      throw new RangeError('radix out of range')
    }
    return this.value.toString(radix)
  }

  valueOf(): bigint {
    return this.value
  }

  /**
   * Returns a JSON-compatible string representation
   */
  toJSON(): string {
    return this.toString()
  }

  /**
   * Converts to the shortest big-endian byte array, a single zero byte for zero
   */
  toBytes(): Uint8Array {
    if (this.isZero()) {
      return new Uint8Array(1)
    }
    const bytes = new Uint8Array(Math.ceil(this.bitLength() / 8))
    let rest = this.value
    for (let i = bytes.length - 1; i >= 0; i--) {
      bytes[i] = Number(rest & 0xffn)
      rest >>= 8n
    }
    return bytes
  }

  /**
   * Gets the number of bits needed to represent the value (0 for zero)
   */
  bitLength(): number {
    return this.isZero() ? 0 : this.value.toString(2).length
  }

  // ==================== Test Methods ====================

  isZero(): boolean {
    return this.value === 0n
  }

  isOdd(): boolean {
    return (this.value & 1n) === 1n
  }

  isEven(): boolean {
    return (this.value & 1n) === 0n
  }

  // ==================== Comparison Methods ====================

  equals(other: BigUintable): boolean {
    return this.value === BigUint.fromValue(other).value
  }

  /**
   * Compares this BigUint with another
   * @returns -1 if less, 0 if equal, 1 if greater
   */
  compare(other: BigUintable): number {
    const otherValue = BigUint.fromValue(other).value
    if (this.value === otherValue) {
      return 0
    }
    return this.value < otherValue ? -1 : 1
  }

  lessThan(other: BigUintable): boolean {
    return this.compare(other) < 0
  }

  lessThanOrEqual(other: BigUintable): boolean {
    return this.compare(other) <= 0
  }

  greaterThan(other: BigUintable): boolean {
    return this.compare(other) > 0
  }

  greaterThanOrEqual(other: BigUintable): boolean {
    return this.compare(other) >= 0
  }

  // ==================== Arithmetic Operations ====================

  add(addend: BigUintable): BigUint {
    const other = BigUint.fromValue(addend)
    if (other.isZero()) {
      return this
    }
    return new BigUint(this.value + other.value)
  }

  /**
   * Returns the difference
   * @throws RangeError if the subtrahend is larger than this value
   */
  subtract(subtrahend: BigUintable): BigUint {
    const result = this.checkedSubtract(subtrahend)
    if (result === undefined) {
      throw new RangeError('BigUint subtraction underflow')
    }
    return result
  }

  /**
   * Returns the difference, or undefined if it would be negative
   */
  checkedSubtract(subtrahend: BigUintable): BigUint | undefined {
    const other = BigUint.fromValue(subtrahend)
    if (other.isZero()) {
      return this
    }
    const result = this.value - other.value
    return result < 0n ? undefined : new BigUint(result)
  }

  multiply(multiplier: BigUintable): BigUint {
    const other = BigUint.fromValue(multiplier)
    if (this.isZero() || other.isZero()) {
      return BigUint.ZERO
    }
    return new BigUint(this.value * other.value)
  }

  /**
   * Returns this BigUint divided by another (floor division)
   */
  div(divisor: BigUintable): BigUint {
    const other = BigUint.fromValue(divisor)
    if (other.isZero()) {
      throw new Error('Division by zero')
    }
    return new BigUint(this.value / other.value)
  }

  /**
   * Returns the remainder of division by another
   */
  mod(divisor: BigUintable): BigUint {
    const other = BigUint.fromValue(divisor)
    if (other.isZero()) {
      throw new Error('Division by zero')
    }
    return new BigUint(this.value % other.value)
  }

  /**
   * Raises this value to a non-negative integer power
   */
  pow(exponent: number): BigUint {
    if (!Number.isInteger(exponent) || exponent < 0) {
      throw new RangeError(`Exponent must be a non-negative integer, got ${exponent}`)
    }
    return new BigUint(this.value ** BigInt(exponent))
  }
}

function digitValue(code: number): number {
  if (code >= 48 && code <= 57) return code - 48 // 0-9
  if (code >= 97 && code <= 122) return code - 87 // a-z
  if (code >= 65 && code <= 90) return code - 55 // A-Z
  return Number.POSITIVE_INFINITY
}

function parseDigits(str: string, radix: number): bigint | undefined {
  if (!Number.isInteger(radix) || radix < 2 || radix > 36) {
    throw new RangeError('radix out of range')
  }
  const digits = str.startsWith('+') ? str.slice(1) : str
  if (digits.length === 0) {
    return undefined
  }
  const base = BigInt(radix)
  let result = 0n
  for (let i = 0; i < digits.length; i++) {
    const digit = digitValue(digits.charCodeAt(i))
    if (digit >= radix) {
      return undefined
    }
    result = result * base + BigInt(digit)
  }
  return result
}

/**
 * Creates a BigUint from any valid input value
 */
export const biguint = (val: BigUintable): BigUint => BigUint.fromValue(val)

/**
 * Check if a value is a BigUint
 */
export const isBigUint = (obj: unknown): obj is BigUint => BigUint.isBigUint(obj)

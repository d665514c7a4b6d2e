/**
 * Conversion Errors
 * Custom error classes for fixed-width integers and their conversions
 */

/**
 * Base class for all conversion errors
 */
export class ConversionError extends Error {
  readonly code: string

  constructor(message: string, code: string = 'CONVERSION_ERROR') {
    super(message)
    this.name = 'ConversionError'
    this.code = code

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConversionError)
    }
  }
}

/**
 * Error when a value does not fit the fixed-width integer type it is given to
 */
export class IntegerRangeError extends ConversionError {
  readonly kind: string
  readonly value: unknown
  readonly min: bigint
  readonly max: bigint

  constructor(kind: string, value: unknown, min: bigint, max: bigint, reason?: string) {
    super(
      `Value ${describeValue(value)} is not a valid ${kind} (expected an integer in [${min}, ${max}])` +
        (reason ? `: ${reason}` : ''),
      'INTEGER_OUT_OF_RANGE'
    )
    this.name = 'IntegerRangeError'
    this.kind = kind
    this.value = value
    this.min = min
    this.max = max
  }
}

/**
 * Raised when a conversion that cannot fail did fail.
 *
 * This is a defect in the arbitrary-precision backend or in the range table,
 * never something a caller can correct. Treat it like a panic: let it
 * propagate and stop the work in progress.
 */
export class ConversionInvariantError extends ConversionError {
  readonly sourceType: string
  readonly target: string

  constructor(sourceType: string, target: string, message: string) {
    super(message, 'CONVERSION_INVARIANT_VIOLATED')
    this.name = 'ConversionInvariantError'
    this.sourceType = sourceType
    this.target = target
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'bigint') {
    return `${value}n`
  }
  if (typeof value === 'string') {
    return JSON.stringify(value)
  }
  return String(value)
}

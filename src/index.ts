/**
 * infallible-bigint - conversions from fixed-width integers to
 * arbitrary-precision integers that cannot fail
 */

// Re-export conversions
export { toBigInt, toBigUint, tryToBigInt, tryToBigUint } from './convert'
export type { InfallibleToBigInt, InfallibleToBigUint, ToBigIntSource, ToBigUintSource } from './convert'

// Re-export types
export * from './types'

// Re-export errors
export { ConversionError, IntegerRangeError, ConversionInvariantError } from './errors'

// Re-export configuration
export { configure, getConfig, resetConfig } from './config'
export type { Config, LoggingConfig, LogLevel } from './config'

export { POINTER_WIDTH } from './platform'
export type { PointerWidth } from './platform'

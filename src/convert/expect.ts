import { log } from '../config'
import { ConversionInvariantError } from '../errors'

export type ConversionTarget = 'bigint' | 'biguint'

const METHOD_NAMES: Record<ConversionTarget, string> = {
  bigint: 'toBigInt',
  biguint: 'toBigUint',
}

/**
 * Unwraps the result of a conversion that is known to succeed for the given
 * source type. A missing result is reported and raised as a
 * ConversionInvariantError; it is never replaced by a default.
 */
export function expectConversion<T>(result: T | undefined, sourceType: string, target: ConversionTarget): T {
  if (result === undefined) {
    const message =
      `${METHOD_NAMES[target]} failed for ${sourceType}, ` +
      'this should not happen and is most likely a programming error'
    log('error', message)
    throw new ConversionInvariantError(sourceType, target, message)
  }
  return result
}

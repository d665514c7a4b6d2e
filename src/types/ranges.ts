/**
 * Range table and validation schemas for the fixed-width integer kinds
 */

import { z } from 'zod'
import { IntegerRangeError } from '../errors'
import { POINTER_WIDTH } from '../platform'

export const SIGNED_KINDS = ['i8', 'i16', 'i32', 'i64', 'i128', 'isize'] as const
export const UNSIGNED_KINDS = ['u8', 'u16', 'u32', 'u64', 'u128', 'usize'] as const
export const INT_KINDS = [...SIGNED_KINDS, ...UNSIGNED_KINDS] as const

export type SignedKind = (typeof SIGNED_KINDS)[number]
export type UnsignedKind = (typeof UNSIGNED_KINDS)[number]
export type IntKind = SignedKind | UnsignedKind

// Kinds narrow enough to be held exactly in a JavaScript number
export type NumberKind = 'i8' | 'i16' | 'i32' | 'u8' | 'u16' | 'u32'
export type BigIntKind = Exclude<IntKind, NumberKind>

export interface IntRange {
  readonly kind: IntKind
  readonly bits: number
  readonly signed: boolean
  readonly min: bigint
  readonly max: bigint
}

function range(kind: IntKind, bits: number, signed: boolean): IntRange {
  const size = BigInt(bits)
  return Object.freeze({
    kind,
    bits,
    signed,
    min: signed ? -(1n << (size - 1n)) : 0n,
    max: signed ? (1n << (size - 1n)) - 1n : (1n << size) - 1n,
  })
}

export const INT_RANGES: { readonly [K in IntKind]: IntRange } = {
  i8: range('i8', 8, true),
  i16: range('i16', 16, true),
  i32: range('i32', 32, true),
  i64: range('i64', 64, true),
  i128: range('i128', 128, true),
  isize: range('isize', POINTER_WIDTH, true),
  u8: range('u8', 8, false),
  u16: range('u16', 16, false),
  u32: range('u32', 32, false),
  u64: range('u64', 64, false),
  u128: range('u128', 128, false),
  usize: range('usize', POINTER_WIDTH, false),
}

function numberSchema(r: IntRange): z.ZodType<number> {
  return z.number().int().min(Number(r.min)).max(Number(r.max))
}

function bigintSchema(r: IntRange): z.ZodType<bigint> {
  return z.bigint().min(r.min).max(r.max)
}

// Numbers given to a wide kind must convert to bigint exactly
const SAFE_INTEGER_SCHEMA = z
  .number()
  .int()
  .refine(Number.isSafeInteger, 'Number is not a safe integer, pass a bigint instead')

const NUMBER_SCHEMAS: { readonly [K in NumberKind]: z.ZodType<number> } = {
  i8: numberSchema(INT_RANGES.i8),
  i16: numberSchema(INT_RANGES.i16),
  i32: numberSchema(INT_RANGES.i32),
  u8: numberSchema(INT_RANGES.u8),
  u16: numberSchema(INT_RANGES.u16),
  u32: numberSchema(INT_RANGES.u32),
}

const BIGINT_SCHEMAS: { readonly [K in BigIntKind]: z.ZodType<bigint> } = {
  i64: bigintSchema(INT_RANGES.i64),
  i128: bigintSchema(INT_RANGES.i128),
  isize: bigintSchema(INT_RANGES.isize),
  u64: bigintSchema(INT_RANGES.u64),
  u128: bigintSchema(INT_RANGES.u128),
  usize: bigintSchema(INT_RANGES.usize),
}

function rangeError(kind: IntKind, value: unknown, error: z.ZodError): IntegerRangeError {
  const r = INT_RANGES[kind]
  return new IntegerRangeError(kind, value, r.min, r.max, error.issues[0]?.message)
}

/**
 * Validates a number against a kind held as a number
 * @throws IntegerRangeError if the value is not an integer within range
 */
export function parseNumberKind(kind: NumberKind, value: number): number {
  const result = NUMBER_SCHEMAS[kind].safeParse(value)
  if (!result.success) {
    throw rangeError(kind, value, result.error)
  }
  return result.data
}

/**
 * Validates a bigint, or a safe-integer number, against a kind held as a bigint
 * @throws IntegerRangeError if the value is not an integer within range
 */
export function parseBigIntKind(kind: BigIntKind, value: number | bigint): bigint {
  let candidate: unknown = value
  if (typeof value === 'number') {
    const safe = SAFE_INTEGER_SCHEMA.safeParse(value)
    if (!safe.success) {
      throw rangeError(kind, value, safe.error)
    }
    candidate = BigInt(safe.data)
  }
  const result = BIGINT_SCHEMAS[kind].safeParse(candidate)
  if (!result.success) {
    throw rangeError(kind, value, result.error)
  }
  return result.data
}

import { TypeMismatchError } from '../errors.js'

/**
 * Decodes the single column of a row into a target type. `null` and
 * `undefined` column values decode to `null`; anything the decoder rejects
 * is a `TypeMismatchError`.
 */
export interface ColumnDecoder<T> {
  readonly type: string
  decode(value: unknown, column: string): T
}

/**
 * Builds a decoder from a conversion that returns `undefined` for values it
 * cannot handle.
 */
export function defineDecoder<T>(
  type: string,
  convert: (value: NonNullable<unknown>) => T | undefined,
): ColumnDecoder<T | null> {
  return {
    type,
    decode(value, column) {
      if (value === null || value === undefined) return null
      const decoded = convert(value)
      if (decoded === undefined) {
        throw new TypeMismatchError({ column, expected: type, actual: describeValue(value) })
      }
      return decoded
    },
  }
}

// ── Built-in Decoders ──────────────────────────────────────────

interface NumericLike {
  toNumber(): number
}

// driver Long / BigDecimal / Integer values
function isNumericLike(value: object): value is NumericLike {
  return 'toNumber' in value && typeof value.toNumber === 'function'
}

export const decoders = {
  string: defineDecoder('string', (value) => (typeof value === 'string' ? value : undefined)),

  number: defineDecoder('number', (value) => {
    if (typeof value === 'number') return value
    if (typeof value === 'bigint') {
      return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
        ? Number(value)
        : undefined
    }
    if (typeof value === 'object' && isNumericLike(value)) {
      // a Long past 2^53 rounds in toNumber()
      const decoded = value.toNumber()
      return Number.isInteger(decoded) && !Number.isSafeInteger(decoded) ? undefined : decoded
    }
    return undefined
  }),

  bigint: defineDecoder('bigint', (value) => {
    if (typeof value === 'bigint') return value
    if (typeof value === 'number') return Number.isInteger(value) ? BigInt(value) : undefined
    if (typeof value === 'object' && isNumericLike(value)) {
      const text = String(value)
      return /^-?\d+$/.test(text) ? BigInt(text) : undefined
    }
    return undefined
  }),

  boolean: defineDecoder('boolean', (value) => (typeof value === 'boolean' ? value : undefined)),

  date: defineDecoder('date', (value) => (value instanceof Date ? value : undefined)),

  buffer: defineDecoder('buffer', (value) => (Buffer.isBuffer(value) ? value : undefined)),
} as const

function describeValue(value: NonNullable<unknown>): string {
  if (typeof value !== 'object') return typeof value
  if (Array.isArray(value)) return 'array'
  return value.constructor?.name ?? 'object'
}

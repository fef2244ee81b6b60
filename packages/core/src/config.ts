import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'

// ── Consistency Levels ─────────────────────────────────────────

/** Protocol codes; identical to `cassandra-driver`'s `types.consistencies`. */
export const ConsistencyLevel = {
  any: 0x00,
  one: 0x01,
  two: 0x02,
  three: 0x03,
  quorum: 0x04,
  all: 0x05,
  localQuorum: 0x06,
  eachQuorum: 0x07,
  serial: 0x08,
  localSerial: 0x09,
  localOne: 0x0a,
} as const

export type ConsistencyLevel = (typeof ConsistencyLevel)[keyof typeof ConsistencyLevel]

const CONSISTENCY_NAMES = new Map<number, string>(
  Object.entries(ConsistencyLevel).map(([name, code]): [number, string] => [code, name]),
)

const SERIAL_LEVELS = new Set<number>([ConsistencyLevel.serial, ConsistencyLevel.localSerial])

export function consistencyName(level: number): string | undefined {
  return CONSISTENCY_NAMES.get(level)
}

// ── Execution Options ──────────────────────────────────────────

/**
 * Settings the template applies to every statement it executes.
 * A field left `undefined` keeps the driver's default for that statement.
 */
export interface ExecutionOptions {
  readonly pageSize?: number | undefined
  readonly consistency?: ConsistencyLevel | undefined
  readonly serialConsistency?: ConsistencyLevel | undefined
  readonly executionProfile?: string | undefined
}

type MutableExecutionOptions = { -readonly [K in keyof ExecutionOptions]: ExecutionOptions[K] }

/** Copies only the fields that are set, layering `patch` over `base`. */
export function mergeExecutionOptions(base: ExecutionOptions, patch: ExecutionOptions = {}): ExecutionOptions {
  const merged: MutableExecutionOptions = {}
  for (const source of [base, patch]) {
    if (source.pageSize !== undefined) merged.pageSize = source.pageSize
    if (source.consistency !== undefined) merged.consistency = source.consistency
    if (source.serialConsistency !== undefined) merged.serialConsistency = source.serialConsistency
    if (source.executionProfile !== undefined) merged.executionProfile = source.executionProfile
  }
  return Object.freeze(merged)
}

// ── Validation ─────────────────────────────────────────────────

export function validateExecutionOptions(options: ExecutionOptions): ConfigError | null {
  const errors: ConfigErrorEntry[] = []

  if (options.pageSize !== undefined && (!Number.isInteger(options.pageSize) || options.pageSize <= 0)) {
    errors.push({
      code: 'INVALID_PAGE_SIZE',
      message: `pageSize must be a positive integer, got ${options.pageSize}`,
      details: { field: 'pageSize', expected: 'positive integer', actual: String(options.pageSize) },
    })
  }

  if (options.consistency !== undefined && !CONSISTENCY_NAMES.has(options.consistency)) {
    errors.push({
      code: 'INVALID_CONSISTENCY',
      message: `Unknown consistency level: ${options.consistency}`,
      details: { field: 'consistency', actual: String(options.consistency) },
    })
  }

  if (options.serialConsistency !== undefined && !SERIAL_LEVELS.has(options.serialConsistency)) {
    errors.push({
      code: 'INVALID_SERIAL_CONSISTENCY',
      message: `serialConsistency must be serial or localSerial, got ${
        consistencyName(options.serialConsistency) ?? options.serialConsistency
      }`,
      details: {
        field: 'serialConsistency',
        expected: 'serial | localSerial',
        actual: String(options.serialConsistency),
      },
    })
  }

  if (options.executionProfile !== undefined && options.executionProfile.trim().length === 0) {
    errors.push({
      code: 'INVALID_EXECUTION_PROFILE',
      message: 'executionProfile must be a non-empty string',
      details: { field: 'executionProfile', actual: `'${options.executionProfile}'` },
    })
  }

  return errors.length > 0 ? new ConfigError(errors) : null
}

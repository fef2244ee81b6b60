import type { Statement } from './statements.js'
import type { PreparedStatementBinder, PreparedStatementCreator } from './types/interfaces.js'

// ── Statement Sources ──────────────────────────────────────────

export interface CqlSource {
  readonly kind: 'cql'
  readonly cql: string
}

export interface PreparedSource {
  readonly kind: 'prepared'
  readonly cql: string
  readonly args: readonly unknown[]
}

export interface StatementInstanceSource {
  readonly kind: 'statement'
  readonly statement: Statement
}

export interface CreatorSource {
  readonly kind: 'creator'
  readonly creator: PreparedStatementCreator
  readonly binder?: PreparedStatementBinder | undefined
}

export type StatementSource = CqlSource | PreparedSource | StatementInstanceSource | CreatorSource

/** Anything a template operation accepts as its query. */
export type QueryInput = string | Statement | StatementSource

export const Source = {
  cql(cql: string): CqlSource {
    return { kind: 'cql', cql }
  },
  prepared(cql: string, ...args: unknown[]): PreparedSource {
    return { kind: 'prepared', cql, args }
  },
  statement(statement: Statement): StatementInstanceSource {
    return { kind: 'statement', statement }
  },
  creator(creator: PreparedStatementCreator, binder?: PreparedStatementBinder): CreatorSource {
    return binder !== undefined ? { kind: 'creator', creator, binder } : { kind: 'creator', creator }
  },
} as const

/**
 * Text with arguments goes down the prepared path; text alone runs as a
 * simple statement.
 */
export function toSource(input: QueryInput, args: readonly unknown[] = []): StatementSource {
  if (typeof input === 'string') {
    return args.length > 0 ? { kind: 'prepared', cql: input, args } : { kind: 'cql', cql: input }
  }
  switch (input.kind) {
    case 'simple':
    case 'bound':
      return { kind: 'statement', statement: input }
    case 'cql':
    case 'prepared':
    case 'statement':
    case 'creator':
      return input
  }
}

/** Query text for logs and error details, when the source has any. */
export function cqlOf(source: StatementSource): string | undefined {
  switch (source.kind) {
    case 'cql':
    case 'prepared':
      return source.cql
    case 'statement':
      return source.statement.query
    case 'creator':
      return undefined
  }
}

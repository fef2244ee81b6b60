import type { DataAccessError } from '../errors.js'
import type { BoundStatement, PreparedStatement, Statement } from '../statements.js'

// --- Rows & Results ---

export interface Row {
  get(column: string | number): unknown
  keys(): string[]
  values(): unknown[]
}

export interface ColumnDefinition {
  readonly name: string
}

/**
 * Forward-only cursor over a result. Iterating may fetch further pages from
 * the store, so it is consumed once.
 */
export interface ResultSet extends AsyncIterable<Row> {
  readonly columns: readonly ColumnDefinition[] | null
  wasApplied(): boolean
}

// --- CqlSession (implemented by driver packages) ---

/**
 * Driver session port.
 *
 * Both calls may reject with driver-native errors; the template translates
 * them. Implementations must be safe for concurrent use.
 */
export interface CqlSession {
  execute(statement: Statement): Promise<ResultSet>
  prepare(cql: string): Promise<PreparedStatement>
}

// --- ExceptionTranslator (implemented by driver packages) ---

export interface TranslationContext {
  readonly task: string
  readonly cql?: string | undefined
}

/**
 * Maps a driver-native failure onto the error taxonomy.
 * Returns `null` for errors it does not recognise.
 */
export interface ExceptionTranslator {
  translate(err: unknown, context: TranslationContext): DataAccessError | null
}

// --- Callbacks ---

export type SessionCallback<T> = (session: CqlSession) => Promise<T> | T

export type PreparedStatementCreator = (session: CqlSession) => Promise<PreparedStatement> | PreparedStatement

export type PreparedStatementBinder = (statement: PreparedStatement) => Promise<BoundStatement> | BoundStatement

export type PreparedStatementCallback<T> = (session: CqlSession, statement: PreparedStatement) => Promise<T> | T

export type ResultSetExtractor<T> = (resultSet: ResultSet) => Promise<T> | T

export type RowMapper<T> = (row: Row, index: number) => T

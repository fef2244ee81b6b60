import type { ConsistencyLevel, ExecutionOptions } from './config.js'

// ── Base ───────────────────────────────────────────────────────

/**
 * Immutable statement configuration. Every `with*` call returns a copy, so a
 * statement handed in by a caller is never changed by the template.
 */
export abstract class ConfigurableStatement<S extends ConfigurableStatement<S>> {
  readonly query: string
  readonly options: ExecutionOptions

  protected constructor(query: string, options: ExecutionOptions) {
    this.query = query
    this.options = Object.freeze({ ...options })
  }

  protected abstract copy(options: ExecutionOptions): S

  withPageSize(pageSize: number): S {
    return this.copy({ ...this.options, pageSize })
  }

  withConsistency(consistency: ConsistencyLevel): S {
    return this.copy({ ...this.options, consistency })
  }

  withSerialConsistency(serialConsistency: ConsistencyLevel): S {
    return this.copy({ ...this.options, serialConsistency })
  }

  withExecutionProfile(executionProfile: string): S {
    return this.copy({ ...this.options, executionProfile })
  }
}

// ── Simple ─────────────────────────────────────────────────────

export class SimpleStatement extends ConfigurableStatement<SimpleStatement> {
  readonly kind = 'simple'
  readonly params: readonly unknown[]

  constructor(query: string, params: readonly unknown[] = [], options: ExecutionOptions = {}) {
    super(query, options)
    this.params = Object.freeze([...params])
  }

  static newInstance(query: string, ...params: unknown[]): SimpleStatement {
    return new SimpleStatement(query, params)
  }

  protected copy(options: ExecutionOptions): SimpleStatement {
    return new SimpleStatement(this.query, this.params, options)
  }
}

// ── Prepared / Bound ───────────────────────────────────────────

export class PreparedStatement extends ConfigurableStatement<PreparedStatement> {
  constructor(query: string, options: ExecutionOptions = {}) {
    super(query, options)
  }

  /** Bound statements start from this statement's options. */
  bind(...params: unknown[]): BoundStatement {
    return new BoundStatement(this, params, this.options)
  }

  protected copy(options: ExecutionOptions): PreparedStatement {
    return new PreparedStatement(this.query, options)
  }
}

export class BoundStatement extends ConfigurableStatement<BoundStatement> {
  readonly kind = 'bound'
  readonly preparedStatement: PreparedStatement
  readonly params: readonly unknown[]

  constructor(preparedStatement: PreparedStatement, params: readonly unknown[], options: ExecutionOptions) {
    super(preparedStatement.query, options)
    this.preparedStatement = preparedStatement
    this.params = Object.freeze([...params])
  }

  protected copy(options: ExecutionOptions): BoundStatement {
    return new BoundStatement(this.preparedStatement, this.params, options)
  }
}

/** What a session executes. */
export type Statement = SimpleStatement | BoundStatement

// ── Option Set ─────────────────────────────────────────────────

/** Applies each set option through the statement's own mutators; unset ones are skipped. */
export function applyExecutionOptions<S extends ConfigurableStatement<S>>(statement: S, options: ExecutionOptions): S {
  let result = statement
  if (options.pageSize !== undefined) result = result.withPageSize(options.pageSize)
  if (options.consistency !== undefined) result = result.withConsistency(options.consistency)
  if (options.serialConsistency !== undefined) result = result.withSerialConsistency(options.serialConsistency)
  if (options.executionProfile !== undefined) result = result.withExecutionProfile(options.executionProfile)
  return result
}

export function applyToStatement(statement: Statement, options: ExecutionOptions): Statement {
  switch (statement.kind) {
    case 'simple':
      return applyExecutionOptions(statement, options)
    case 'bound':
      return applyExecutionOptions(statement, options)
  }
}

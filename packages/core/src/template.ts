import type { ExecutionOptions } from './config.js'
import { mergeExecutionOptions, validateExecutionOptions } from './config.js'
import type { DebugPhase, DebugSink } from './debug/logger.js'
import { debugEntry } from './debug/logger.js'
import type { ColumnDecoder } from './mapping/decoders.js'
import { columnMapRowMapper, extractorFor, singleColumnRowMapper } from './mapping/rowMappers.js'
import { normalizeStatement } from './normalizer.js'
import type { QueryInput, StatementSource } from './source.js'
import { cqlOf, toSource } from './source.js'
import type { Statement } from './statements.js'
import { applyExecutionOptions } from './statements.js'
import { defaultExceptionTranslator, translateError, translatingResultSet } from './translation.js'
import type {
  CqlSession,
  ExceptionTranslator,
  PreparedStatementCallback,
  PreparedStatementCreator,
  ResultSet,
  ResultSetExtractor,
  RowMapper,
  SessionCallback,
  TranslationContext,
} from './types/interfaces.js'

// ── Public Types ───────────────────────────────────────────────

export interface CqlTemplateConfig extends ExecutionOptions {
  readonly session: CqlSession
  readonly translator?: ExceptionTranslator | undefined
  readonly debug?: DebugSink | undefined
}

/** A row mapper, or a decoder for results that have exactly one column. */
export type RowHandler<T> = RowMapper<T> | ColumnDecoder<T>

/**
 * Query operations over a session.
 *
 * Text passed with arguments is prepared and bound; text alone runs as a
 * simple statement. Each operation issues exactly one `execute` to the
 * session. Driver failures surface as `DataAccessError` subclasses; errors
 * thrown by row mappers and extractors are passed through untouched.
 */
export interface CqlTemplate {
  readonly session: CqlSession
  readonly options: ExecutionOptions
  withOptions(options: ExecutionOptions): CqlTemplate

  /** Resolves to the result's "applied" flag. */
  execute(cql: string, ...args: unknown[]): Promise<boolean>
  execute(source: Statement | StatementSource): Promise<boolean>

  update(cql: string, ...args: unknown[]): Promise<boolean>
  update(source: Statement | StatementSource): Promise<boolean>

  executeWithSession<T>(callback: SessionCallback<T>): Promise<T>
  executePrepared<T>(creator: string | PreparedStatementCreator, callback: PreparedStatementCallback<T>): Promise<T>

  query<T>(cql: string, extractor: ResultSetExtractor<T>, ...args: unknown[]): Promise<T>
  query<T>(source: Statement | StatementSource, extractor: ResultSetExtractor<T>): Promise<T>

  queryForResultSet(cql: string, ...args: unknown[]): Promise<ResultSet>
  queryForResultSet(source: Statement | StatementSource): Promise<ResultSet>

  queryForObject<T>(cql: string, handler: RowHandler<T>, ...args: unknown[]): Promise<T>
  queryForObject<T>(source: Statement | StatementSource, handler: RowHandler<T>): Promise<T>

  queryForList<T>(cql: string, handler: RowHandler<T>, ...args: unknown[]): Promise<T[]>
  queryForList<T>(source: Statement | StatementSource, handler: RowHandler<T>): Promise<T[]>

  queryForMap(cql: string, ...args: unknown[]): Promise<Record<string, unknown>>
  queryForMap(source: Statement | StatementSource): Promise<Record<string, unknown>>
}

// ── createCqlTemplate ──────────────────────────────────────────

export function createCqlTemplate(config: CqlTemplateConfig): CqlTemplate {
  const configError = validateExecutionOptions(config)
  if (configError !== null) throw configError

  const { session, debug } = config
  const translator = config.translator ?? defaultExceptionTranslator
  const options = mergeExecutionOptions(config)

  function log(phase: DebugPhase, message: string, startedAt: number, details?: unknown): void {
    if (debug !== undefined) debug(debugEntry(phase, message, Date.now() - startedAt, details))
  }

  // The translation boundary: every driver-facing step runs in here.
  async function guarded<T>(context: TranslationContext, work: () => Promise<T>): Promise<T> {
    const startedAt = Date.now()
    try {
      return await work()
    } catch (err) {
      const translated = translateError(translator, err, context)
      log('translation', `${context.task} failed with ${translated.code}`, startedAt, {
        cql: context.cql,
        error: translated.name,
      })
      throw translated
    }
  }

  async function executeSource(task: string, source: StatementSource): Promise<ResultSet> {
    const context: TranslationContext = { task, cql: cqlOf(source) }
    const startedAt = Date.now()
    const resultSet = await guarded(context, async () =>
      session.execute(await normalizeStatement(source, session, options)),
    )
    log('execution', `Executed ${source.kind} statement`, startedAt, { cql: context.cql })
    return translatingResultSet(resultSet, translator, context)
  }

  async function mapOne<T>(task: string, source: StatementSource, mapper: RowMapper<T>): Promise<T> {
    const resultSet = await executeSource(task, source)
    const startedAt = Date.now()
    const value = await extractorFor(mapper, 'exactly-one')(resultSet)
    log('mapping', 'Mapped 1 row', startedAt)
    return value
  }

  async function mapAll<T>(task: string, source: StatementSource, mapper: RowMapper<T>): Promise<T[]> {
    const resultSet = await executeSource(task, source)
    const startedAt = Date.now()
    const values = await extractorFor(mapper, 'list')(resultSet)
    log('mapping', `Mapped ${values.length} rows`, startedAt)
    return values
  }

  return {
    session,
    options,

    withOptions(patch: ExecutionOptions): CqlTemplate {
      return createCqlTemplate({ session, translator, debug, ...mergeExecutionOptions(options, patch) })
    },

    async execute(input: QueryInput, ...args: unknown[]): Promise<boolean> {
      const resultSet = await executeSource('execute', toSource(input, args))
      return resultSet.wasApplied()
    },

    async update(input: QueryInput, ...args: unknown[]): Promise<boolean> {
      const resultSet = await executeSource('update', toSource(input, args))
      return resultSet.wasApplied()
    },

    async executeWithSession<T>(callback: SessionCallback<T>): Promise<T> {
      return guarded({ task: 'executeWithSession' }, async () => callback(session))
    },

    async executePrepared<T>(
      creator: string | PreparedStatementCreator,
      callback: PreparedStatementCallback<T>,
    ): Promise<T> {
      const cql = typeof creator === 'string' ? creator : undefined
      return guarded({ task: 'executePrepared', cql }, async () => {
        const prepared = typeof creator === 'string' ? await session.prepare(creator) : await creator(session)
        return callback(session, applyExecutionOptions(prepared, options))
      })
    },

    async query<T>(input: QueryInput, extractor: ResultSetExtractor<T>, ...args: unknown[]): Promise<T> {
      const resultSet = await executeSource('query', toSource(input, args))
      return extractor(resultSet)
    },

    async queryForResultSet(input: QueryInput, ...args: unknown[]): Promise<ResultSet> {
      return executeSource('queryForResultSet', toSource(input, args))
    },

    async queryForObject<T>(input: QueryInput, handler: RowHandler<T>, ...args: unknown[]): Promise<T> {
      return mapOne('queryForObject', toSource(input, args), toRowMapper(handler))
    },

    async queryForList<T>(input: QueryInput, handler: RowHandler<T>, ...args: unknown[]): Promise<T[]> {
      return mapAll('queryForList', toSource(input, args), toRowMapper(handler))
    },

    async queryForMap(input: QueryInput, ...args: unknown[]): Promise<Record<string, unknown>> {
      return mapOne('queryForMap', toSource(input, args), columnMapRowMapper)
    },
  }
}

function toRowMapper<T>(handler: RowHandler<T>): RowMapper<T> {
  return typeof handler === 'function' ? handler : singleColumnRowMapper(handler)
}

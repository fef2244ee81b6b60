export type { ExecutionOptions } from './config.js'
export { ConsistencyLevel, consistencyName, mergeExecutionOptions, validateExecutionOptions } from './config.js'
export type { DebugLogEntry, DebugPhase, DebugSink } from './debug/logger.js'
export { debugEntry, withDebugLog } from './debug/logger.js'
export type { ConfigErrorEntry, OperationDetails, TypeMismatchDetails } from './errors.js'
export {
  AuthorizationError,
  ConfigError,
  ConnectionFailureError,
  DataAccessError,
  EmptyResultError,
  IncorrectColumnCountError,
  IncorrectResultSizeError,
  InvalidQueryError,
  QueryTimeoutError,
  TypeMismatchError,
  UnavailableError,
  UncategorizedDataAccessError,
} from './errors.js'
export type { ColumnDecoder } from './mapping/decoders.js'
export { decoders, defineDecoder } from './mapping/decoders.js'
export type { Cardinality } from './mapping/rowMappers.js'
export {
  columnMapRowMapper,
  extractorFor,
  mapRows,
  mapSingleRow,
  rowMapperExtractor,
  singleColumnRowMapper,
  singleRowExtractor,
} from './mapping/rowMappers.js'
export { normalizeStatement } from './normalizer.js'
export type { CqlSource, CreatorSource, PreparedSource, QueryInput, StatementInstanceSource, StatementSource } from './source.js'
export { cqlOf, Source, toSource } from './source.js'
export type { Statement } from './statements.js'
export {
  applyExecutionOptions,
  applyToStatement,
  BoundStatement,
  ConfigurableStatement,
  PreparedStatement,
  SimpleStatement,
} from './statements.js'
export type { CqlTemplate, CqlTemplateConfig, RowHandler } from './template.js'
export { createCqlTemplate } from './template.js'
export { defaultExceptionTranslator, translateError, translatingResultSet } from './translation.js'
export type {
  ColumnDefinition,
  CqlSession,
  ExceptionTranslator,
  PreparedStatementBinder,
  PreparedStatementCallback,
  PreparedStatementCreator,
  ResultSet,
  ResultSetExtractor,
  Row,
  RowMapper,
  SessionCallback,
  TranslationContext,
} from './types/interfaces.js'

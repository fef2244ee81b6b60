// --- Base Error ---

export class DataAccessError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DataAccessError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Driver-facing errors ---

/** Where a translated failure happened. */
export interface OperationDetails {
  task: string
  cql?: string | undefined
}

export class ConnectionFailureError extends DataAccessError {
  declare readonly code: 'CONNECTION_FAILURE'
  readonly details: OperationDetails

  constructor(message: string, details: OperationDetails, cause?: unknown) {
    super('CONNECTION_FAILURE', message, causeOption(cause))
    this.name = 'ConnectionFailureError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

export class InvalidQueryError extends DataAccessError {
  declare readonly code: 'INVALID_QUERY' | 'QUERY_SYNTAX' | 'SCHEMA_ELEMENT_EXISTS'
  readonly details: OperationDetails

  constructor(
    code: 'INVALID_QUERY' | 'QUERY_SYNTAX' | 'SCHEMA_ELEMENT_EXISTS',
    message: string,
    details: OperationDetails,
    cause?: unknown,
  ) {
    super(code, message, causeOption(cause))
    this.name = 'InvalidQueryError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

export class QueryTimeoutError extends DataAccessError {
  declare readonly code: 'READ_TIMEOUT' | 'WRITE_TIMEOUT' | 'OPERATION_TIMEOUT'
  readonly details: OperationDetails

  constructor(
    code: 'READ_TIMEOUT' | 'WRITE_TIMEOUT' | 'OPERATION_TIMEOUT',
    message: string,
    details: OperationDetails,
    cause?: unknown,
  ) {
    super(code, message, causeOption(cause))
    this.name = 'QueryTimeoutError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

export class UnavailableError extends DataAccessError {
  declare readonly code: 'UNAVAILABLE' | 'OVERLOADED' | 'BOOTSTRAPPING'
  readonly details: OperationDetails

  constructor(
    code: 'UNAVAILABLE' | 'OVERLOADED' | 'BOOTSTRAPPING',
    message: string,
    details: OperationDetails,
    cause?: unknown,
  ) {
    super(code, message, causeOption(cause))
    this.name = 'UnavailableError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

export class AuthorizationError extends DataAccessError {
  declare readonly code: 'AUTHENTICATION_FAILED' | 'UNAUTHORIZED'
  readonly details: OperationDetails

  constructor(
    code: 'AUTHENTICATION_FAILED' | 'UNAUTHORIZED',
    message: string,
    details: OperationDetails,
    cause?: unknown,
  ) {
    super(code, message, causeOption(cause))
    this.name = 'AuthorizationError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

export class UncategorizedDataAccessError extends DataAccessError {
  declare readonly code: 'UNCATEGORIZED'
  readonly details: OperationDetails

  constructor(details: OperationDetails, cause: unknown) {
    super('UNCATEGORIZED', `Uncategorized failure in ${details.task}: ${messageOf(cause)}`, { cause })
    this.name = 'UncategorizedDataAccessError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

// --- Result errors ---

export class IncorrectResultSizeError extends DataAccessError {
  declare readonly code: 'INCORRECT_RESULT_SIZE' | 'EMPTY_RESULT'
  readonly expected: number
  readonly actual: number

  constructor(expected: number, actual: number) {
    super(actual === 0 ? 'EMPTY_RESULT' : 'INCORRECT_RESULT_SIZE', resultSizeMessage(expected, actual))
    this.name = 'IncorrectResultSizeError'
    this.expected = expected
    this.actual = actual
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), expected: this.expected, actual: this.actual }
  }
}

export class EmptyResultError extends IncorrectResultSizeError {
  declare readonly code: 'EMPTY_RESULT'

  constructor(expected: number) {
    super(expected, 0)
    this.name = 'EmptyResultError'
  }
}

export class IncorrectColumnCountError extends DataAccessError {
  declare readonly code: 'INCORRECT_COLUMN_COUNT'
  readonly expected: number
  readonly actual: number

  constructor(expected: number, actual: number) {
    super('INCORRECT_COLUMN_COUNT', `Incorrect column count: expected ${expected}, actual ${actual}`)
    this.name = 'IncorrectColumnCountError'
    this.expected = expected
    this.actual = actual
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), expected: this.expected, actual: this.actual }
  }
}

export interface TypeMismatchDetails {
  column: string
  expected: string
  actual: string
}

export class TypeMismatchError extends DataAccessError {
  declare readonly code: 'TYPE_MISMATCH'
  readonly details: TypeMismatchDetails

  constructor(details: TypeMismatchDetails) {
    super(
      'TYPE_MISMATCH',
      `Column '${details.column}' holds ${details.actual}, cannot decode as ${details.expected}`,
    )
    this.name = 'TypeMismatchError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: this.details }
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code: 'INVALID_PAGE_SIZE' | 'INVALID_CONSISTENCY' | 'INVALID_SERIAL_CONSISTENCY' | 'INVALID_EXECUTION_PROFILE'
  message: string
  details: {
    field: string
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends DataAccessError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Helpers ---

function causeOption(cause: unknown): ErrorOptions | undefined {
  return cause !== undefined ? { cause } : undefined
}

function resultSizeMessage(expected: number, actual: number): string {
  return `Incorrect result size: expected ${expected}, actual ${actual}`
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof DataAccessError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

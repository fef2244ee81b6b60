import type { DataAccessError, ExceptionTranslator, OperationDetails } from '@cql-template/core'
import {
  AuthorizationError,
  ConnectionFailureError,
  InvalidQueryError,
  QueryTimeoutError,
  UnavailableError,
  UncategorizedDataAccessError,
} from '@cql-template/core'
import cassandra from 'cassandra-driver'

const { errors } = cassandra
const codes = cassandra.types.responseErrorCodes

/**
 * Maps `cassandra-driver` errors onto the data-access taxonomy. Anything that
 * is not a driver error is left to the caller.
 */
export const cassandraExceptionTranslator: ExceptionTranslator = {
  translate(err, context) {
    if (!(err instanceof errors.DriverError)) return null

    const details: OperationDetails = { task: context.task, cql: context.cql }
    const message = err.message

    if (err instanceof errors.NoHostAvailableError || err instanceof errors.BusyConnectionError) {
      return new ConnectionFailureError(message, details, err)
    }
    if (err instanceof errors.OperationTimedOutError) {
      return new QueryTimeoutError('OPERATION_TIMEOUT', message, details, err)
    }
    if (err instanceof errors.AuthenticationError) {
      return new AuthorizationError('AUTHENTICATION_FAILED', message, details, err)
    }
    if (err instanceof errors.ArgumentError) {
      return new InvalidQueryError('INVALID_QUERY', message, details, err)
    }
    if (err instanceof errors.ResponseError) {
      return translateResponseError(err.code, message, details, err)
    }
    return new UncategorizedDataAccessError(details, err)
  },
}

function translateResponseError(
  code: number,
  message: string,
  details: OperationDetails,
  cause: Error,
): DataAccessError {
  switch (code) {
    case codes.syntaxError:
      return new InvalidQueryError('QUERY_SYNTAX', message, details, cause)
    case codes.invalid:
    case codes.configError:
      return new InvalidQueryError('INVALID_QUERY', message, details, cause)
    case codes.alreadyExists:
      return new InvalidQueryError('SCHEMA_ELEMENT_EXISTS', message, details, cause)
    case codes.readTimeout:
      return new QueryTimeoutError('READ_TIMEOUT', message, details, cause)
    case codes.writeTimeout:
      return new QueryTimeoutError('WRITE_TIMEOUT', message, details, cause)
    case codes.unavailableException:
      return new UnavailableError('UNAVAILABLE', message, details, cause)
    case codes.overloaded:
      return new UnavailableError('OVERLOADED', message, details, cause)
    case codes.isBootstrapping:
      return new UnavailableError('BOOTSTRAPPING', message, details, cause)
    case codes.badCredentials:
      return new AuthorizationError('AUTHENTICATION_FAILED', message, details, cause)
    case codes.unauthorized:
      return new AuthorizationError('UNAUTHORIZED', message, details, cause)
    default:
      return new UncategorizedDataAccessError(details, cause)
  }
}

import type { ColumnDefinition, CqlSession, ResultSet, Row, Statement } from '@cql-template/core'
import { ConnectionFailureError, PreparedStatement } from '@cql-template/core'
import type { ClientOptions, QueryOptions } from 'cassandra-driver'
import cassandra from 'cassandra-driver'

export interface CassandraSessionConfig {
  readonly contactPoints?: readonly string[] | undefined
  readonly localDataCenter?: string | undefined
  readonly keyspace?: string | undefined
  readonly port?: number | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly connectTimeoutMs?: number | undefined
  readonly readTimeoutMs?: number | undefined
  /** An existing client; connection settings above are then ignored. */
  readonly client?: CassandraClient | undefined
}

// ── Client Port ────────────────────────────────────────────────

/** The slice of the driver's result set the session reads. */
export interface DriverResultSet extends AsyncIterable<Row> {
  readonly columns: readonly ColumnDefinition[] | null | undefined
  wasApplied(): boolean
}

/** The slice of `cassandra-driver`'s `Client` the session calls. */
export interface CassandraClient {
  execute(query: string, params: unknown[], options: QueryOptions): Promise<DriverResultSet>
  shutdown(): Promise<void>
}

export interface CassandraSession extends CqlSession {
  ping(): Promise<void>
  close(): Promise<void>
}

const PING_CQL = 'SELECT release_version FROM system.local'

// ── createCassandraSession ─────────────────────────────────────

export function createCassandraSession(config: CassandraSessionConfig): CassandraSession {
  const client: CassandraClient = config.client ?? new cassandra.Client(buildClientOptions(config))

  return {
    async execute(statement: Statement): Promise<ResultSet> {
      const result = await client.execute(statement.query, [...statement.params], toQueryOptions(statement))
      return toResultSet(result)
    },

    // No round trip: the driver prepares on the server at first execution and keeps its own cache.
    async prepare(cql: string): Promise<PreparedStatement> {
      return new PreparedStatement(cql)
    },

    async ping(): Promise<void> {
      try {
        await client.execute(PING_CQL, [], { prepare: false })
      } catch (err) {
        throw new ConnectionFailureError('Cassandra ping failed', { task: 'ping', cql: PING_CQL }, err)
      }
    },

    async close(): Promise<void> {
      await client.shutdown()
    },
  }
}

// ── Option Mapping ─────────────────────────────────────────────

export function buildClientOptions(config: CassandraSessionConfig): ClientOptions {
  const options: ClientOptions = {}
  if (config.contactPoints !== undefined) options.contactPoints = [...config.contactPoints]
  if (config.localDataCenter !== undefined) options.localDataCenter = config.localDataCenter
  if (config.keyspace !== undefined) options.keyspace = config.keyspace
  if (config.port !== undefined) options.protocolOptions = { port: config.port }
  if (config.username !== undefined && config.password !== undefined) {
    options.credentials = { username: config.username, password: config.password }
  }

  const socketOptions: NonNullable<ClientOptions['socketOptions']> = {}
  if (config.connectTimeoutMs !== undefined) socketOptions.connectTimeout = config.connectTimeoutMs
  if (config.readTimeoutMs !== undefined) socketOptions.readTimeout = config.readTimeoutMs
  if (Object.keys(socketOptions).length > 0) options.socketOptions = socketOptions

  return options
}

/** Only options the statement carries are set; the rest stay at the driver's defaults. */
export function toQueryOptions(statement: Statement): QueryOptions {
  const { pageSize, consistency, serialConsistency, executionProfile } = statement.options
  const options: QueryOptions = { prepare: statement.kind === 'bound' }
  if (pageSize !== undefined) options.fetchSize = pageSize
  if (consistency !== undefined) options.consistency = consistency
  if (serialConsistency !== undefined) options.serialConsistency = serialConsistency
  if (executionProfile !== undefined) options.executionProfile = executionProfile
  return options
}

function toResultSet(result: DriverResultSet): ResultSet {
  return {
    columns: result.columns ?? null,
    wasApplied: () => result.wasApplied(),
    [Symbol.asyncIterator]: () => result[Symbol.asyncIterator](),
  }
}

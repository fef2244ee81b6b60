import type { Row } from '@cql-template/core'
import {
  ConnectionFailureError,
  ConsistencyLevel,
  decoders,
  PreparedStatement,
  SimpleStatement,
  TypeMismatchError,
} from '@cql-template/core'
import type { QueryOptions } from 'cassandra-driver'
import cassandra from 'cassandra-driver'
import { afterEach, describe, expect, it, vi } from 'vitest'
import type { DriverResultSet } from '../src/index.js'
import { buildClientOptions, createCassandraSession, createCassandraTemplate, toQueryOptions } from '../src/index.js'

// ── Fake client ────────────────────────────────────────────────

function driverResult(rows: readonly Record<string, unknown>[], applied = true): DriverResultSet {
  const toRow = (record: Record<string, unknown>): Row => ({
    get: (column) => (typeof column === 'number' ? Object.values(record)[column] : record[column]),
    keys: () => Object.keys(record),
    values: () => Object.values(record),
  })
  return {
    columns: rows[0] !== undefined ? Object.keys(rows[0]).map((name) => ({ name })) : undefined,
    wasApplied: () => applied,
    async *[Symbol.asyncIterator]() {
      for (const record of rows) yield toRow(record)
    },
  }
}

const mockExecute = vi.fn(async (_query: string, _params: unknown[], _options: QueryOptions) => driverResult([]))
const mockShutdown = vi.fn(async () => undefined)
const client = { execute: mockExecute, shutdown: mockShutdown }

// ── Tests ──────────────────────────────────────────────────────

describe('driver-cassandra session', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('executes simple statements unprepared', async () => {
    const session = createCassandraSession({ client })
    await session.execute(SimpleStatement.newInstance('SELECT * FROM users WHERE id = ?', 'user-1'))

    expect(mockExecute).toHaveBeenCalledWith('SELECT * FROM users WHERE id = ?', ['user-1'], { prepare: false })
  })

  it('executes bound statements prepared, with their options', async () => {
    const session = createCassandraSession({ client })
    const prepared = await session.prepare('SELECT * FROM users WHERE id = ?')
    const bound = prepared.withPageSize(5).withConsistency(ConsistencyLevel.one).withExecutionProfile('foo').bind('user-1')

    await session.execute(bound)

    expect(mockExecute).toHaveBeenCalledWith('SELECT * FROM users WHERE id = ?', ['user-1'], {
      prepare: true,
      fetchSize: 5,
      consistency: 1,
      executionProfile: 'foo',
    })
  })

  it('prepares a fresh statement for each call without touching the client', async () => {
    const session = createCassandraSession({ client })
    const first = await session.prepare('SELECT 1')
    const second = await session.prepare('SELECT 1')
    const other = await session.prepare('SELECT 2')

    expect(first).toBeInstanceOf(PreparedStatement)
    expect(first.query).toBe('SELECT 1')
    expect(first.options).toEqual({})
    expect(second).not.toBe(first)
    expect(second.query).toBe('SELECT 1')
    expect(other.query).toBe('SELECT 2')
    expect(mockExecute).not.toHaveBeenCalled()
  })

  it('adapts the driver result', async () => {
    mockExecute.mockResolvedValueOnce(driverResult([{ id: 'a' }, { id: 'b' }], false))
    const session = createCassandraSession({ client })

    const resultSet = await session.execute(SimpleStatement.newInstance('SELECT id FROM users'))
    const ids: unknown[] = []
    for await (const row of resultSet) ids.push(row.get('id'))

    expect(resultSet.columns).toEqual([{ name: 'id' }])
    expect(resultSet.wasApplied()).toBe(false)
    expect(ids).toEqual(['a', 'b'])
  })

  it('reports missing column metadata as null', async () => {
    const session = createCassandraSession({ client })
    const resultSet = await session.execute(SimpleStatement.newInstance('TRUNCATE audit'))
    expect(resultSet.columns).toBeNull()
  })

  it('ping queries system.local', async () => {
    const session = createCassandraSession({ client })
    await expect(session.ping()).resolves.toBeUndefined()
    expect(mockExecute).toHaveBeenCalledWith('SELECT release_version FROM system.local', [], { prepare: false })
  })

  it('ping failure throws ConnectionFailureError', async () => {
    const cause = new Error('ECONNREFUSED')
    mockExecute.mockRejectedValueOnce(cause)
    const session = createCassandraSession({ client })

    try {
      await session.ping()
      expect.fail('Expected ConnectionFailureError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionFailureError)
      const e = err as ConnectionFailureError
      expect(e.code).toBe('CONNECTION_FAILURE')
      expect(e.message).toBe('Cassandra ping failed')
      expect(e.cause).toBe(cause)
    }
  })

  it('close shuts the client down', async () => {
    await createCassandraSession({ client }).close()
    expect(mockShutdown).toHaveBeenCalledTimes(1)
  })
})

describe('option mapping', () => {
  it('toQueryOptions sets only what the statement carries', () => {
    expect(toQueryOptions(SimpleStatement.newInstance('SELECT 1'))).toEqual({ prepare: false })
    expect(
      toQueryOptions(SimpleStatement.newInstance('SELECT 1').withSerialConsistency(ConsistencyLevel.localSerial)),
    ).toEqual({ prepare: false, serialConsistency: 9 })
  })

  it('buildClientOptions maps connection settings', () => {
    expect(
      buildClientOptions({
        contactPoints: ['10.0.0.1', '10.0.0.2'],
        localDataCenter: 'dc1',
        keyspace: 'app',
        port: 9142,
        username: 'test-user',
        password: 'test-secret',
        connectTimeoutMs: 2000,
        readTimeoutMs: 8000,
      }),
    ).toEqual({
      contactPoints: ['10.0.0.1', '10.0.0.2'],
      localDataCenter: 'dc1',
      keyspace: 'app',
      protocolOptions: { port: 9142 },
      credentials: { username: 'test-user', password: 'test-secret' },
      socketOptions: { connectTimeout: 2000, readTimeout: 8000 },
    })
  })

  it('buildClientOptions leaves unset settings out', () => {
    expect(buildClientOptions({ contactPoints: ['127.0.0.1'], username: 'test-user' })).toEqual({
      contactPoints: ['127.0.0.1'],
    })
  })
})

describe('createCassandraTemplate', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('runs template operations through the client with the template options', async () => {
    mockExecute.mockResolvedValueOnce(driverResult([{ status: 'OK' }, { status: 'NOT OK' }]))
    const template = createCassandraTemplate(createCassandraSession({ client }), {
      pageSize: 5,
      consistency: ConsistencyLevel.one,
      executionProfile: 'foo',
    })

    const statuses = await template.queryForList('SELECT status FROM jobs WHERE owner = ?', (row) => row.get('status'), 'ada')

    expect(statuses).toEqual(['OK', 'NOT OK'])
    expect(mockExecute).toHaveBeenCalledTimes(1)
    expect(mockExecute).toHaveBeenCalledWith('SELECT status FROM jobs WHERE owner = ?', ['ada'], {
      prepare: true,
      fetchSize: 5,
      consistency: 1,
      executionProfile: 'foo',
    })
  })

  it('decodes driver Long values only within the safe integer range', async () => {
    const { Long } = cassandra.types
    const template = createCassandraTemplate(createCassandraSession({ client }))

    mockExecute.mockResolvedValueOnce(driverResult([{ total: Long.fromString('9007199254740991') }]))
    await expect(template.queryForObject('SELECT total FROM counters', decoders.number)).resolves.toBe(
      Number.MAX_SAFE_INTEGER,
    )

    mockExecute.mockResolvedValueOnce(driverResult([{ total: Long.fromString('9007199254740993') }]))
    await expect(template.queryForObject('SELECT total FROM counters', decoders.number)).rejects.toBeInstanceOf(
      TypeMismatchError,
    )
  })

  it('translates driver errors', async () => {
    mockExecute.mockRejectedValueOnce(new cassandra.errors.NoHostAvailableError({}, 'No host could be reached'))
    const template = createCassandraTemplate(createCassandraSession({ client }))

    await expect(template.execute('SELECT 1')).rejects.toMatchObject({
      code: 'CONNECTION_FAILURE',
      message: 'No host could be reached',
      details: { task: 'execute', cql: 'SELECT 1' },
    })
  })
})

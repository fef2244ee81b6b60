import type { CqlTemplate, CqlTemplateConfig } from '@cql-template/core'
import { createCqlTemplate } from '@cql-template/core'
import type { CassandraSession } from './session.js'
import { cassandraExceptionTranslator } from './translator.js'

export type CassandraTemplateOptions = Omit<CqlTemplateConfig, 'session' | 'translator'>

/** A template over a Cassandra session, translating `cassandra-driver` errors. */
export function createCassandraTemplate(session: CassandraSession, options: CassandraTemplateOptions = {}): CqlTemplate {
  return createCqlTemplate({ ...options, session, translator: cassandraExceptionTranslator })
}

export type { CassandraClient, CassandraSession, CassandraSessionConfig, DriverResultSet } from './session.js'
export { buildClientOptions, createCassandraSession, toQueryOptions } from './session.js'
export { cassandraExceptionTranslator } from './translator.js'

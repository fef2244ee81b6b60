import type { ExecutionOptions } from './config.js'
import type { StatementSource } from './source.js'
import type { Statement } from './statements.js'
import { applyExecutionOptions, applyToStatement, SimpleStatement } from './statements.js'
import type { CqlSession } from './types/interfaces.js'

/**
 * Turns any statement source into the one statement the session executes.
 *
 * Prepared paths apply the options before binding so the bound statement
 * inherits them from its prepared statement. Statements a caller hands in are
 * copied, never changed.
 */
export async function normalizeStatement(
  source: StatementSource,
  session: CqlSession,
  options: ExecutionOptions,
): Promise<Statement> {
  switch (source.kind) {
    case 'cql':
      return applyExecutionOptions(SimpleStatement.newInstance(source.cql), options)

    case 'prepared': {
      const prepared = applyExecutionOptions(await session.prepare(source.cql), options)
      return prepared.bind(...source.args)
    }

    case 'statement':
      return applyToStatement(source.statement, options)

    case 'creator': {
      const prepared = applyExecutionOptions(await source.creator(session), options)
      const bound = source.binder !== undefined ? await source.binder(prepared) : prepared.bind()
      // binders may return a statement that did not come from `prepared`
      return applyExecutionOptions(bound, options)
    }
  }
}

import { DataAccessError, UncategorizedDataAccessError } from './errors.js'
import type { ExceptionTranslator, ResultSet, Row, TranslationContext } from './types/interfaces.js'

/** Recognises nothing; every failure inside the boundary becomes uncategorized. */
export const defaultExceptionTranslator: ExceptionTranslator = {
  translate: () => null,
}

export function translateError(
  translator: ExceptionTranslator,
  err: unknown,
  context: TranslationContext,
): DataAccessError {
  if (err instanceof DataAccessError) return err
  return translator.translate(err, context) ?? new UncategorizedDataAccessError(context, err)
}

/**
 * Wraps a result set so failures while pulling rows (page fetches) are
 * translated. Errors thrown by whoever consumes the rows are left alone.
 */
export function translatingResultSet(
  resultSet: ResultSet,
  translator: ExceptionTranslator,
  context: TranslationContext,
): ResultSet {
  return {
    get columns() {
      return resultSet.columns
    },
    wasApplied: () => resultSet.wasApplied(),
    [Symbol.asyncIterator]: () => translatingRows(resultSet, translator, context),
  }
}

async function* translatingRows(
  rows: AsyncIterable<Row>,
  translator: ExceptionTranslator,
  context: TranslationContext,
): AsyncGenerator<Row> {
  const iterator = rows[Symbol.asyncIterator]()
  let exhausted = false
  try {
    while (true) {
      let step: IteratorResult<Row>
      try {
        step = await iterator.next()
      } catch (err) {
        exhausted = true
        throw translateError(translator, err, context)
      }
      if (step.done === true) {
        exhausted = true
        return
      }
      yield step.value
    }
  } finally {
    // consumer stopped early; let the underlying cursor release its page
    if (!exhausted) await iterator.return?.()
  }
}

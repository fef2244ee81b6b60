import { EmptyResultError, IncorrectColumnCountError, IncorrectResultSizeError } from '../errors.js'
import type { ResultSetExtractor, Row, RowMapper } from '../types/interfaces.js'
import type { ColumnDecoder } from './decoders.js'

export type Cardinality = 'exactly-one' | 'list'

// ── Row Iteration ──────────────────────────────────────────────

/** Maps every row in source order. */
export async function mapRows<T>(rows: AsyncIterable<Row>, mapper: RowMapper<T>): Promise<T[]> {
  const results: T[] = []
  let index = 0
  for await (const row of rows) {
    results.push(mapper(row, index))
    index++
  }
  return results
}

/**
 * Maps the only row of a result. Pulls at most two rows: a second row fails
 * the call without draining the rest of the cursor.
 */
export async function mapSingleRow<T>(rows: AsyncIterable<Row>, mapper: RowMapper<T>): Promise<T> {
  const iterator = rows[Symbol.asyncIterator]()

  const first = await iterator.next()
  if (first.done === true) throw new EmptyResultError(1)

  const second = await iterator.next()
  if (second.done !== true) {
    await iterator.return?.()
    throw new IncorrectResultSizeError(1, 2)
  }

  return mapper(first.value, 0)
}

// ── Extractors ─────────────────────────────────────────────────

export function rowMapperExtractor<T>(mapper: RowMapper<T>): ResultSetExtractor<T[]> {
  return (resultSet) => mapRows(resultSet, mapper)
}

export function singleRowExtractor<T>(mapper: RowMapper<T>): ResultSetExtractor<T> {
  return (resultSet) => mapSingleRow(resultSet, mapper)
}

export function extractorFor<T>(mapper: RowMapper<T>, cardinality: 'exactly-one'): ResultSetExtractor<T>
export function extractorFor<T>(mapper: RowMapper<T>, cardinality: 'list'): ResultSetExtractor<T[]>
export function extractorFor<T>(mapper: RowMapper<T>, cardinality: Cardinality): ResultSetExtractor<T | T[]> {
  switch (cardinality) {
    case 'exactly-one':
      return singleRowExtractor(mapper)
    case 'list':
      return rowMapperExtractor(mapper)
  }
}

// ── Row Mappers ────────────────────────────────────────────────

export const columnMapRowMapper: RowMapper<Record<string, unknown>> = (row) => {
  const record: Record<string, unknown> = {}
  for (const column of row.keys()) {
    record[column] = row.get(column)
  }
  return record
}

export function singleColumnRowMapper<T>(decoder: ColumnDecoder<T>): RowMapper<T> {
  return (row) => {
    const columns = row.keys()
    const column = columns[0]
    if (columns.length !== 1 || column === undefined) {
      throw new IncorrectColumnCountError(1, columns.length)
    }
    return decoder.decode(row.get(0), column)
  }
}

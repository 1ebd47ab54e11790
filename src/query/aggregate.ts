/**
 * Aggregation for csvq
 *
 * Reduces one column of a dataset to a single number. Every cell in the
 * column must be numeric: a blank or textual cell is an error, never
 * skipped, and an empty dataset is an error rather than 0 or NaN.
 */

import { AggregationError } from '../errors'
import type { Dataset } from '../types/dataset'
import { getCell } from '../types/dataset'
import type { AggregateOperation, AggregateResult, AggregateSpec } from '../types/query'
import { parseNumeric, logger } from '../utils'

type Reducer = (values: readonly number[]) => number

const REDUCERS: Record<AggregateOperation, Reducer> = {
  avg: values => {
    let sum = 0
    for (const value of values) sum += value
    return sum / values.length
  },
  min: values => values.reduce((acc, value) => (value < acc ? value : acc), Infinity),
  max: values => values.reduce((acc, value) => (value > acc ? value : acc), -Infinity),
}

/**
 * Collect the column as numbers, failing on the first non-numeric cell
 */
function collectNumbers(dataset: Dataset, spec: AggregateSpec): number[] {
  const values: number[] = []

  dataset.rows.forEach((row, index) => {
    const raw = getCell(row, spec.column)
    const numeric = parseNumeric(raw)
    if (!numeric) {
      throw new AggregationError(
        'NonNumericColumn',
        `Cannot compute ${spec.operation} of "${spec.column}": row ${index + 1} has non-numeric value "${raw}"`,
        { column: spec.column, operation: spec.operation, row: index + 1, value: raw }
      )
    }
    values.push(numeric.value)
  })

  return values
}

/**
 * Reduce `spec.column` with `spec.operation`.
 *
 * @throws AggregationError `EmptyInput` when the dataset has no rows
 * @throws AggregationError `NonNumericColumn` when any cell is not numeric
 *
 * @example
 * aggregate(products, { column: 'price', operation: 'avg' })
 * // { column: 'price', operation: 'avg', value: 600, count: 3 }
 */
export function aggregate(dataset: Dataset, spec: AggregateSpec): AggregateResult {
  if (dataset.rows.length === 0) {
    throw new AggregationError(
      'EmptyInput',
      `Cannot compute ${spec.operation} of "${spec.column}": no rows to aggregate`,
      { column: spec.column, operation: spec.operation }
    )
  }

  const values = collectNumbers(dataset, spec)
  const value = REDUCERS[spec.operation](values)

  logger.debug(`aggregate ${spec.operation}(${spec.column}) over ${values.length} rows = ${value}`)

  return {
    column: spec.column,
    operation: spec.operation,
    value,
    count: values.length,
  }
}

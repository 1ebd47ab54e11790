/**
 * Sort utility for csvq datasets
 *
 * Orders rows by one column using `compareForSort`: numeric cells compare
 * as numbers, other cells by code point, and in a mixed column every
 * numeric cell comes before every non-numeric one.
 *
 * The sort is stable in both directions. `desc` negates the comparison
 * rather than reversing the output, so rows with equal keys keep their
 * input order either way.
 */

import type { Dataset } from '../types/dataset'
import { getCell, withRows } from '../types/dataset'
import type { SortDirection, SortSpec } from '../types/query'
import type { TypedValue } from '../types/value'
import { compareForSort, parseTyped, logger } from '../utils'

/** Normalize sort direction to 1 or -1 */
export function directionMultiplier(direction: SortDirection): 1 | -1 {
  return direction === 'desc' ? -1 : 1
}

/**
 * Return a new dataset with rows ordered by `spec.column`.
 *
 * Keys are typed once per row up front, then the decorated rows are sorted.
 * `Array.prototype.sort` is stable, and the original index breaks ties
 * explicitly as well.
 *
 * @example
 * // price: 500, 800, 500  ->  A(500), C(500), B(800)
 * applySort(products, { column: 'price', direction: 'asc' })
 */
export function applySort(dataset: Dataset, spec: SortSpec): Dataset {
  const dir = directionMultiplier(spec.direction)

  const decorated: Array<{ key: TypedValue; index: number }> = dataset.rows.map((row, index) => ({
    key: parseTyped(getCell(row, spec.column)),
    index,
  }))

  decorated.sort((a, b) => {
    const cmp = dir * compareForSort(a.key, b.key)
    return cmp !== 0 ? cmp : a.index - b.index
  })

  const rows = decorated.flatMap(({ index }) => {
    const row = dataset.rows[index]
    return row ? [row] : []
  })

  logger.debug(`sort ${spec.column} ${spec.direction}: ${rows.length} rows`)

  return withRows(dataset, rows)
}

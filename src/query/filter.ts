/**
 * Filter Evaluation for csvq
 *
 * Applies one `FilterSpec` to a dataset. The operand is typed with the same
 * rules as the cells, then each row's cell is compared with `compareTyped`:
 *
 * | Operator | Row kept when cell is |
 * |----------|-----------------------|
 * | `=`      | equal to operand      |
 * | `>`      | greater than operand  |
 * | `<`      | less than operand     |
 *
 * When both sides are numeric the comparison is numeric, so `price=500`
 * matches a cell holding `500.0`. Otherwise the raw texts are compared by
 * code point, case-sensitively.
 */

import type { Dataset, Row } from '../types/dataset'
import { getCell, withRows } from '../types/dataset'
import type { FilterOperator, FilterSpec } from '../types/query'
import type { Ordering, TypedValue } from '../types/value'
import { compareTyped, parseTyped, logger } from '../utils'

const EXPECTED_ORDERING: Record<FilterOperator, Ordering> = {
  '=': 'equal',
  '>': 'greater',
  '<': 'less',
}

/**
 * Build a row predicate for a filter spec.
 *
 * The operand is typed once, not per row.
 */
export function createRowPredicate(spec: FilterSpec): (row: Row) => boolean {
  const operand: TypedValue = parseTyped(spec.operand)
  const expected = EXPECTED_ORDERING[spec.operator]

  return (row: Row): boolean => {
    const cell = parseTyped(getCell(row, spec.column))
    return compareTyped(cell, operand) === expected
  }
}

/**
 * Keep the rows that satisfy `spec`, in their original order.
 *
 * An empty result is a dataset with the same header and no rows.
 *
 * @example
 * applyFilter(products, { column: 'price', operator: '>', operand: '500' })
 */
export function applyFilter(dataset: Dataset, spec: FilterSpec): Dataset {
  const matches = createRowPredicate(spec)
  const rows = dataset.rows.filter(row => matches(row))

  logger.debug(`filter ${spec.column}${spec.operator}${spec.operand}: ${dataset.rows.length} -> ${rows.length} rows`)

  return withRows(dataset, rows)
}

/**
 * Expression Parsers
 *
 * Turns the three command-line mini-languages into specs:
 *
 *   --where     'price>500'    -> { column: 'price', operator: '>', operand: '500' }
 *   --order-by  'price=desc'   -> { column: 'price', direction: 'desc' }
 *   --aggregate 'price=avg'    -> { column: 'price', operation: 'avg' }
 *
 * Parsers are pure and never throw: they return `Result<Spec, ParseError>`.
 * Each one checks the column against the dataset header, so an unknown
 * column is reported before a single row is looked at.
 *
 * Whitespace around the whole expression and around each side of the
 * operator is ignored. Everything else is case-sensitive.
 */

import { malformedExpression, unknownColumn, type ParseError } from '../errors'
import { andThen, Err, Ok, type Result } from '../types/result'
import {
  AGGREGATE_OPERATIONS,
  FILTER_OPERATORS,
  SORT_DIRECTIONS,
  type AggregateSpec,
  type FilterSpec,
  type SortSpec,
} from '../types/query'

// =============================================================================
// Constants
// =============================================================================

/**
 * Two-character operators people reach for that the filter syntax does not
 * have. Without this check `price>=500` would split at `>` and compare
 * against the operand `=500`.
 */
export const UNSUPPORTED_OPERATORS = ['>=', '<=', '<>', '!=', '=='] as const

// =============================================================================
// Helpers
// =============================================================================

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value)
}

function checkColumn(expression: string, column: string, header: readonly string[]): ParseError | undefined {
  return header.includes(column) ? undefined : unknownColumn(expression, column, header)
}

/**
 * Split `<column>=<value>` at the first `=`
 */
function splitAssignment(
  expression: string,
  valueLabel: string
): Result<{ column: string; value: string }, ParseError> {
  const text = expression.trim()
  const eq = text.indexOf('=')

  if (eq === -1) {
    return Err(malformedExpression(expression, `expected <column>=<${valueLabel}>`))
  }

  const column = text.slice(0, eq).trim()
  const value = text.slice(eq + 1).trim()

  if (!column) {
    return Err(malformedExpression(expression, 'missing column name before "="'))
  }
  if (!value) {
    return Err(malformedExpression(expression, `missing ${valueLabel} after "="`))
  }

  return Ok({ column, value })
}

// =============================================================================
// Filter
// =============================================================================

/**
 * Parse a `--where` expression.
 *
 * Operators are single characters. When more than one could apply, `>` wins
 * over `<`, which wins over `=`; the expression is split at the first
 * occurrence of the winning operator. `>=`, `<=` and the other
 * two-character forms are rejected outright.
 *
 * @example
 * parseFilter('price>500', ['name', 'price'])
 * // Ok({ column: 'price', operator: '>', operand: '500' })
 *
 * parseFilter('price>=500', ['name', 'price'])
 * // Err(ParseError MalformedExpression)
 */
export function parseFilter(expression: string, header: readonly string[]): Result<FilterSpec, ParseError> {
  const text = expression.trim()
  if (!text) {
    return Err(malformedExpression(expression, 'expression is empty'))
  }

  for (const unsupported of UNSUPPORTED_OPERATORS) {
    if (text.includes(unsupported)) {
      return Err(malformedExpression(
        expression,
        `unsupported operator "${unsupported}"; use one of ${FILTER_OPERATORS.join(', ')}`
      ))
    }
  }

  for (const operator of FILTER_OPERATORS) {
    const index = text.indexOf(operator)
    if (index === -1) continue

    const column = text.slice(0, index).trim()
    const operand = text.slice(index + 1).trim()

    if (!column) {
      return Err(malformedExpression(expression, `missing column name before "${operator}"`))
    }
    if (!operand) {
      return Err(malformedExpression(expression, `missing value after "${operator}"`))
    }

    const missing = checkColumn(expression, column, header)
    if (missing) return Err(missing)

    return Ok({ column, operator, operand })
  }

  return Err(malformedExpression(
    expression,
    `expected <column><operator><value> with operator one of ${FILTER_OPERATORS.join(', ')}`
  ))
}

// =============================================================================
// Order By
// =============================================================================

/**
 * Parse an `--order-by` expression: `<column>=asc` or `<column>=desc`.
 */
export function parseOrderBy(expression: string, header: readonly string[]): Result<SortSpec, ParseError> {
  return andThen(splitAssignment(expression, 'direction'), ({ column, value }): Result<SortSpec, ParseError> => {
    if (!isOneOf(SORT_DIRECTIONS, value)) {
      return Err(malformedExpression(
        expression,
        `unknown sort direction "${value}"; expected ${SORT_DIRECTIONS.join(' or ')}`
      ))
    }

    const missing = checkColumn(expression, column, header)
    if (missing) return Err(missing)

    return Ok({ column, direction: value })
  })
}

// =============================================================================
// Aggregate
// =============================================================================

/**
 * Parse an `--aggregate` expression: `<column>=avg|min|max`.
 */
export function parseAggregate(expression: string, header: readonly string[]): Result<AggregateSpec, ParseError> {
  return andThen(splitAssignment(expression, 'operation'), ({ column, value }): Result<AggregateSpec, ParseError> => {
    if (!isOneOf(AGGREGATE_OPERATIONS, value)) {
      return Err(malformedExpression(
        expression,
        `unknown aggregate operation "${value}"; expected one of ${AGGREGATE_OPERATIONS.join(', ')}`
      ))
    }

    const missing = checkColumn(expression, column, header)
    if (missing) return Err(missing)

    return Ok({ column, operation: value })
  })
}

/**
 * Query Executor
 *
 * Runs a query in two phases:
 *
 * 1. **Plan** - parse every supplied expression against the header. Any
 *    malformed expression or unknown column fails here, before a row is
 *    read. `checkExpressionSyntax` runs the syntax half of this before the
 *    file is opened.
 * 2. **Execute** - filter, then sort, then aggregate. The order is fixed
 *    no matter how the flags were ordered on the command line, and a
 *    missing stage passes rows through unchanged.
 *
 * Sorting still runs ahead of an aggregate even though no aggregate
 * depends on row order.
 */

import type { ParseError } from '../errors'
import type { Dataset } from '../types/dataset'
import type { AggregateSpec, FilterSpec, QueryExpressions, QueryPlan, QueryResult, SortSpec } from '../types/query'
import { Ok, unwrap, type Result } from '../types/result'
import { logger } from '../utils'
import { aggregate } from './aggregate'
import { applyFilter } from './filter'
import { parseAggregate, parseFilter, parseOrderBy } from './parser'
import { applySort } from './sort'

// =============================================================================
// Planning
// =============================================================================

/**
 * Parse the supplied expressions into an immutable plan.
 *
 * Expressions are checked in pipeline order (where, order-by, aggregate);
 * the first failure is returned.
 *
 * @example
 * const plan = planQuery(['name', 'price'], { where: 'price>500', aggregate: 'price=avg' })
 * if (plan.ok) executeQuery(dataset, plan.value)
 */
export function planQuery(header: readonly string[], expressions: QueryExpressions): Result<QueryPlan, ParseError> {
  let filter: FilterSpec | undefined
  let sort: SortSpec | undefined
  let agg: AggregateSpec | undefined

  if (expressions.where !== undefined) {
    const parsed = parseFilter(expressions.where, header)
    if (!parsed.ok) return parsed
    filter = parsed.value
  }

  if (expressions.orderBy !== undefined) {
    const parsed = parseOrderBy(expressions.orderBy, header)
    if (!parsed.ok) return parsed
    sort = parsed.value
  }

  if (expressions.aggregate !== undefined) {
    const parsed = parseAggregate(expressions.aggregate, header)
    if (!parsed.ok) return parsed
    agg = parsed.value
  }

  return Ok(Object.freeze({ filter, sort, aggregate: agg }))
}

/**
 * Check the syntax of the supplied expressions without a header.
 *
 * Returns the first MalformedExpression in pipeline order. Column names are
 * not checked here; that needs the header and is left to `planQuery`.
 *
 * @example
 * checkExpressionSyntax({ where: 'price' })    // ParseError MalformedExpression
 * checkExpressionSyntax({ where: 'price>500' }) // undefined
 */
export function checkExpressionSyntax(expressions: QueryExpressions): ParseError | undefined {
  const results = [
    expressions.where === undefined ? undefined : parseFilter(expressions.where, []),
    expressions.orderBy === undefined ? undefined : parseOrderBy(expressions.orderBy, []),
    expressions.aggregate === undefined ? undefined : parseAggregate(expressions.aggregate, []),
  ]

  for (const result of results) {
    if (result && !result.ok && result.error.kind === 'MalformedExpression') return result.error
  }
  return undefined
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Run a plan against a dataset: filter -> sort -> aggregate.
 *
 * @throws AggregationError when the plan aggregates and the filtered rows
 * are empty or not all numeric
 */
export function executeQuery(dataset: Dataset, plan: QueryPlan): QueryResult {
  let current = dataset

  if (plan.filter) {
    current = applyFilter(current, plan.filter)
  }

  if (plan.sort) {
    current = applySort(current, plan.sort)
  }

  if (plan.aggregate) {
    return { kind: 'aggregate', dataset: current, result: aggregate(current, plan.aggregate) }
  }

  logger.debug(`query returned ${current.rows.length} of ${dataset.rows.length} rows`)
  return { kind: 'rows', dataset: current }
}

/**
 * Plan and execute in one call, throwing the ParseError if planning fails.
 *
 * @example
 * runQuery(dataset, { where: 'name=B', aggregate: 'rating=max' })
 * // { kind: 'aggregate', result: { value: 4.9, ... }, ... }
 */
export function runQuery(dataset: Dataset, expressions: QueryExpressions): QueryResult {
  return executeQuery(dataset, unwrap(planQuery(dataset.header, expressions)))
}

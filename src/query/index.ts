/**
 * Query Module for csvq
 *
 * Expression parsing, filter evaluation, sorting, aggregation and the
 * pipeline that sequences them.
 */

// Expression parsers
export {
  parseFilter,
  parseOrderBy,
  parseAggregate,
  UNSUPPORTED_OPERATORS,
} from './parser'

// Filter evaluation
export {
  applyFilter,
  createRowPredicate,
} from './filter'

// Sorting
export {
  applySort,
  directionMultiplier,
} from './sort'

// Aggregation
export { aggregate } from './aggregate'

// Pipeline
export {
  checkExpressionSyntax,
  planQuery,
  executeQuery,
  runQuery,
} from './executor'

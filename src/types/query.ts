/**
 * Query specifications
 *
 * Each spec is the parsed, validated form of one CLI expression:
 *
 * | Flag          | Syntax                      | Spec           |
 * |---------------|-----------------------------|----------------|
 * | `--where`     | `<column><op><value>`       | FilterSpec     |
 * | `--order-by`  | `<column>=<asc\|desc>`      | SortSpec       |
 * | `--aggregate` | `<column>=<avg\|min\|max>`  | AggregateSpec  |
 */

import type { Dataset } from './dataset'

// =============================================================================
// Filter
// =============================================================================

export const FILTER_OPERATORS = ['>', '<', '='] as const

/** Single-character comparison operator */
export type FilterOperator = typeof FILTER_OPERATORS[number]

export interface FilterSpec {
  readonly column: string
  readonly operator: FilterOperator
  /** Right-hand side, typed the same way as cells at evaluation time */
  readonly operand: string
}

// =============================================================================
// Sort
// =============================================================================

export const SORT_DIRECTIONS = ['asc', 'desc'] as const

export type SortDirection = typeof SORT_DIRECTIONS[number]

export interface SortSpec {
  readonly column: string
  readonly direction: SortDirection
}

// =============================================================================
// Aggregate
// =============================================================================

export const AGGREGATE_OPERATIONS = ['avg', 'min', 'max'] as const

export type AggregateOperation = typeof AGGREGATE_OPERATIONS[number]

export interface AggregateSpec {
  readonly column: string
  readonly operation: AggregateOperation
}

export interface AggregateResult {
  readonly column: string
  readonly operation: AggregateOperation
  readonly value: number
  /** Number of rows reduced */
  readonly count: number
}

// =============================================================================
// Plan & Result
// =============================================================================

/**
 * Raw expressions as supplied on the command line
 */
export interface QueryExpressions {
  where?: string | undefined
  orderBy?: string | undefined
  aggregate?: string | undefined
}

/**
 * Parsed query: at most one spec per stage. Absent stages pass rows through.
 */
export interface QueryPlan {
  readonly filter?: FilterSpec | undefined
  readonly sort?: SortSpec | undefined
  readonly aggregate?: AggregateSpec | undefined
}

/**
 * Pipeline output. `dataset` is the filtered/sorted rows in both cases.
 */
export type QueryResult =
  | { readonly kind: 'rows'; readonly dataset: Dataset }
  | { readonly kind: 'aggregate'; readonly dataset: Dataset; readonly result: AggregateResult }

/**
 * csvq Type Definitions
 *
 * | Module  | Description                                         |
 * |---------|-----------------------------------------------------|
 * | dataset | Row, Dataset and helpers                            |
 * | value   | TypedValue, Ordering                                |
 * | query   | FilterSpec, SortSpec, AggregateSpec, QueryPlan      |
 * | result  | Type-safe error handling: Result<T, E>, Ok, Err     |
 *
 * @module types
 */

export * from './dataset'
export * from './value'
export * from './query'
export * from './result'

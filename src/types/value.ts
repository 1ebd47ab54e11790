/**
 * Typed cell values
 *
 * Cells are stored as text. Before comparison each one is classified as
 * numeric or string by `parseTyped` (see utils/comparison).
 */

/** Numeric interpretation of a cell */
export interface NumericValue {
  readonly kind: 'number'
  readonly value: number
  /** Text the value was parsed from */
  readonly raw: string
}

/** Cell that did not parse as a number */
export interface StringValue {
  readonly kind: 'string'
  readonly value: string
  readonly raw: string
}

export type TypedValue = NumericValue | StringValue

/** Three-way comparison outcome */
export type Ordering = 'less' | 'equal' | 'greater'

/** Narrow a typed cell to its numeric form */
export function isNumericValue(value: TypedValue): value is NumericValue {
  return value.kind === 'number'
}

/**
 * Cell Typing and Comparison for csvq
 *
 * Every cell is text. Comparisons first classify both sides with
 * `parseTyped`, then dispatch on the pair of kinds:
 *
 * | a       | b       | compareTyped (filter) | compareForSort (sort) |
 * |---------|---------|-----------------------|-----------------------|
 * | number  | number  | numeric               | numeric               |
 * | string  | string  | code point            | code point            |
 * | number  | string  | code point of raw     | number first          |
 *
 * The decision is made per pair of values, never once per column, so a
 * column holding both numbers and words still orders consistently.
 *
 * **Exact numeric equality:** `=` compares parsed numbers with `===`.
 * `500` equals `500.0`, but values that differ only past double precision
 * rounding are compared as the doubles they parse to, with no tolerance.
 */

import { isNumericValue, type NumericValue, type Ordering, type TypedValue } from '../types/value'

// =============================================================================
// Parsing
// =============================================================================

/**
 * Decimal notation: optional sign, digits with an optional fraction (or a
 * bare fraction such as `.5`), optional exponent. No surrounding spaces,
 * no `Infinity`/`NaN`, no hex.
 */
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Classify a raw cell as numeric or string.
 *
 * The raw text is kept as-is in both cases: no trimming, no case folding.
 *
 * @example
 * parseTyped('4.7')  // { kind: 'number', value: 4.7, raw: '4.7' }
 * parseTyped('-3')   // { kind: 'number', value: -3, raw: '-3' }
 * parseTyped(' 3')   // { kind: 'string', value: ' 3', raw: ' 3' }
 * parseTyped('')     // { kind: 'string', value: '', raw: '' }
 */
export function parseTyped(raw: string): TypedValue {
  if (DECIMAL_PATTERN.test(raw)) {
    const value = Number(raw)
    // '1e999' overflows to Infinity, which would poison avg/min/max
    if (Number.isFinite(value)) {
      return { kind: 'number', value, raw }
    }
  }
  return { kind: 'string', value: raw, raw }
}

/**
 * Parse a cell that must be numeric, returning undefined otherwise
 */
export function parseNumeric(raw: string): NumericValue | undefined {
  const typed = parseTyped(raw)
  return isNumericValue(typed) ? typed : undefined
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Compare two strings by Unicode code point.
 *
 * JavaScript's `<` compares UTF-16 code units, which orders characters
 * outside the Basic Multilingual Plane before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0

  let i = 0
  let j = 0
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0
    const cb = b.codePointAt(j) ?? 0
    if (ca !== cb) return ca < cb ? -1 : 1
    i += ca > 0xffff ? 2 : 1
    j += cb > 0xffff ? 2 : 1
  }

  if (i < a.length) return 1
  if (j < b.length) return -1
  return 0
}

function toOrdering(n: number): Ordering {
  if (n < 0) return 'less'
  if (n > 0) return 'greater'
  return 'equal'
}

/**
 * Compare two typed values the way `--where` does.
 *
 * Both numeric: numeric comparison. Anything else: code-point comparison of
 * the raw text, so `'abc' > '500'` and `'10' < '9'` when either side is a
 * word.
 *
 * @example
 * compareTyped(parseTyped('500'), parseTyped('500.0')) // 'equal'
 * compareTyped(parseTyped('80'), parseTyped('500'))    // 'less'
 * compareTyped(parseTyped('apple'), parseTyped('Apple')) // 'greater'
 */
export function compareTyped(a: TypedValue, b: TypedValue): Ordering {
  if (a.kind === 'number' && b.kind === 'number') {
    return toOrdering(a.value - b.value)
  }
  return toOrdering(compareCodePoints(a.raw, b.raw))
}

/**
 * Total order used for sorting.
 *
 * Same as `compareTyped` when both sides have the same kind. For a mixed
 * pair every number sorts before every string, which keeps the order
 * transitive. `compareTyped` alone is not: `9 < 10` numerically, while
 * `'10' < '5x'` and `'5x' < '9'` as text.
 *
 * @returns Negative if a sorts first, positive if b sorts first, zero if equal
 */
export function compareForSort(a: TypedValue, b: TypedValue): number {
  if (a.kind === 'number' && b.kind === 'number') {
    return a.value - b.value
  }
  if (a.kind === 'number') return -1
  if (b.kind === 'number') return 1
  return compareCodePoints(a.value, b.value)
}

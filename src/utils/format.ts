/**
 * Number formatting for aggregate output
 */

/** Fraction digits used when none are configured */
export const DEFAULT_PRECISION = 2

/**
 * Format a number for display.
 *
 * Integers print in full. Other values are rounded to `precision` fraction
 * digits with trailing zeros dropped.
 *
 * @example
 * formatNumber(600)        // '600'
 * formatNumber(4.9)        // '4.9'
 * formatNumber(2 / 3)      // '0.67'
 * formatNumber(2 / 3, 4)   // '0.6667'
 */
export function formatNumber(value: number, precision: number = DEFAULT_PRECISION): string {
  if (Number.isInteger(value)) {
    return Object.is(value, -0) ? '0' : String(value)
  }

  const fixed = value.toFixed(precision)
  const trimmed = fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed
  return trimmed === '-0' ? '0' : trimmed
}

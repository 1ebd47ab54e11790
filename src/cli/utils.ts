/**
 * CLI Utilities
 *
 * Output helpers and the renderers behind `--format table|csv|json`.
 * Renderers return strings; only the print helpers touch the process
 * streams.
 */

import type { Dataset } from '../types/dataset'
import { getCell } from '../types/dataset'
import type { AggregateResult } from '../types/query'
import { formatNumber, parseTyped } from '../utils'

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print a warning to stderr
 */
export function printWarning(message: string): void {
  process.stderr.write('Warning: ' + message + '\n')
}

// =============================================================================
// Table
// =============================================================================

type Align = 'left' | 'right'

/**
 * Pad text to a specific width
 */
export function pad(text: string, width: number, align: Align = 'left'): string {
  return align === 'right' ? text.padStart(width) : text.padEnd(width)
}

/**
 * A column is right-aligned when it has at least one value and every
 * non-empty value is numeric
 */
function columnAlignment(values: readonly string[]): Align {
  const present = values.filter(value => value !== '')
  if (present.length === 0) return 'left'
  return present.every(value => parseTyped(value).kind === 'number') ? 'right' : 'left'
}

/**
 * Render a grid table.
 *
 * @example
 * renderTable(['name', 'price'], [['A', '500'], ['B', '80']])
 * // +------+-------+
 * // | name | price |
 * // +======+=======+
 * // | A    |   500 |
 * // | B    |    80 |
 * // +------+-------+
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const columns = headers.map((h, i) => {
    const values = rows.map(row => row[i] ?? '')
    return {
      width: values.reduce((width, value) => Math.max(width, value.length), h.length),
      align: columnAlignment(values),
    }
  })

  const border = (char: string): string =>
    '+' + columns.map(({ width }) => char.repeat(width + 2)).join('+') + '+'

  const line = (cells: readonly string[], aligned: boolean): string =>
    '| ' +
    columns
      .map(({ width, align }, i) => pad(cells[i] ?? '', width, aligned ? align : 'left'))
      .join(' | ') +
    ' |'

  return [
    border('-'),
    line(headers, false),
    border('='),
    ...rows.map(row => line(row, true)),
    border('-'),
  ].join('\n')
}

/**
 * Render a dataset as a grid table, columns in header order
 */
export function renderDatasetTable(dataset: Dataset): string {
  return renderTable(
    dataset.header,
    dataset.rows.map(row => dataset.header.map(column => getCell(row, column)))
  )
}

// =============================================================================
// CSV & JSON
// =============================================================================

/**
 * Escape a value for CSV (quote if contains the delimiter, a quote, or a line break)
 */
export function escapeCsvValue(value: string, delimiter: string = ','): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"'
  }
  return value
}

/**
 * Render a dataset as CSV text (header line first)
 */
export function renderDatasetCsv(dataset: Dataset, delimiter: string = ','): string {
  const lines = [dataset.header.map(h => escapeCsvValue(h, delimiter)).join(delimiter)]
  for (const row of dataset.rows) {
    lines.push(dataset.header.map(column => escapeCsvValue(getCell(row, column), delimiter)).join(delimiter))
  }
  return lines.join('\n')
}

/**
 * Render a dataset as a JSON array of objects with keys in header order
 */
export function renderDatasetJson(dataset: Dataset): string {
  const items = dataset.rows.map(row =>
    Object.fromEntries(dataset.header.map(column => [column, getCell(row, column)]))
  )
  return JSON.stringify(items, null, 2)
}

// =============================================================================
// Aggregates
// =============================================================================

/**
 * `<operation> of <column> = <value>`
 *
 * @example
 * formatAggregateLine({ operation: 'avg', column: 'price', value: 600, count: 3 })
 * // 'avg of price = 600'
 */
export function formatAggregateLine(result: AggregateResult, precision?: number): string {
  return `${result.operation} of ${result.column} = ${formatNumber(result.value, precision)}`
}

/**
 * Aggregate as a JSON object; the value is not rounded
 */
export function renderAggregateJson(result: AggregateResult): string {
  return JSON.stringify(
    {
      operation: result.operation,
      column: result.column,
      value: result.value,
      count: result.count,
    },
    null,
    2
  )
}

/**
 * `(1 row)` / `(3 rows)`
 */
export function formatRowCount(count: number): string {
  return `(${count} ${count === 1 ? 'row' : 'rows'})`
}

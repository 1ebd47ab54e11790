/**
 * Tabular data loaded from a CSV file
 */

// =============================================================================
// Rows
// =============================================================================

/**
 * One record: column name to the raw cell text as read from the file.
 *
 * Key order is not relied upon; the owning dataset's header carries the
 * column order.
 */
export type Row = Readonly<Record<string, string>>

// =============================================================================
// Dataset
// =============================================================================

/**
 * Header plus ordered rows.
 *
 * Every row has exactly the header's columns. Query stages never mutate a
 * dataset; they return a new one sharing the same header.
 */
export interface Dataset {
  readonly header: readonly string[]
  readonly rows: readonly Row[]
}

/**
 * Build a dataset from a header and rows, freezing both collections
 */
export function createDataset(header: readonly string[], rows: readonly Row[]): Dataset {
  return Object.freeze({
    header: Object.freeze([...header]),
    rows: Object.freeze([...rows]),
  })
}

/**
 * Same header, different rows
 */
export function withRows(dataset: Dataset, rows: readonly Row[]): Dataset {
  return Object.freeze({
    header: dataset.header,
    rows: Object.freeze([...rows]),
  })
}

/**
 * Read a cell, treating a missing key as an empty cell
 */
export function getCell(row: Row, column: string): string {
  return Object.prototype.hasOwnProperty.call(row, column) ? (row[column] ?? '') : ''
}

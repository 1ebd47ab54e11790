/**
 * CSV Reader
 *
 * Loads a CSV file into a Dataset. The first record is the header and is
 * used verbatim, in order. Every later record becomes a Row.
 *
 * Records are split by csv-parse, which handles:
 * - `\n`, `\r\n` or `\r` record separators
 * - double-quoted fields, with `""` for a literal quote; quoted fields may
 *   contain the delimiter and line breaks
 * - a UTF-8 byte order mark at the start of the file
 * - empty lines, which are skipped
 *
 * Cells are kept as text; typing happens at query time.
 */

import { promises as fs } from 'node:fs'
import { parse } from 'csv-parse/sync'
import { ErrorCode, FileError } from '../errors'
import type { Dataset, Row } from '../types/dataset'
import { createDataset } from '../types/dataset'
import { logger } from '../utils'

// =============================================================================
// Types
// =============================================================================

export interface CsvReadOptions {
  /** Field separator, a single character (default `,`) */
  delimiter?: string | undefined
}

/**
 * One parsed record and the line it starts on
 */
export interface CsvRecord {
  fields: string[]
  /** 1-based line number of the record's first character */
  line: number
}

export const DEFAULT_DELIMITER = ','

// =============================================================================
// Parsing
// =============================================================================

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

function countLineBreaks(fields: readonly string[]): number {
  let count = 0
  for (const field of fields) {
    count += field.match(/\r\n|\r|\n/g)?.length ?? 0
  }
  return count
}

/**
 * Split CSV text into records.
 *
 * Field counts are not checked here; `recordsToDataset` compares each
 * record against the header.
 *
 * @param content - File contents
 * @param delimiter - Field separator
 * @param path - Used in error messages only
 * @throws FileError `INVALID_FORMAT` when csv-parse rejects the text
 */
export function parseCsv(content: string, delimiter: string = DEFAULT_DELIMITER, path: string = '<input>'): CsvRecord[] {
  const records: CsvRecord[] = []

  try {
    parse(content, {
      bom: true,
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
      // Records are collected here rather than returned by parse()
      on_record: (fields: string[], context) => {
        // context.lines is the line the record ends on
        records.push({ fields, line: context.lines - countLineBreaks(fields) })
        return undefined
      },
    })
  } catch (error) {
    const code = errorCode(error)
    if (code === undefined || !code.startsWith('CSV_')) throw error

    const cause = error instanceof Error ? error : undefined
    const message = code === 'CSV_QUOTE_NOT_CLOSED'
      ? `Unterminated quoted field in ${path}`
      : `Invalid CSV in ${path}: ${cause?.message ?? code}`
    throw new FileError(message, ErrorCode.INVALID_FORMAT, { path }, cause)
  }

  return records
}

/**
 * Turn parsed records into a dataset, checking the header and field counts.
 *
 * @throws FileError `MISSING_HEADER` when there are no records at all
 * @throws FileError `INVALID_FORMAT` for empty/duplicate column names or a
 * record whose field count differs from the header's
 */
export function recordsToDataset(records: readonly CsvRecord[], path: string = '<input>'): Dataset {
  const [headerRecord, ...dataRecords] = records
  if (!headerRecord) {
    throw new FileError(`File has no header line: ${path}`, ErrorCode.MISSING_HEADER, { path })
  }

  const header = headerRecord.fields
  const seen = new Set<string>()
  for (const name of header) {
    if (name === '') {
      throw new FileError(`Header of ${path} contains an empty column name`, ErrorCode.INVALID_FORMAT, { path, line: headerRecord.line })
    }
    if (seen.has(name)) {
      throw new FileError(`Header of ${path} contains duplicate column "${name}"`, ErrorCode.INVALID_FORMAT, { path, line: headerRecord.line })
    }
    seen.add(name)
  }

  const rows: Row[] = dataRecords.map(record => {
    if (record.fields.length !== header.length) {
      throw new FileError(
        `Line ${record.line} of ${path} has ${record.fields.length} fields, expected ${header.length}`,
        ErrorCode.INVALID_FORMAT,
        { path, line: record.line }
      )
    }
    return Object.fromEntries(header.map((name, i) => [name, record.fields[i] ?? '']))
  })

  return createDataset(header, rows)
}

// =============================================================================
// File Access
// =============================================================================

/**
 * Read a CSV file from disk into a dataset.
 *
 * @throws FileError `FILE_NOT_FOUND` when the path does not exist
 * @throws FileError `FILE_READ_ERROR` when it cannot be read (permissions, a directory)
 * @throws FileError `MISSING_HEADER` / `INVALID_FORMAT` for bad contents
 *
 * @example
 * const dataset = await readCsvFile('./products.csv')
 * dataset.header // ['name', 'price', 'rating']
 */
export async function readCsvFile(path: string, options: CsvReadOptions = {}): Promise<Dataset> {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER

  let content: string
  try {
    content = await fs.readFile(path, 'utf-8')
  } catch (error) {
    const cause = error instanceof Error ? error : undefined
    if (errorCode(error) === 'ENOENT') {
      throw new FileError(`File not found: ${path}`, ErrorCode.FILE_NOT_FOUND, { path }, cause)
    }
    const reason = errorCode(error) === 'EISDIR'
      ? 'path is a directory'
      : errorCode(error) === 'EACCES' || errorCode(error) === 'EPERM'
        ? 'permission denied'
        : cause?.message ?? String(error)
    throw new FileError(`Cannot read file ${path}: ${reason}`, ErrorCode.FILE_READ_ERROR, { path }, cause)
  }

  const dataset = recordsToDataset(parseCsv(content, delimiter, path), path)
  logger.debug(`loaded ${dataset.rows.length} rows x ${dataset.header.length} columns from ${path}`)
  return dataset
}

/**
 * csvq
 *
 * Query engine for CSV files: one filter, one sort, one aggregate.
 *
 * @example
 * ```typescript
 * import { readCsvFile, runQuery } from 'csvq'
 *
 * const products = await readCsvFile('./products.csv')
 * const result = runQuery(products, { where: 'price>500', orderBy: 'price=desc' })
 * if (result.kind === 'rows') {
 *   console.log(result.dataset.rows)
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './types'
export * from './errors'
export * from './query'

export {
  readCsvFile,
  parseCsv,
  recordsToDataset,
  DEFAULT_DELIMITER,
  type CsvReadOptions,
  type CsvRecord,
} from './csv'

export {
  loadConfig,
  OUTPUT_FORMATS,
  type CsvqConfig,
  type OutputFormat,
} from './config'

export {
  parseTyped,
  compareTyped,
  compareForSort,
  formatNumber,
  setLogger,
  createStderrLogger,
  noopLogger,
  type Logger,
  type LogLevel,
} from './utils'

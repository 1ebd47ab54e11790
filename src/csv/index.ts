/**
 * CSV input for csvq
 */

export {
  readCsvFile,
  parseCsv,
  recordsToDataset,
  DEFAULT_DELIMITER,
  type CsvReadOptions,
  type CsvRecord,
} from './reader'

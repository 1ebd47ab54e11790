/**
 * Query Command
 *
 * Load a CSV file, run the filter/sort/aggregate pipeline, print the result.
 *
 * Usage:
 *   csvq --file <path> [--where <expr>] [--order-by <expr>] [--aggregate <expr>]
 *
 * Examples:
 *   csvq --file products.csv --where 'price>500'
 *   csvq --file products.csv --order-by 'rating=desc'
 *   csvq --file products.csv --where 'brand=apple' --aggregate 'price=avg'
 */

import type { ParsedArgs } from '../args'
import { print, printError, printWarning, formatAggregateLine, formatRowCount, renderAggregateJson, renderDatasetCsv, renderDatasetJson, renderDatasetTable } from '../utils'
import type { CsvqConfig, OutputFormat } from '../../config'
import { readCsvFile } from '../../csv/reader'
import { isCsvqError, type ParseError } from '../../errors'
import { checkExpressionSyntax, executeQuery, planQuery } from '../../query/executor'
import type { QueryPlan, QueryResult } from '../../types/query'
import { logger } from '../../utils'

// =============================================================================
// Constants
// =============================================================================

const USAGE = 'Usage: csvq --file <path> [--where <expr>] [--order-by <expr>] [--aggregate <expr>]'

const NO_MATCHES = 'No rows matched the filter.'

const NO_DATA = 'No data to display.'

// =============================================================================
// Query Command
// =============================================================================

/**
 * Execute a query against a CSV file
 *
 * @returns Process exit code
 */
export async function queryCommand(parsed: ParsedArgs, config: CsvqConfig): Promise<number> {
  const { file, where, orderBy, aggregate } = parsed.options

  if (!file) {
    printError('Missing required argument --file')
    print(USAGE)
    return 1
  }

  if (!file.toLowerCase().endsWith('.csv')) {
    printWarning(`${file} does not have a .csv extension`)
  }

  const malformed = checkExpressionSyntax({ where, orderBy, aggregate })
  if (malformed) return rejectExpression(malformed)

  try {
    const dataset = await readCsvFile(file, { delimiter: config.delimiter })

    const plan = planQuery(dataset.header, { where, orderBy, aggregate })
    if (!plan.ok) return rejectExpression(plan.error)

    const result = executeQuery(dataset, plan.value)
    printResult(result, plan.value, {
      format: parsed.options.format ?? config.format,
      delimiter: config.delimiter,
      precision: config.precision,
      quiet: parsed.options.quiet,
    })
    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    if (isCsvqError(error)) {
      logger.error(`query failed with ${error.code}`, error.context)
    } else {
      logger.error('query failed', error)
    }
    printError(message)
    return 1
  }
}

function rejectExpression(error: ParseError): number {
  logger.warn(`rejected ${error.kind} expression`, error.expression)
  printError(error.message)
  return 1
}

// =============================================================================
// Output
// =============================================================================

interface OutputOptions {
  format: OutputFormat
  delimiter: string
  precision: number
  quiet: boolean
}

/**
 * Print a query result in the requested format
 */
function printResult(result: QueryResult, plan: QueryPlan, options: OutputOptions): void {
  if (result.kind === 'aggregate') {
    if (options.format === 'json') {
      print(renderAggregateJson(result.result))
      return
    }
    print(formatAggregateLine(result.result, options.precision))
    if (options.format === 'table' && !options.quiet) {
      print(formatRowCount(result.result.count))
    }
    return
  }

  const { dataset } = result

  switch (options.format) {
    case 'json':
      print(renderDatasetJson(dataset))
      return

    case 'csv':
      print(renderDatasetCsv(dataset, options.delimiter))
      return

    case 'table':
      if (dataset.rows.length === 0) {
        print(plan.filter ? NO_MATCHES : NO_DATA)
        return
      }
      print(renderDatasetTable(dataset))
      if (!options.quiet) {
        print(formatRowCount(dataset.rows.length))
      }
      return
  }
}

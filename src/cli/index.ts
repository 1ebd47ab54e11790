#!/usr/bin/env node
/**
 * csvq CLI
 *
 * Command-line interface for querying CSV files.
 *
 * Usage:
 *   csvq --file <path> [--where <expr>] [--order-by <expr>] [--aggregate <expr>]
 */

import { config as loadDotenv } from 'dotenv'
import { parseArgs } from './args'
import { print, printError } from './utils'
import { queryCommand } from './commands/query'
import { loadConfig } from '../config'
import { createStderrLogger, noopLogger, setLogger } from '../utils/logger'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

export const HELP_TEXT = `
csvq v${VERSION}

Filter, sort and aggregate a CSV file.

USAGE:
  csvq --file <path> [options]

OPTIONS:
  --file <path>            CSV file with a header row (required)
  --where <expr>           Keep rows matching <column><op><value>, op is >, < or =
  --order-by <expr>        Sort by <column>=asc or <column>=desc
  --aggregate <expr>       Reduce to <column>=avg, min or max
  --format <format>        Output format: table, csv, json (default: table)
  -q, --quiet              Omit the row count footer
  -h, --help               Show this help message
  -v, --version            Show version number

Stages always run in the order where -> order-by -> aggregate.
Values that parse as numbers compare numerically, everything else as text.

ENVIRONMENT:
  CSVQ_LOG_LEVEL           silent, error, warn, info, debug (default: silent)
  CSVQ_DELIMITER           Field separator (default: ,)
  CSVQ_PRECISION           Fraction digits for aggregate values (default: 2)
  CSVQ_FORMAT              Default output format

EXAMPLES:
  csvq --file products.csv
  csvq --file products.csv --where 'price>500'
  csvq --file products.csv --order-by 'price=desc'
  csvq --file products.csv --aggregate 'price=avg'
  csvq --file products.csv --where 'brand=apple' --order-by 'price=asc' --aggregate 'price=max'
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 *
 * @returns Process exit code
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`csvq v${VERSION}`)
      return 0
    }

    const config = loadConfig(env)
    setLogger(config.logLevel === 'silent' ? noopLogger : createStderrLogger(config.logLevel))

    return await queryCommand(parsed, config)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    print('\nRun "csvq --help" for usage.')
    return 1
  }
}

// Run CLI if this is the main module
if (require.main === module) {
  loadDotenv()
  void main().then(code => {
    process.exitCode = code
  })
}

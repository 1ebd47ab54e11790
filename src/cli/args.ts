/**
 * CLI Argument Parser
 *
 * Pure functions for parsing command line arguments.
 * Flags taking a value accept both `--flag value` and `--flag=value`.
 */

import { ErrorCode, UsageError } from '../errors'
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../config'

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  options: {
    help: boolean
    version: boolean
    quiet: boolean
    file?: string | undefined
    where?: string | undefined
    orderBy?: string | undefined
    aggregate?: string | undefined
    /** Overrides CSVQ_FORMAT when given */
    format?: OutputFormat | undefined
  }
}

type ValueOption = 'file' | 'where' | 'orderBy' | 'aggregate' | 'format'

const VALUE_FLAGS: Readonly<Record<string, ValueOption>> = {
  '--file': 'file',
  '--where': 'where',
  '--order-by': 'orderBy',
  '--aggregate': 'aggregate',
  '--format': 'format',
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws UsageError for unknown options, missing values, repeated flags
 * and positional arguments
 *
 * @example
 * parseArgs(['--file', 'data.csv', '--where=price>500'])
 * // { options: { file: 'data.csv', where: 'price>500', help: false, ... } }
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    options: {
      help: false,
      version: false,
      quiet: false,
    },
  }
  const seen = new Set<string>()

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1
    const name = eq === -1 ? arg : arg.slice(0, eq)
    const inline = eq === -1 ? undefined : arg.slice(eq + 1)

    const option = VALUE_FLAGS[name]
    if (option) {
      if (seen.has(name)) {
        throw new UsageError(`Argument ${name} may be specified only once`, ErrorCode.DUPLICATE_ARGUMENT, { argument: name })
      }
      seen.add(name)

      const value = inline ?? argv[++i]
      if (value === undefined) {
        throw new UsageError(`Missing value for ${name}`, ErrorCode.MISSING_ARGUMENT, { argument: name })
      }

      if (option === 'format') {
        if (!isOutputFormat(value)) {
          throw new UsageError(
            `Invalid format: ${value}. Valid formats: ${OUTPUT_FORMATS.join(', ')}`,
            ErrorCode.INVALID_ARGUMENT,
            { argument: name }
          )
        }
        result.options.format = value
      } else {
        result.options[option] = value
      }
      i++
      continue
    }

    if (inline !== undefined) {
      throw new UsageError(`Option ${name} does not take a value`, ErrorCode.INVALID_ARGUMENT, { argument: name })
    }

    switch (name) {
      case '-h':
      case '--help':
        result.options.help = true
        break
      case '-v':
      case '--version':
        result.options.version = true
        break
      case '-q':
      case '--quiet':
        result.options.quiet = true
        break
      default:
        if (name.startsWith('-')) {
          throw new UsageError(`Unknown option: ${name}`, ErrorCode.INVALID_ARGUMENT, { argument: name })
        }
        throw new UsageError(`Unexpected argument: ${name}`, ErrorCode.INVALID_ARGUMENT, { argument: name })
    }
    i++
  }

  return result
}

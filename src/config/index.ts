/**
 * csvq Configuration
 *
 * Settings come from environment variables (optionally loaded from a
 * `.env` file by the executable). Command-line flags override them.
 *
 * | Variable         | Values                                  | Default |
 * |------------------|-----------------------------------------|---------|
 * | CSVQ_LOG_LEVEL   | silent, error, warn, info, debug        | silent  |
 * | CSVQ_DELIMITER   | any single character except `"`, CR, LF | `,`     |
 * | CSVQ_PRECISION   | integer 0-10                            | 2       |
 * | CSVQ_FORMAT      | table, csv, json                        | table   |
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors'
import { DEFAULT_DELIMITER } from '../csv/reader'
import { LOG_LEVELS, type LogLevel } from '../utils/logger'
import { DEFAULT_PRECISION } from '../utils/format'

// =============================================================================
// Types
// =============================================================================

export const OUTPUT_FORMATS = ['table', 'csv', 'json'] as const

export type OutputFormat = typeof OUTPUT_FORMATS[number]

export interface CsvqConfig {
  readonly logLevel: LogLevel
  readonly delimiter: string
  readonly precision: number
  readonly format: OutputFormat
}

// =============================================================================
// Schema
// =============================================================================

const envSchema = z.object({
  CSVQ_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
  CSVQ_DELIMITER: z
    .string()
    .length(1, 'must be a single character')
    .refine(value => value !== '"' && value !== '\n' && value !== '\r', 'cannot be a quote or line break')
    .default(DEFAULT_DELIMITER),
  CSVQ_PRECISION: z.coerce
    .number()
    .int('must be an integer')
    .min(0)
    .max(10)
    .default(DEFAULT_PRECISION),
  CSVQ_FORMAT: z.enum(OUTPUT_FORMATS).default('table'),
})

/**
 * Treat empty variables as unset, so `CSVQ_FORMAT=` falls back to the default
 */
function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value
    }
  }
  return result
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate configuration from an environment map.
 *
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * loadConfig({ CSVQ_PRECISION: '4' }).precision // 4
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CsvqConfig {
  const parsed = envSchema.safeParse(definedEntries(env))

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues })
  }

  return Object.freeze({
    logLevel: parsed.data.CSVQ_LOG_LEVEL,
    delimiter: parsed.data.CSVQ_DELIMITER,
    precision: parsed.data.CSVQ_PRECISION,
    format: parsed.data.CSVQ_FORMAT,
  })
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

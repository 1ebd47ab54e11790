/**
 * csvq Error Handling Module
 *
 * All errors extend from CsvqError which provides:
 * - Error codes for programmatic handling
 * - Context data naming the offending expression, column or file
 * - JSON serialization
 * - Cause chaining
 *
 * Error Hierarchy:
 * - CsvqError (base class)
 *   - ParseError (malformed expression, unknown column)
 *   - AggregationError (non-numeric column, empty input)
 *   - FileError (missing/unreadable file, missing header, bad CSV)
 *   - UsageError (invalid command line)
 *   - ConfigurationError (invalid environment settings)
 *
 * Every error is terminal for one invocation: the CLI prints the message
 * and exits non-zero.
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for csvq operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Expression errors
  MALFORMED_EXPRESSION = 'MALFORMED_EXPRESSION',
  UNKNOWN_COLUMN = 'UNKNOWN_COLUMN',

  // Aggregation errors
  NON_NUMERIC_COLUMN = 'NON_NUMERIC_COLUMN',
  EMPTY_INPUT = 'EMPTY_INPUT',

  // File errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_READ_ERROR = 'FILE_READ_ERROR',
  MISSING_HEADER = 'MISSING_HEADER',
  INVALID_FORMAT = 'INVALID_FORMAT',

  // Command line errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  MISSING_ARGUMENT = 'MISSING_ARGUMENT',
  DUPLICATE_ARGUMENT = 'DUPLICATE_ARGUMENT',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format (used by `--format json` error output and logs)
 */
export interface SerializedError {
  name: string
  code: ErrorCode
  message: string
  context?: Record<string, unknown> | undefined
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all csvq errors.
 *
 * @example
 * ```typescript
 * throw new CsvqError('Unexpected state', ErrorCode.INTERNAL, { stage: 'sort' })
 * ```
 */
export class CsvqError extends Error {
  override readonly name: string = 'CsvqError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof CsvqError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Parse Errors
// =============================================================================

export type ParseErrorKind = 'MalformedExpression' | 'UnknownColumn'

/**
 * Error produced when a `--where`, `--order-by` or `--aggregate` expression
 * cannot be turned into a spec.
 */
export class ParseError extends CsvqError {
  override readonly name = 'ParseError'
  readonly kind: ParseErrorKind

  constructor(
    kind: ParseErrorKind,
    message: string,
    context: { expression: string; column?: string | undefined; available?: readonly string[] | undefined }
  ) {
    super(
      message,
      kind === 'UnknownColumn' ? ErrorCode.UNKNOWN_COLUMN : ErrorCode.MALFORMED_EXPRESSION,
      { ...context }
    )
    this.kind = kind
    Object.setPrototypeOf(this, ParseError.prototype)
  }

  /** The expression as given on the command line */
  get expression(): string {
    return String(this.context.expression)
  }

  /** Column named by the expression, when it got far enough to find one */
  get column(): string | undefined {
    const column = this.context.column
    return typeof column === 'string' ? column : undefined
  }
}

/**
 * Expression does not have the expected shape
 */
export function malformedExpression(expression: string, reason: string): ParseError {
  return new ParseError('MalformedExpression', `Invalid expression "${expression}": ${reason}`, { expression })
}

/**
 * Expression names a column that is not in the header
 */
export function unknownColumn(expression: string, column: string, available: readonly string[]): ParseError {
  return new ParseError(
    'UnknownColumn',
    `Column "${column}" not found in "${expression}". Available columns: ${available.join(', ')}`,
    { expression, column, available }
  )
}

// =============================================================================
// Aggregation Errors
// =============================================================================

export type AggregationErrorKind = 'NonNumericColumn' | 'EmptyInput'

/**
 * Error produced when a column cannot be reduced to a number.
 */
export class AggregationError extends CsvqError {
  override readonly name = 'AggregationError'
  readonly kind: AggregationErrorKind

  constructor(
    kind: AggregationErrorKind,
    message: string,
    context: { column: string; operation: string; row?: number | undefined; value?: string | undefined }
  ) {
    super(
      message,
      kind === 'EmptyInput' ? ErrorCode.EMPTY_INPUT : ErrorCode.NON_NUMERIC_COLUMN,
      { ...context }
    )
    this.kind = kind
    Object.setPrototypeOf(this, AggregationError.prototype)
  }

  get column(): string {
    return String(this.context.column)
  }
}

// =============================================================================
// File Errors
// =============================================================================

/**
 * Error raised by the CSV reader.
 */
export class FileError extends CsvqError {
  override readonly name = 'FileError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FILE_READ_ERROR,
    context: { path: string; line?: number | undefined },
    cause?: Error
  ) {
    super(message, code, { ...context }, cause)
    Object.setPrototypeOf(this, FileError.prototype)
  }

  get path(): string {
    return String(this.context.path)
  }

  /** 1-based line number, for format errors */
  get line(): number | undefined {
    const line = this.context.line
    return typeof line === 'number' ? line : undefined
  }
}

// =============================================================================
// Usage Errors
// =============================================================================

/**
 * Error raised for an invalid command line.
 */
export class UsageError extends CsvqError {
  override readonly name = 'UsageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_ARGUMENT,
    context?: { argument?: string | undefined }
  ) {
    super(message, code, context ? { ...context } : undefined)
    Object.setPrototypeOf(this, UsageError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when environment configuration is invalid.
 */
export class ConfigurationError extends CsvqError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: { issues?: readonly string[] | undefined }
  ) {
    super(message, ErrorCode.INVALID_CONFIG, context ? { ...context } : undefined)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isCsvqError(error: unknown): error is CsvqError {
  return error instanceof CsvqError
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError
}

export function isAggregationError(error: unknown): error is AggregationError {
  return error instanceof AggregationError
}

export function isFileError(error: unknown): error is FileError {
  return error instanceof FileError
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a CsvqError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): CsvqError {
  if (error instanceof CsvqError) {
    return error
  }

  if (error instanceof Error) {
    return new CsvqError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new CsvqError(String(error), ErrorCode.UNKNOWN, context)
}

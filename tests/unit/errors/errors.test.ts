/**
 * Error Hierarchy Tests
 */

import { describe, it, expect } from 'vitest'
import {
  AggregationError,
  ConfigurationError,
  CsvqError,
  ErrorCode,
  FileError,
  ParseError,
  UsageError,
  isAggregationError,
  isCsvqError,
  isFileError,
  isParseError,
  isUsageError,
  malformedExpression,
  unknownColumn,
  wrapError,
} from '../../../src/errors'

describe('CsvqError', () => {
  it('carries a code and context', () => {
    const error = new CsvqError('Unexpected state', ErrorCode.INTERNAL, { stage: 'sort' })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('CsvqError')
    expect(error.code).toBe(ErrorCode.INTERNAL)
    expect(error.context).toEqual({ stage: 'sort' })
    expect(error.is(ErrorCode.INTERNAL)).toBe(true)
    expect(error.is(ErrorCode.UNKNOWN)).toBe(false)
  })

  it('defaults to UNKNOWN with empty context', () => {
    const error = new CsvqError('oops')
    expect(error.code).toBe(ErrorCode.UNKNOWN)
    expect(error.context).toEqual({})
  })

  it('serializes to JSON with its cause', () => {
    const cause = new FileError('File not found: a.csv', ErrorCode.FILE_NOT_FOUND, { path: 'a.csv' })
    const error = new CsvqError('Query failed', ErrorCode.INTERNAL, undefined, cause)

    expect(error.toJSON()).toEqual({
      name: 'CsvqError',
      code: ErrorCode.INTERNAL,
      message: 'Query failed',
      context: undefined,
      cause: {
        name: 'FileError',
        code: ErrorCode.FILE_NOT_FOUND,
        message: 'File not found: a.csv',
        context: { path: 'a.csv' },
        cause: undefined,
      },
    })
  })
})

describe('ParseError', () => {
  it('builds a malformed expression error', () => {
    const error = malformedExpression('price', 'expected an operator')

    expect(error).toBeInstanceOf(ParseError)
    expect(error).toBeInstanceOf(CsvqError)
    expect(error.name).toBe('ParseError')
    expect(error.kind).toBe('MalformedExpression')
    expect(error.code).toBe(ErrorCode.MALFORMED_EXPRESSION)
    expect(error.expression).toBe('price')
    expect(error.column).toBeUndefined()
    expect(error.message).toBe('Invalid expression "price": expected an operator')
  })

  it('builds an unknown column error', () => {
    const error = unknownColumn('cost>1', 'cost', ['name', 'price'])

    expect(error.kind).toBe('UnknownColumn')
    expect(error.code).toBe(ErrorCode.UNKNOWN_COLUMN)
    expect(error.column).toBe('cost')
    expect(error.context.available).toEqual(['name', 'price'])
    expect(error.message).toBe('Column "cost" not found in "cost>1". Available columns: name, price')
  })
})

describe('AggregationError', () => {
  it('maps kinds to codes', () => {
    const empty = new AggregationError('EmptyInput', 'no rows', { column: 'price', operation: 'avg' })
    const text = new AggregationError('NonNumericColumn', 'bad cell', { column: 'name', operation: 'max', row: 1, value: 'A' })

    expect(empty.code).toBe(ErrorCode.EMPTY_INPUT)
    expect(text.code).toBe(ErrorCode.NON_NUMERIC_COLUMN)
    expect(text.column).toBe('name')
  })
})

describe('FileError', () => {
  it('exposes the path and line', () => {
    const error = new FileError('bad', ErrorCode.INVALID_FORMAT, { path: 'data.csv', line: 3 })
    expect(error.path).toBe('data.csv')
    expect(error.line).toBe(3)
  })

  it('defaults to FILE_READ_ERROR', () => {
    const error = new FileError('bad', undefined, { path: 'data.csv' })
    expect(error.code).toBe(ErrorCode.FILE_READ_ERROR)
    expect(error.line).toBeUndefined()
  })
})

describe('type guards', () => {
  it('narrow by class', () => {
    const parse = malformedExpression('x', 'y')
    const usage = new UsageError('Unknown option: --x')
    const config = new ConfigurationError('Invalid configuration: x')

    expect(isCsvqError(parse)).toBe(true)
    expect(isParseError(parse)).toBe(true)
    expect(isUsageError(usage)).toBe(true)
    expect(isUsageError(parse)).toBe(false)
    expect(isAggregationError(parse)).toBe(false)
    expect(isFileError(config)).toBe(false)
    expect(isCsvqError(new Error('plain'))).toBe(false)
  })
})

describe('wrapError', () => {
  it('returns csvq errors unchanged', () => {
    const error = new UsageError('Unknown option: --x')
    expect(wrapError(error)).toBe(error)
  })

  it('wraps plain errors as INTERNAL with the cause', () => {
    const cause = new TypeError('boom')
    const wrapped = wrapError(cause, { stage: 'read' })

    expect(wrapped.code).toBe(ErrorCode.INTERNAL)
    expect(wrapped.message).toBe('boom')
    expect(wrapped.cause).toBe(cause)
    expect(wrapped.context).toEqual({ stage: 'read' })
  })

  it('wraps other values as UNKNOWN', () => {
    const wrapped = wrapError('just text')
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN)
    expect(wrapped.message).toBe('just text')
  })
})

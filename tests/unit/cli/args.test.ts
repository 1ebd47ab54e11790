/**
 * CLI Argument Parser Tests
 */

import { describe, it, expect } from 'vitest'
import { parseArgs } from '../../../src/cli/args'
import { ErrorCode, UsageError } from '../../../src/errors'

function usageErrorOf(argv: string[]): UsageError {
  try {
    parseArgs(argv)
  } catch (error) {
    if (error instanceof UsageError) return error
    throw error
  }
  throw new Error('expected a UsageError')
}

describe('parseArgs', () => {
  it('returns defaults for no arguments', () => {
    expect(parseArgs([])).toEqual({ options: { help: false, version: false, quiet: false } })
  })

  it('reads every value flag', () => {
    const parsed = parseArgs([
      '--file', 'data.csv',
      '--where', 'price>500',
      '--order-by', 'price=desc',
      '--aggregate', 'price=avg',
      '--format', 'csv',
    ])

    expect(parsed.options).toEqual({
      help: false,
      version: false,
      quiet: false,
      file: 'data.csv',
      where: 'price>500',
      orderBy: 'price=desc',
      aggregate: 'price=avg',
      format: 'csv',
    })
  })

  it('accepts --flag=value and keeps later = signs in the value', () => {
    const parsed = parseArgs(['--file=data.csv', '--where=name=B'])
    expect(parsed.options.file).toBe('data.csv')
    expect(parsed.options.where).toBe('name=B')
  })

  it('keeps an empty value', () => {
    expect(parseArgs(['--where', '']).options.where).toBe('')
  })

  it('reads boolean flags in short and long form', () => {
    expect(parseArgs(['-h']).options.help).toBe(true)
    expect(parseArgs(['--help']).options.help).toBe(true)
    expect(parseArgs(['-v']).options.version).toBe(true)
    expect(parseArgs(['--version']).options.version).toBe(true)
    expect(parseArgs(['-q']).options.quiet).toBe(true)
    expect(parseArgs(['--quiet']).options.quiet).toBe(true)
  })

  it('skips empty arguments', () => {
    expect(parseArgs(['', '--quiet']).options.quiet).toBe(true)
  })

  describe('errors', () => {
    it('rejects a repeated flag', () => {
      const error = usageErrorOf(['--where', 'price>1', '--where', 'price<9'])
      expect(error.code).toBe(ErrorCode.DUPLICATE_ARGUMENT)
      expect(error.message).toBe('Argument --where may be specified only once')
    })

    it('rejects a repeated flag across both spellings', () => {
      expect(usageErrorOf(['--order-by=price=asc', '--order-by', 'price=desc']).message).toBe(
        'Argument --order-by may be specified only once'
      )
    })

    it('rejects a flag without its value', () => {
      const error = usageErrorOf(['--file'])
      expect(error.code).toBe(ErrorCode.MISSING_ARGUMENT)
      expect(error.message).toBe('Missing value for --file')
    })

    it('rejects an unknown format', () => {
      expect(usageErrorOf(['--format', 'xml']).message).toBe('Invalid format: xml. Valid formats: table, csv, json')
    })

    it('rejects a value on a boolean flag', () => {
      expect(usageErrorOf(['--quiet=yes']).message).toBe('Option --quiet does not take a value')
    })

    it('rejects an unknown option', () => {
      expect(usageErrorOf(['--limit', '5']).message).toBe('Unknown option: --limit')
    })

    it('rejects positional arguments', () => {
      const error = usageErrorOf(['data.csv'])
      expect(error.code).toBe(ErrorCode.INVALID_ARGUMENT)
      expect(error.message).toBe('Unexpected argument: data.csv')
    })
  })
})

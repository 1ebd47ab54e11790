/**
 * CLI Output Renderer Tests
 */

import { describe, it, expect } from 'vitest'
import {
  escapeCsvValue,
  formatAggregateLine,
  formatRowCount,
  pad,
  renderAggregateJson,
  renderDatasetCsv,
  renderDatasetJson,
  renderDatasetTable,
  renderTable,
} from '../../../src/cli/utils'
import { runQuery } from '../../../src/query/executor'
import { createColumnDataset, createPricedDataset } from '../../factories'

// =============================================================================
// Table
// =============================================================================

describe('pad', () => {
  it('pads left or right', () => {
    expect(pad('ab', 4)).toBe('ab  ')
    expect(pad('ab', 4, 'right')).toBe('  ab')
  })
})

describe('renderTable', () => {
  it('draws a grid with numeric columns right-aligned', () => {
    expect(renderTable(['name', 'price'], [['A', '500'], ['B', '80']])).toBe([
      '+------+-------+',
      '| name | price |',
      '+======+=======+',
      '| A    |   500 |',
      '| B    |    80 |',
      '+------+-------+',
    ].join('\n'))
  })

  it('left-aligns a column that is entirely empty', () => {
    expect(renderTable(['a', 'b'], [['x', '']])).toBe([
      '+---+---+',
      '| a | b |',
      '+===+===+',
      '| x |   |',
      '+---+---+',
    ].join('\n'))
  })

  it('right-aligns a numeric column with gaps', () => {
    expect(renderTable(['qty'], [['10'], ['']])).toBe([
      '+-----+',
      '| qty |',
      '+=====+',
      '|  10 |',
      '|     |',
      '+-----+',
    ].join('\n'))
  })

  it('draws only the header for no rows', () => {
    expect(renderTable(['id'], [])).toBe(['+----+', '| id |', '+====+', '+----+'].join('\n'))
  })
})

describe('renderDatasetTable', () => {
  it('renders columns in header order', () => {
    expect(renderDatasetTable(createPricedDataset())).toBe([
      '+------+-------+--------+',
      '| name | price | rating |',
      '+======+=======+========+',
      '| A    |   500 |    4.7 |',
      '| B    |   800 |    4.9 |',
      '| C    |   500 |    4.5 |',
      '+------+-------+--------+',
    ].join('\n'))
  })

  it('renders a sorted column with more rows than the call stack allows arguments', () => {
    const values = Array.from({ length: 200_000 }, (_, i) => String(i))
    const result = runQuery(createColumnDataset('v', values), { orderBy: 'v=desc' })
    const lines = renderDatasetTable(result.dataset).split('\n')
    expect(lines).toHaveLength(200_004)
    expect(lines[0]).toBe('+--------+')
    expect(lines[3]).toBe('| 199999 |')
    expect(lines[200_002]).toBe('|      0 |')
  })
})

// =============================================================================
// CSV & JSON
// =============================================================================

describe('escapeCsvValue', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvValue('plain')).toBe('plain')
  })

  it('quotes values with delimiters, quotes or line breaks', () => {
    expect(escapeCsvValue('a,b')).toBe('"a,b"')
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""')
    expect(escapeCsvValue('two\nlines')).toBe('"two\nlines"')
  })

  it('follows the delimiter in use', () => {
    expect(escapeCsvValue('a;b', ';')).toBe('"a;b"')
    expect(escapeCsvValue('a,b', ';')).toBe('a,b')
  })
})

describe('renderDatasetCsv', () => {
  it('writes the header then each row', () => {
    expect(renderDatasetCsv(createPricedDataset())).toBe('name,price,rating\nA,500,4.7\nB,800,4.9\nC,500,4.5')
  })

  it('writes only the header for no rows', () => {
    expect(renderDatasetCsv(createColumnDataset('v', []), ';')).toBe('v')
  })
})

describe('renderDatasetJson', () => {
  it('writes an array of objects', () => {
    expect(renderDatasetJson(createColumnDataset('v', ['1']))).toBe('[\n  {\n    "v": "1"\n  }\n]')
  })

  it('keeps cells as strings', () => {
    expect(JSON.parse(renderDatasetJson(createPricedDataset()))).toEqual([
      { name: 'A', price: '500', rating: '4.7' },
      { name: 'B', price: '800', rating: '4.9' },
      { name: 'C', price: '500', rating: '4.5' },
    ])
  })

  it('writes an empty array for no rows', () => {
    expect(renderDatasetJson(createColumnDataset('v', []))).toBe('[]')
  })
})

// =============================================================================
// Aggregates
// =============================================================================

describe('formatAggregateLine', () => {
  it('prints integers in full', () => {
    expect(formatAggregateLine({ operation: 'avg', column: 'price', value: 600, count: 3 })).toBe('avg of price = 600')
  })

  it('rounds to the given precision', () => {
    expect(formatAggregateLine({ operation: 'avg', column: 'x', value: 2 / 3, count: 3 }, 3)).toBe('avg of x = 0.667')
  })
})

describe('renderAggregateJson', () => {
  it('writes the unrounded value and the row count', () => {
    expect(JSON.parse(renderAggregateJson({ operation: 'max', column: 'rating', value: 4.9, count: 1 }))).toEqual({
      operation: 'max',
      column: 'rating',
      value: 4.9,
      count: 1,
    })
  })
})

describe('formatRowCount', () => {
  it('uses the singular for one row', () => {
    expect(formatRowCount(1)).toBe('(1 row)')
    expect(formatRowCount(0)).toBe('(0 rows)')
    expect(formatRowCount(3)).toBe('(3 rows)')
  })
})

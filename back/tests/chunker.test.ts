import { describe, expect, it } from 'vitest'
import type { SelectedSheet, SheetRow } from '../src/domain/types.js'
import { chunkSheet, serializeRow } from '../src/services/extract/chunker.js'

const sheetOf = (rows: SheetRow[]): SelectedSheet => ({ fileId: 'file-1', sheetName: 'Comps', rows })

const compsRows: SheetRow[] = [
  ['Company', 'Ticker'],
  ['Acme Corp', 'ACM'],
  ['Beta Inc', 'BET'],
  ['Gamma LLC', 'GAM']
]

describe('serializeRow', () => {
  it('joins collapsed cells and ends with a newline', () => {
    expect(serializeRow(['  Acme   Corp ', 'ACM'])).toBe('Acme Corp | ACM\n')
  })
})

describe('chunkSheet', () => {
  it('packs rows greedily without exceeding the budget', () => {
    const chunks = chunkSheet(sheetOf(compsRows), 32)

    expect(chunks.map((chunk) => chunk.rows)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 3 },
      { start: 3, end: 4 }
    ])
    expect(chunks.map((chunk) => chunk.size)).toEqual([17, 31, 16])
    expect(chunks[1]?.text).toBe('Acme Corp | ACM\nBeta Inc | BET\n')
    expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1, 2])
    expect(chunks.every((chunk) => !chunk.truncated)).toBe(true)
  })

  it('keeps everything in one chunk when it fits exactly', () => {
    const chunks = chunkSheet(sheetOf(compsRows), 64)

    expect(chunks).toHaveLength(1)
    expect(chunks[0]?.size).toBe(64)
    expect(chunks[0]?.rows).toEqual({ start: 0, end: 4 })
  })

  it('partitions every row exactly once in order', () => {
    const rows: SheetRow[] = Array.from({ length: 57 }, (_, index) => [
      `Company ${index}`,
      'x'.repeat(index % 13)
    ])
    const chunks = chunkSheet(sheetOf(rows), 80)

    let expectedStart = 0
    for (const chunk of chunks) {
      expect(chunk.rows.start).toBe(expectedStart)
      expect(chunk.rows.end).toBeGreaterThan(chunk.rows.start)
      expect(chunk.size).toBeLessThanOrEqual(80)
      expect(chunk.text).toBe(rows.slice(chunk.rows.start, chunk.rows.end).map(serializeRow).join(''))
      expectedStart = chunk.rows.end
    }
    expect(expectedStart).toBe(rows.length)
  })

  it('emits an oversized row as its own truncated chunk', () => {
    const chunks = chunkSheet(sheetOf([['Company'], ['Acme', 'y'.repeat(40)], ['Beta']]), 32)

    expect(chunks).toHaveLength(3)
    expect(chunks[0]).toMatchObject({ text: 'Company\n', rows: { start: 0, end: 1 }, truncated: false })
    expect(chunks[1]).toMatchObject({
      text: 'Acme [truncated]\n',
      rows: { start: 1, end: 2 },
      truncated: true
    })
    expect(chunks[2]).toMatchObject({ text: 'Beta\n', rows: { start: 2, end: 3 }, truncated: false })
  })

  it('cuts a single oversized first cell to fit', () => {
    const chunks = chunkSheet(sheetOf([['A very long company name here', 'z'.repeat(10)]]), 32)

    expect(chunks[0]?.text).toBe('A very long company [truncated]\n')
    expect(chunks[0]?.size).toBe(32)
  })

  it('returns no chunks for an empty sheet', () => {
    expect(chunkSheet(sheetOf([]), 32)).toEqual([])
  })

  it('rejects budgets that are too small or fractional', () => {
    expect(() => chunkSheet(sheetOf(compsRows), 31)).toThrow('chunk budget must be an integer of at least 32')
    expect(() => chunkSheet(sheetOf(compsRows), 40.5)).toThrow('chunk budget must be an integer of at least 32')
  })
})

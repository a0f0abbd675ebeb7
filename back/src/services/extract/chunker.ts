import type { Chunk, SelectedSheet, SheetRow } from '../../domain/types.js'
import { collapseWhitespace } from './normalize.js'

export const CELL_SEPARATOR = ' | '
export const TRUNCATED_SUFFIX = ' [truncated]'
export const MIN_CHUNK_BUDGET = 32

export const serializeRow = (row: SheetRow): string =>
  `${row.map((cell) => collapseWhitespace(cell)).join(CELL_SEPARATOR)}\n`

/**
 * Greedily packs serialized rows into chunks of at most `budget` characters.
 * Rows are never split across chunks; a row that cannot fit on its own is
 * cut at cell granularity and emitted as a single flagged chunk.
 */
export const chunkSheet = (sheet: SelectedSheet, budget: number): Chunk[] => {
  if (!Number.isInteger(budget) || budget < MIN_CHUNK_BUDGET) {
    throw new Error(`chunk budget must be an integer of at least ${MIN_CHUNK_BUDGET}`)
  }

  const chunks: Chunk[] = []
  let lines: string[] = []
  let size = 0
  let start = 0

  const flush = (end: number) => {
    if (lines.length === 0) return
    const text = lines.join('')
    chunks.push({
      fileId: sheet.fileId,
      sheetName: sheet.sheetName,
      index: chunks.length,
      rows: { start, end },
      text,
      size: text.length,
      truncated: false
    })
    lines = []
    size = 0
    start = end
  }

  sheet.rows.forEach((row, rowIndex) => {
    const line = serializeRow(row)

    if (line.length > budget) {
      flush(rowIndex)
      const text = truncateRow(row, budget)
      chunks.push({
        fileId: sheet.fileId,
        sheetName: sheet.sheetName,
        index: chunks.length,
        rows: { start: rowIndex, end: rowIndex + 1 },
        text,
        size: text.length,
        truncated: true
      })
      start = rowIndex + 1
      return
    }

    if (size + line.length > budget) {
      flush(rowIndex)
    }
    lines.push(line)
    size += line.length
  })

  flush(sheet.rows.length)
  return chunks
}

const truncateRow = (row: SheetRow, budget: number): string => {
  const limit = budget - 1 - TRUNCATED_SUFFIX.length
  let text = ''

  for (const [index, rawCell] of row.entries()) {
    const cell = collapseWhitespace(rawCell)
    const piece = index === 0 ? cell : `${CELL_SEPARATOR}${cell}`
    if (text.length + piece.length > limit) {
      if (index === 0) {
        text = piece.slice(0, limit)
      }
      break
    }
    text += piece
  }

  return `${text}${TRUNCATED_SUFFIX}\n`
}

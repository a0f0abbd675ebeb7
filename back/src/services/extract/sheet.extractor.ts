import * as XLSX from 'xlsx'
import { SpreadsheetFormat } from '../../domain/enums.js'
import type { DecodedSheet, SheetRow } from '../../domain/types.js'
import { collapseWhitespace, fileExtension, stripExtension } from './normalize.js'

export type SheetDecodeResult =
  | { ok: true; format: SpreadsheetFormat; sheets: DecodedSheet[] }
  | { ok: false; reason: string }

const FORMAT_BY_EXTENSION: Record<string, SpreadsheetFormat> = {
  '.xlsx': SpreadsheetFormat.XLSX,
  '.xlsm': SpreadsheetFormat.XLSX,
  '.xls': SpreadsheetFormat.XLS,
  '.csv': SpreadsheetFormat.CSV
}

// Zip container for OOXML, compound file for legacy workbooks.
const SIGNATURES: Partial<Record<SpreadsheetFormat, number[]>> = {
  [SpreadsheetFormat.XLSX]: [0x50, 0x4b, 0x03, 0x04],
  [SpreadsheetFormat.XLS]: [0xd0, 0xcf, 0x11, 0xe0]
}

export class SheetExtractor {
  async decode(content: Buffer, fileName: string): Promise<SheetDecodeResult> {
    const extension = fileExtension(fileName)
    const format = FORMAT_BY_EXTENSION[extension]
    if (!format) {
      return { ok: false, reason: `unsupported file type: ${extension || '(none)'}` }
    }

    const signature = SIGNATURES[format]
    if (signature && !signature.every((byte, index) => content[index] === byte)) {
      return { ok: false, reason: `failed to decode spreadsheet: content is not a ${extension} workbook` }
    }

    try {
      const workbook =
        format === SpreadsheetFormat.CSV
          ? XLSX.read(content.toString('utf8'), { type: 'string', raw: true })
          : XLSX.read(content, { type: 'buffer', cellDates: true })
      const sheets = workbook.SheetNames.map((name) => ({
        // CSV input carries no sheet name of its own.
        name: format === SpreadsheetFormat.CSV ? stripExtension(fileName) : name,
        rows: readRows(workbook.Sheets[name])
      }))

      if (sheets.length === 0) {
        return { ok: false, reason: 'workbook has no sheets' }
      }
      return { ok: true, format, sheets }
    } catch (error) {
      return {
        ok: false,
        reason: `failed to decode spreadsheet: ${error instanceof Error ? error.message : 'unknown'}`
      }
    }
  }
}

const readRows = (worksheet: XLSX.WorkSheet | undefined): SheetRow[] => {
  if (!worksheet) return []
  const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw: true,
    defval: '',
    blankrows: true
  })
  return rows.map((row) => row.map((cell) => cellToText(cell)))
}

export const cellToText = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return collapseWhitespace(value)
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (value instanceof Date) return formatDate(value)
  return ''
}

const formatDate = (date: Date): string => {
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${date.getFullYear()}-${month}-${day}`
}

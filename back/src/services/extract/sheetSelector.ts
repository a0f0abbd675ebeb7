import type { DecodedSheet, SelectedSheet, SheetRow } from '../../domain/types.js'
import { normalizeLabel } from './normalize.js'

export { selectSheet, scoreSheet, findHeaderRow }
export type { SheetSelection, SheetScore }

type SheetScore = {
  sheetName: string
  nameScore: number
  headerScore: number
  total: number
}

type SheetSelection =
  | { ok: true; sheet: SelectedSheet; score: SheetScore }
  | { ok: false; reason: string; scores: SheetScore[] }

const EXACT_NAME_SCORE = 60
const PARTIAL_NAME_SCORE = 45
const HEADER_BONUS = 30
const HEADER_SCAN_ROWS = 5

const SHEET_NAME_SYNONYMS = [
  'comps',
  'competitors',
  'competition',
  'comparable companies',
  'comparables',
  'peers',
  'peer group',
  'competitive landscape'
]

const COMPS_PATTERN = /(equity|trading|public).*comps|comps/
const COMPANY_HEADER_PATTERN =
  /\b(company|companies|competitors?|peers?|comparables?|target|acquirer|issuer|name)\b/

const selectSheet = (
  fileId: string,
  sheets: DecodedSheet[],
  minScore: number
): SheetSelection => {
  const scores = sheets.map((sheet) => scoreSheet(sheet))

  let bestIndex = -1
  for (let index = 0; index < scores.length; index += 1) {
    const candidate = scores[index]
    if (!candidate || candidate.total < minScore) continue
    const best = bestIndex >= 0 ? scores[bestIndex] : undefined
    if (!best || candidate.total > best.total) {
      bestIndex = index
    }
  }

  const chosen = sheets[bestIndex]
  const chosenScore = scores[bestIndex]
  if (!chosen || !chosenScore) {
    return {
      ok: false,
      reason: `no sheet matched a competitor list (checked: ${sheets.map((sheet) => sheet.name).join(', ') || 'none'})`,
      scores
    }
  }

  return {
    ok: true,
    sheet: { fileId, sheetName: chosen.name, rows: chosen.rows },
    score: chosenScore
  }
}

const scoreSheet = (sheet: DecodedSheet): SheetScore => {
  const nameScore = scoreSheetName(sheet.name)
  const header = findHeaderRow(sheet.rows)
  const headerScore =
    header && header.some((cell) => COMPANY_HEADER_PATTERN.test(normalizeLabel(cell)))
      ? HEADER_BONUS
      : 0

  return {
    sheetName: sheet.name,
    nameScore,
    headerScore,
    total: nameScore + headerScore
  }
}

const scoreSheetName = (name: string): number => {
  const label = normalizeLabel(name)
  if (SHEET_NAME_SYNONYMS.includes(label)) return EXACT_NAME_SCORE

  const words = ` ${label} `
  if (
    COMPS_PATTERN.test(label) ||
    SHEET_NAME_SYNONYMS.some((synonym) => words.includes(` ${synonym} `))
  ) {
    return PARTIAL_NAME_SCORE
  }
  return 0
}

// First non-empty row within the top of the sheet.
const findHeaderRow = (rows: SheetRow[]): SheetRow | undefined =>
  rows
    .slice(0, HEADER_SCAN_ROWS)
    .find((row) => row.some((cell) => cell.trim().length > 0))

import { describe, expect, it } from 'vitest'
import {
  dedupeReferences,
  extractFileReferences,
  toDisplayName,
  toRelativePath
} from '../src/services/files/references.js'

const SHAREPOINT_PATH = 'https://example.sharepoint.com/sites/deal/Shared Documents/Comps/peers.xlsx'

describe('extractFileReferences', () => {
  it('collects unique spreadsheet paths from free text', () => {
    const text = [
      `1. Peer set. Full Path: ${SHAREPOINT_PATH}`,
      '2. Precedents. Full Path: /data/precedents.csv',
      `3. Duplicate. Full Path: ${SHAREPOINT_PATH}`,
      '4. Memo. Full Path: /data/memo.docx'
    ].join('\n')

    expect(extractFileReferences(text)).toEqual([SHAREPOINT_PATH, '/data/precedents.csv'])
  })

  it('returns nothing for text without paths', () => {
    expect(extractFileReferences('No files were found.')).toEqual([])
  })
})

describe('dedupeReferences', () => {
  it('trims, drops blanks and keeps first-seen order', () => {
    expect(dedupeReferences([' b.csv', 'a.xlsx', '', 'b.csv ', '  '])).toEqual(['b.csv', 'a.xlsx'])
  })
})

describe('toRelativePath', () => {
  it('strips everything up to the document library', () => {
    expect(toRelativePath(SHAREPOINT_PATH)).toBe('Comps/peers.xlsx')
    expect(toDisplayName(SHAREPOINT_PATH)).toBe('Comps/peers.xlsx')
  })

  it('leaves other paths untouched', () => {
    expect(toRelativePath('deals/a.xlsx')).toBe('deals/a.xlsx')
  })
})

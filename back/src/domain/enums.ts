export const FailureKind = {
  FILE_RESOLUTION: 'FILE_RESOLUTION',
  NO_MATCHING_SHEET: 'NO_MATCHING_SHEET'
} as const

export type FailureKind = (typeof FailureKind)[keyof typeof FailureKind]

export const SpreadsheetFormat = {
  XLSX: 'XLSX',
  XLS: 'XLS',
  CSV: 'CSV'
} as const

export type SpreadsheetFormat = (typeof SpreadsheetFormat)[keyof typeof SpreadsheetFormat]

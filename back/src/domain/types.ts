import type { FailureKind } from './enums.js'

export type AnalysisRequest = {
  targetCompany: string
  fileReferences: string[]
}

export type FileReference = {
  id: string
  displayName: string
  content: Buffer
  version: string
}

export type FileResolution =
  | { ok: true; file: FileReference }
  | { ok: false; reference: string; displayName: string; reason: string }

export type SheetRow = string[]

export type DecodedSheet = {
  name: string
  rows: SheetRow[]
}

export type SelectedSheet = {
  fileId: string
  sheetName: string
  rows: SheetRow[]
}

export type RowRange = {
  start: number
  end: number
}

export type Chunk = {
  fileId: string
  sheetName: string
  index: number
  rows: RowRange
  text: string
  size: number
  truncated: boolean
}

export type Candidate = {
  raw: string
  fileId: string
  chunkIndex: number
}

export type MergedCandidate = {
  name: string
  key: string
  sourceFileIds: string[]
  occurrences: number
}

export type ClassifiedCompany = {
  name: string
  score: number
  reason: string
}

export type FailedFile = {
  file: string
  reason: string
  kind: FailureKind
}

export type AnalysisResult = {
  readonly targetCompany: string
  readonly verifiedCompetitors: readonly ClassifiedCompany[]
  readonly toCrosscheck: readonly ClassifiedCompany[]
  readonly verifiedCount: number
  readonly crosscheckCount: number
  readonly reasoning: string
  readonly filesProcessed: number
  readonly totalFilesFound: number
  readonly failedFiles: readonly FailedFile[]
  readonly cached: boolean
  readonly warnings?: readonly string[]
  readonly generatedAt: string
}

export type CacheEntry<T> = {
  key: string
  value: T
  createdAt: number
  expiresAt: number
}

export type CacheStats = {
  entryCount: number
  hitCount: number
  missCount: number
}

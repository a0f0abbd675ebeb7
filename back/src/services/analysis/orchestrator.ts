import pLimit from 'p-limit'
import { FailureKind } from '../../domain/enums.js'
import type {
  AnalysisRequest,
  AnalysisResult,
  CacheStats,
  Chunk,
  ClassifiedCompany,
  FailedFile,
  FileResolution,
  MergedCandidate
} from '../../domain/types.js'
import { AppError, ErrorCodes } from '../../utils/errors.js'
import { FingerprintCache } from '../cache/fingerprintCache.js'
import { computeFingerprint } from '../cache/fingerprint.js'
import { chunkSheet } from '../extract/chunker.js'
import { SheetExtractor } from '../extract/sheet.extractor.js'
import { selectSheet } from '../extract/sheetSelector.js'
import { dedupeReferences } from '../files/references.js'
import { runPrompt as defaultRunPrompt } from '../llm/vertex.client.js'
import type { PromptRunner } from '../llm/vertex.client.js'
import { StorageService } from '../storage.service.js'
import type { FileResolver } from '../storage.service.js'
import { classifyCandidates } from './classifier.js'
import { resolveAnalysisConfig } from './config.js'
import type { AnalysisConfig } from './config.js'
import { extractChunkCandidates } from './extraction.js'
import { mergeCandidates, remergeCandidates } from './merger.js'

type OrchestratorDependencies = {
  resolver?: FileResolver
  sheetExtractor?: SheetExtractor
  cache?: FingerprintCache<AnalysisResult>
  runPrompt?: PromptRunner
  config?: Partial<AnalysisConfig>
}

type AnalyzeOptions = {
  signal?: AbortSignal
  requestId?: string
}

type CacheDescription = CacheStats & {
  maxEntries: number
  ttlMs: number
  keys: string[]
}

type Limiter = ReturnType<typeof pLimit>

type PreparedFile =
  | { ok: true; fileId: string; displayName: string; chunks: Chunk[] }
  | { ok: false; failure: FailedFile }

type ProcessedFile = {
  fileId: string
  displayName: string
  candidates: MergedCandidate[]
  chunkCount: number
  failedChunkCount: number
  truncatedChunkCount: number
}

type FileOutcome = { ok: true; file: ProcessedFile } | { ok: false; failure: FailedFile }

const UNRESOLVED_VERSION = 'unresolved'
const MAX_UNSCORED_NAMES_IN_REASONING = 20

export class AnalysisOrchestrator {
  private readonly resolver: FileResolver
  private readonly sheetExtractor: SheetExtractor
  private readonly cache: FingerprintCache<AnalysisResult>
  private readonly runPrompt: PromptRunner
  private readonly config: AnalysisConfig

  constructor(dependencies: OrchestratorDependencies = {}) {
    this.resolver = dependencies.resolver ?? new StorageService()
    this.sheetExtractor = dependencies.sheetExtractor ?? new SheetExtractor()
    this.cache = dependencies.cache ?? new FingerprintCache<AnalysisResult>()
    this.runPrompt = dependencies.runPrompt ?? defaultRunPrompt
    this.config = resolveAnalysisConfig(dependencies.config)
  }

  async analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const targetCompany = request.targetCompany.trim()
    if (targetCompany.length === 0) {
      throw new AppError(ErrorCodes.INVALID_INPUT, 'target_company is required', 400)
    }

    const references = dedupeReferences(request.fileReferences)
    if (references.length === 0) {
      return buildResult({
        targetCompany,
        verified: [],
        toCrosscheck: [],
        reasoning: 'No file references were supplied.',
        filesProcessed: 0,
        totalFilesFound: 0,
        failedFiles: [],
        warnings: []
      })
    }

    const limit = pLimit(this.config.concurrency)
    const resolutions = await Promise.all(
      references.map((reference) => limit(() => this.resolver.resolve(reference)))
    )
    const key = computeFingerprint(
      targetCompany,
      resolutions.map((resolution) =>
        resolution.ok
          ? { id: resolution.file.id, version: resolution.file.version }
          : { id: resolution.reference, version: UNRESOLVED_VERSION }
      )
    )

    const { value, cached } = await this.cache.getOrCompute(key, () =>
      this.compute(targetCompany, resolutions, key)
    )

    if (options.signal?.aborted) {
      console.warn(
        JSON.stringify({
          event: 'analysis_result_discarded',
          requestId: options.requestId,
          key
        })
      )
      throw new AppError(ErrorCodes.REQUEST_ABORTED, 'request was aborted by the caller', 408)
    }

    return cached ? Object.freeze({ ...value, cached: true }) : value
  }

  cacheStats(): CacheStats {
    return this.cache.stats()
  }

  describeCache(): CacheDescription {
    return {
      ...this.cache.stats(),
      maxEntries: this.cache.maxEntries,
      ttlMs: this.cache.ttlMs,
      keys: this.cache.keys()
    }
  }

  private async compute(
    targetCompany: string,
    resolutions: FileResolution[],
    key: string
  ): Promise<AnalysisResult> {
    const startedAt = Date.now()
    const limit = pLimit(this.config.concurrency)

    const outcomes = await Promise.all(
      resolutions.map((resolution) => this.processFile(targetCompany, resolution, limit))
    )

    const failedFiles: FailedFile[] = []
    const processed: ProcessedFile[] = []
    for (const outcome of outcomes) {
      if (outcome.ok) {
        processed.push(outcome.file)
      } else {
        failedFiles.push(outcome.failure)
      }
    }

    if (processed.length === 0) {
      throw new AppError(ErrorCodes.NO_USABLE_FILES, 'none of the supplied files could be processed', 422, {
        failedFiles
      })
    }

    const warnings = collectWarnings(processed)
    const merged = remergeCandidates(
      processed.map((file) => file.candidates),
      this.config.maxCandidates
    )

    const base = {
      targetCompany,
      filesProcessed: processed.length,
      totalFilesFound: resolutions.length,
      failedFiles,
      warnings
    }

    if (merged.candidates.length === 0) {
      const chunkCount = sum(processed.map((file) => file.chunkCount))
      const failedChunkCount = sum(processed.map((file) => file.failedChunkCount))
      if (chunkCount > 0 && failedChunkCount === chunkCount) {
        throw new AppError(ErrorCodes.EXTRACTION_FAILED, 'no chunk of the supplied files could be extracted', 502, {
          chunkCount,
          warnings
        })
      }
      console.info(JSON.stringify({ event: 'analysis_no_candidates', key }))
      return buildResult({
        ...base,
        verified: [],
        toCrosscheck: [],
        reasoning: 'No company candidates were extracted from the supplied files.'
      })
    }

    const classification = await classifyCandidates(
      {
        targetCompany,
        candidates: merged.candidates,
        verifiedThreshold: this.config.verifiedThreshold
      },
      { runPrompt: this.runPrompt, promptOptions: this.config.prompt }
    )

    const notes = [classification.reasoning.trim()]
    if (merged.droppedCount > 0) {
      notes.push(
        `Candidate list was capped at ${this.config.maxCandidates}; ${merged.droppedCount} less frequent candidates were not classified.`
      )
    }
    if (classification.unscored.length > 0) {
      notes.push(describeUnscored(classification.unscored))
    }

    console.info(
      JSON.stringify({
        event: 'analysis_completed',
        key,
        filesProcessed: processed.length,
        failedFiles: failedFiles.length,
        candidateCount: merged.candidates.length,
        verifiedCount: classification.verified.length,
        crosscheckCount: classification.toCrosscheck.length,
        durationMs: Date.now() - startedAt
      })
    )

    return buildResult({
      ...base,
      verified: classification.verified,
      toCrosscheck: classification.toCrosscheck,
      reasoning: notes.filter((note) => note.length > 0).join(' ')
    })
  }

  private async processFile(
    targetCompany: string,
    resolution: FileResolution,
    limit: Limiter
  ): Promise<FileOutcome> {
    const prepared = await limit(() => this.prepareFile(resolution))
    if (!prepared.ok) {
      console.warn(JSON.stringify({ event: 'file_failed', ...prepared.failure }))
      return prepared
    }

    const chunkCount = prepared.chunks.length
    const extractions = await Promise.all(
      prepared.chunks.map((chunk) =>
        limit(() =>
          extractChunkCandidates(
            { chunk, chunkCount, targetCompany },
            { runPrompt: this.runPrompt, promptOptions: this.config.prompt }
          )
        )
      )
    )

    return {
      ok: true,
      file: {
        fileId: prepared.fileId,
        displayName: prepared.displayName,
        // Per-file merge is uncapped; the cap applies once across files.
        candidates: mergeCandidates(
          extractions.flatMap((extraction) => extraction.candidates),
          Number.POSITIVE_INFINITY
        ).candidates,
        chunkCount,
        failedChunkCount: extractions.filter((extraction) => !extraction.ok).length,
        truncatedChunkCount: prepared.chunks.filter((chunk) => chunk.truncated).length
      }
    }
  }

  private async prepareFile(resolution: FileResolution): Promise<PreparedFile> {
    if (!resolution.ok) {
      return {
        ok: false,
        failure: {
          file: resolution.displayName,
          reason: resolution.reason,
          kind: FailureKind.FILE_RESOLUTION
        }
      }
    }

    const { file } = resolution
    const decoded = await this.sheetExtractor.decode(file.content, file.displayName)
    if (!decoded.ok) {
      return {
        ok: false,
        failure: { file: file.displayName, reason: decoded.reason, kind: FailureKind.NO_MATCHING_SHEET }
      }
    }

    const selection = selectSheet(file.id, decoded.sheets, this.config.minSheetScore)
    if (!selection.ok) {
      return {
        ok: false,
        failure: { file: file.displayName, reason: selection.reason, kind: FailureKind.NO_MATCHING_SHEET }
      }
    }

    const chunks = chunkSheet(selection.sheet, this.config.chunkBudgetChars)
    console.info(
      JSON.stringify({
        event: 'sheet_selected',
        fileId: file.id,
        sheetName: selection.sheet.sheetName,
        score: selection.score.total,
        rowCount: selection.sheet.rows.length,
        chunkCount: chunks.length
      })
    )

    return { ok: true, fileId: file.id, displayName: file.displayName, chunks }
  }
}

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0)

const collectWarnings = (processed: ProcessedFile[]): string[] => {
  const warnings: string[] = []
  for (const file of processed) {
    if (file.failedChunkCount > 0) {
      warnings.push(
        `${file.displayName}: ${file.failedChunkCount} of ${file.chunkCount} chunks could not be extracted`
      )
    }
    if (file.truncatedChunkCount > 0) {
      warnings.push(`${file.displayName}: ${file.truncatedChunkCount} oversized rows were truncated`)
    }
  }
  return warnings
}

const describeUnscored = (names: string[]): string => {
  const shown = names.slice(0, MAX_UNSCORED_NAMES_IN_REASONING).join(', ')
  const more = names.length > MAX_UNSCORED_NAMES_IN_REASONING ? ', ...' : ''
  return `${names.length} candidates were not scored by the classifier: ${shown}${more}.`
}

const buildResult = (input: {
  targetCompany: string
  verified: ClassifiedCompany[]
  toCrosscheck: ClassifiedCompany[]
  reasoning: string
  filesProcessed: number
  totalFilesFound: number
  failedFiles: FailedFile[]
  warnings: string[]
}): AnalysisResult =>
  Object.freeze({
    targetCompany: input.targetCompany,
    verifiedCompetitors: Object.freeze([...input.verified]),
    toCrosscheck: Object.freeze([...input.toCrosscheck]),
    verifiedCount: input.verified.length,
    crosscheckCount: input.toCrosscheck.length,
    reasoning: input.reasoning,
    filesProcessed: input.filesProcessed,
    totalFilesFound: input.totalFilesFound,
    failedFiles: Object.freeze([...input.failedFiles]),
    cached: false,
    ...(input.warnings.length > 0 ? { warnings: Object.freeze([...input.warnings]) } : {}),
    generatedAt: new Date().toISOString()
  })

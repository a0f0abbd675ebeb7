import type { Candidate, Chunk } from '../../domain/types.js'
import { extractionOutputSchema } from '../llm/jsonSchemas.js'
import { buildExtractionPrompt } from '../llm/prompts.js'
import { isLlmError } from '../llm/vertex.client.js'
import type { LlmErrorKind, PromptRunner, RunPromptOptions } from '../llm/vertex.client.js'
import { toErrorMessage } from '../../utils/errors.js'

export { extractChunkCandidates }
export type { ChunkExtractionInput, ChunkExtractionDeps, ChunkExtraction }

type ChunkExtractionInput = {
  chunk: Chunk
  chunkCount: number
  targetCompany: string
}

type ChunkExtractionDeps = {
  runPrompt: PromptRunner
  promptOptions?: RunPromptOptions
}

type ChunkExtraction =
  | { ok: true; candidates: Candidate[] }
  | { ok: false; candidates: Candidate[]; kind: LlmErrorKind; reason: string }

const extractChunkCandidates = async (
  input: ChunkExtractionInput,
  deps: ChunkExtractionDeps
): Promise<ChunkExtraction> => {
  const { chunk } = input
  const prompt = buildExtractionPrompt({
    targetCompany: input.targetCompany,
    sheetName: chunk.sheetName,
    chunkText: chunk.text,
    chunkIndex: chunk.index,
    chunkCount: input.chunkCount
  })
  const startedAt = Date.now()

  try {
    const output = await deps.runPrompt(prompt, extractionOutputSchema, deps.promptOptions)
    const candidates = output.companies
      .filter((name) => name.trim().length > 0)
      .map((raw) => ({ raw, fileId: chunk.fileId, chunkIndex: chunk.index }))

    console.info(
      JSON.stringify({
        event: 'llm_extraction_call',
        outcome: 'success',
        fileId: chunk.fileId,
        sheetName: chunk.sheetName,
        chunkIndex: chunk.index,
        rowStart: chunk.rows.start,
        rowEnd: chunk.rows.end,
        size: chunk.size,
        latencyMs: Date.now() - startedAt,
        candidateCount: candidates.length
      })
    )
    return { ok: true, candidates }
  } catch (error) {
    const kind: LlmErrorKind = isLlmError(error) ? error.kind : 'UPSTREAM'
    const reason = toErrorMessage(error)
    console.warn(
      JSON.stringify({
        event: 'llm_extraction_call',
        outcome: 'failed',
        fileId: chunk.fileId,
        sheetName: chunk.sheetName,
        chunkIndex: chunk.index,
        rowStart: chunk.rows.start,
        rowEnd: chunk.rows.end,
        size: chunk.size,
        latencyMs: Date.now() - startedAt,
        kind,
        reason
      })
    )
    return { ok: false, candidates: [], kind, reason }
  }
}

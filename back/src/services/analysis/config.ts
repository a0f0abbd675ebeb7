import { MIN_CHUNK_BUDGET } from '../extract/chunker.js'
import type { RunPromptOptions } from '../llm/vertex.client.js'

export { resolveAnalysisConfig, defaultChunkBudget }
export type { AnalysisConfig }

type AnalysisConfig = {
  chunkBudgetChars: number
  concurrency: number
  verifiedThreshold: number
  maxCandidates: number
  minSheetScore: number
  prompt: RunPromptOptions
}

const CONTEXT_UTILIZATION = 0.8

const ENV_CONTEXT_TOKENS = Number(process.env.LLM_CONTEXT_TOKENS ?? 1000000)
const ENV_CHARS_PER_TOKEN = Number(process.env.LLM_CHARS_PER_TOKEN ?? 4)
const ENV_CHUNK_BUDGET_CHARS = Number(process.env.CHUNK_BUDGET_CHARS ?? Number.NaN)
const ENV_CONCURRENCY = Number(process.env.ANALYSIS_CONCURRENCY ?? 4)
const ENV_VERIFIED_THRESHOLD = Number(process.env.VERIFIED_SCORE_THRESHOLD ?? 70)
const ENV_MAX_CANDIDATES = Number(process.env.MAX_CLASSIFICATION_CANDIDATES ?? 2000)
const ENV_MIN_SHEET_SCORE = Number(process.env.MIN_SHEET_SCORE ?? 30)

// 80% of the model's context window, in characters.
const defaultChunkBudget = (
  contextTokens = sanitizePositive(ENV_CONTEXT_TOKENS, 1000000),
  charsPerToken = sanitizePositive(ENV_CHARS_PER_TOKEN, 4)
): number => Math.floor(contextTokens * charsPerToken * CONTEXT_UTILIZATION)

const resolveAnalysisConfig = (overrides: Partial<AnalysisConfig> = {}): AnalysisConfig => ({
  chunkBudgetChars: Math.max(
    MIN_CHUNK_BUDGET,
    sanitizePositive(
      overrides.chunkBudgetChars,
      sanitizePositive(ENV_CHUNK_BUDGET_CHARS, defaultChunkBudget())
    )
  ),
  concurrency: sanitizePositive(overrides.concurrency, sanitizePositive(ENV_CONCURRENCY, 4)),
  verifiedThreshold: sanitizeScore(
    overrides.verifiedThreshold,
    sanitizeScore(ENV_VERIFIED_THRESHOLD, 70)
  ),
  maxCandidates: sanitizePositive(
    overrides.maxCandidates,
    sanitizePositive(ENV_MAX_CANDIDATES, 2000)
  ),
  minSheetScore: sanitizeScore(overrides.minSheetScore, sanitizeScore(ENV_MIN_SHEET_SCORE, 30)),
  prompt: overrides.prompt ?? {}
})

const sanitizePositive = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value)) return fallback
  const normalized = Math.floor(value)
  return normalized > 0 ? normalized : fallback
}

const sanitizeScore = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value)) return fallback
  return Math.min(Math.max(Math.round(value), 0), 100)
}

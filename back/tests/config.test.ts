import { describe, expect, it } from 'vitest'
import { defaultChunkBudget, resolveAnalysisConfig } from '../src/services/analysis/config.js'
import { MIN_CHUNK_BUDGET } from '../src/services/extract/chunker.js'

describe('resolveAnalysisConfig', () => {
  it('raises a chunk budget below the chunker minimum', () => {
    expect(resolveAnalysisConfig({ chunkBudgetChars: 10 }).chunkBudgetChars).toBe(MIN_CHUNK_BUDGET)
  })

  it('keeps a valid chunk budget', () => {
    expect(resolveAnalysisConfig({ chunkBudgetChars: 500 }).chunkBudgetChars).toBe(500)
  })

  it('falls back for non-positive overrides', () => {
    const config = resolveAnalysisConfig({ concurrency: 0, maxCandidates: -5, verifiedThreshold: 140 })

    expect(config.concurrency).toBe(4)
    expect(config.maxCandidates).toBe(2000)
    expect(config.verifiedThreshold).toBe(100)
  })

  it('uses 80% of the context window by default', () => {
    expect(defaultChunkBudget(1000, 4)).toBe(3200)
  })
})

import type { ClassifiedCompany, MergedCandidate } from '../../domain/types.js'
import { classificationOutputSchema } from '../llm/jsonSchemas.js'
import type { ClassificationOutput } from '../llm/jsonSchemas.js'
import { buildClassificationPrompt } from '../llm/prompts.js'
import { isLlmError } from '../llm/vertex.client.js'
import type { PromptRunner, RunPromptOptions } from '../llm/vertex.client.js'
import { AppError, ErrorCodes, toErrorMessage } from '../../utils/errors.js'
import { normalizeCompanyKey } from './merger.js'
import { bucketByScore } from './scoring.js'
import type { ScoredCandidate } from './scoring.js'

export { classifyCandidates }
export type { ClassificationInput, ClassificationDeps, Classification }

type ClassificationInput = {
  targetCompany: string
  candidates: MergedCandidate[]
  verifiedThreshold: number
}

type ClassificationDeps = {
  runPrompt: PromptRunner
  promptOptions?: RunPromptOptions
}

type Classification = {
  verified: ClassifiedCompany[]
  toCrosscheck: ClassifiedCompany[]
  reasoning: string
  unscored: string[]
}

const classifyCandidates = async (
  input: ClassificationInput,
  deps: ClassificationDeps
): Promise<Classification> => {
  const prompt = buildClassificationPrompt({
    targetCompany: input.targetCompany,
    candidateNames: input.candidates.map((candidate) => candidate.name),
    verifiedThreshold: input.verifiedThreshold
  })
  const startedAt = Date.now()

  let output: ClassificationOutput
  try {
    output = await deps.runPrompt(prompt, classificationOutputSchema, deps.promptOptions)
  } catch (error) {
    const kind = isLlmError(error) ? error.kind : 'UPSTREAM'
    console.warn(
      JSON.stringify({
        event: 'llm_classification_failed',
        candidateCount: input.candidates.length,
        latencyMs: Date.now() - startedAt,
        kind,
        reason: toErrorMessage(error)
      })
    )
    throw new AppError(ErrorCodes.CLASSIFICATION_FAILED, 'competitor classification failed', 502, {
      kind,
      reason: toErrorMessage(error)
    })
  }

  const orderByKey = new Map(
    input.candidates.map((candidate, order) => [candidate.key, { candidate, order }])
  )
  const scored: ScoredCandidate[] = []
  const seen = new Set<string>()
  let ignoredCount = 0

  for (const item of [...output.verifiedCompetitors, ...output.toCrosscheck]) {
    const key = normalizeCompanyKey(item.name)
    const match = orderByKey.get(key)
    if (!match) {
      ignoredCount += 1
      continue
    }
    if (seen.has(key)) continue
    seen.add(key)
    scored.push({
      name: match.candidate.name,
      score: item.score,
      reason: item.reason,
      order: match.order
    })
  }

  const unscored = input.candidates
    .filter((candidate) => !seen.has(candidate.key))
    .map((candidate) => candidate.name)
  const buckets = bucketByScore(scored, input.verifiedThreshold)

  console.info(
    JSON.stringify({
      event: 'llm_classification_success',
      candidateCount: input.candidates.length,
      scoredCount: scored.length,
      unscoredCount: unscored.length,
      ignoredCount,
      latencyMs: Date.now() - startedAt
    })
  )

  return {
    verified: buckets.verified,
    toCrosscheck: buckets.toCrosscheck,
    reasoning: output.reasoning,
    unscored
  }
}

import type { Hono } from 'hono'
import type { AnalyzeRequest, AnalyzeResponse } from 'shared'
import type { AnalysisResult } from '../../domain/types.js'
import type { AnalysisOrchestrator } from '../../services/analysis/orchestrator.js'
import { dedupeReferences, extractFileReferences } from '../../services/files/references.js'
import { buildError, isAppError, toErrorMessage, toErrorResponse } from '../../utils/errors.js'
import { makeId } from '../../utils/ids.js'
import type { RateLimiter } from '../../utils/rateLimit.js'
import { resolveClientKey } from '../../utils/security.js'

export const registerAnalyzeRoutes = (
  app: Hono,
  deps: { orchestrator: AnalysisOrchestrator; rateLimiter: RateLimiter }
) => {
  app.post('/analyze', async (c) => {
    const requestId = makeId('req')

    try {
      deps.rateLimiter.check(resolveClientKey(c.req))
    } catch (error) {
      const { status, payload } = toErrorResponse(error)
      return c.json(payload, status)
    }

    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json(buildError('INVALID_INPUT', 'request body must be JSON'), 400)
    }

    const parsed = parseAnalyzeRequest(body)
    if (!parsed.ok) {
      return c.json(buildError('INVALID_INPUT', parsed.message), 400)
    }

    const fileReferences = dedupeReferences([
      ...(parsed.value.file_references ?? []),
      ...extractFileReferences(parsed.value.copilot_response ?? '')
    ])

    console.info(
      JSON.stringify({
        event: 'analyze_request_received',
        requestId,
        targetCompany: parsed.value.target_company,
        fileCount: fileReferences.length
      })
    )

    try {
      const result = await deps.orchestrator.analyze(
        { targetCompany: parsed.value.target_company, fileReferences },
        { signal: c.req.raw.signal, requestId }
      )
      return c.json(toAnalyzeResponse(result), 200)
    } catch (error) {
      if (!isAppError(error)) {
        console.error(
          JSON.stringify({
            event: 'analyze_request_failed',
            requestId,
            reason: toErrorMessage(error)
          })
        )
      }
      const { status, payload } = toErrorResponse(error, 'analysis failed')
      return c.json(payload, status)
    }
  })
}

const parseAnalyzeRequest = (
  value: unknown
): { ok: true; value: AnalyzeRequest } | { ok: false; message: string } => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, message: 'request body must be an object' }
  }

  const record = value as Record<string, unknown>
  const targetCompany = record.target_company
  const fileReferences = record.file_references
  const copilotResponse = record.copilot_response

  if (typeof targetCompany !== 'string' || targetCompany.trim().length === 0) {
    return { ok: false, message: 'target_company is required' }
  }

  if (
    fileReferences !== undefined &&
    (!Array.isArray(fileReferences) || fileReferences.some((item) => typeof item !== 'string'))
  ) {
    return { ok: false, message: 'file_references must be an array of strings' }
  }

  if (copilotResponse !== undefined && typeof copilotResponse !== 'string') {
    return { ok: false, message: 'copilot_response must be a string' }
  }

  return {
    ok: true,
    value: {
      target_company: targetCompany.trim(),
      ...(fileReferences !== undefined
        ? { file_references: fileReferences.filter((item): item is string => typeof item === 'string') }
        : {}),
      ...(copilotResponse !== undefined ? { copilot_response: copilotResponse } : {})
    }
  }
}

export const toAnalyzeResponse = (result: AnalysisResult): AnalyzeResponse => ({
  target_company: result.targetCompany,
  verified_competitors: result.verifiedCompetitors.map((company) => ({ ...company })),
  to_crosscheck: result.toCrosscheck.map((company) => ({ ...company })),
  verified_count: result.verifiedCount,
  crosscheck_count: result.crosscheckCount,
  reasoning: result.reasoning,
  files_processed: result.filesProcessed,
  total_files_found: result.totalFilesFound,
  failed_files: result.failedFiles.map((failure) => ({ ...failure })),
  cached: result.cached,
  ...(result.warnings ? { warnings: [...result.warnings] } : {}),
  generated_at: result.generatedAt
})

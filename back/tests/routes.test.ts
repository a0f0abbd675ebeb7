import { describe, expect, it } from 'vitest'
import type { AnalysisResult } from '../src/domain/types.js'
import { AnalysisOrchestrator } from '../src/services/analysis/orchestrator.js'
import { FingerprintCache } from '../src/services/cache/fingerprintCache.js'
import { createApp } from '../src/server.js'
import { createFixedWindowRateLimiter, createNoopRateLimiter } from '../src/utils/rateLimit.js'
import type { RateLimiter } from '../src/utils/rateLimit.js'
import { MemoryResolver, createFakeModel } from './helpers/fakes.js'

const LIBRARY_PATH = 'https://example.sharepoint.com/sites/deal/Shared Documents/Comps/peers.csv'

const setup = (rateLimiter: RateLimiter = createNoopRateLimiter()) => {
  const model = createFakeModel({ scores: { PepsiCo: 92, 'Nestlé': 35 }, reasoning: 'Soft drinks.' })
  const orchestrator = new AnalysisOrchestrator({
    resolver: new MemoryResolver({ [LIBRARY_PATH]: 'Company,Ticker\nPepsiCo,PEP\nNestlé,NESN' }),
    cache: new FingerprintCache<AnalysisResult>({ maxEntries: 100, ttlMs: 48 * 60 * 60 * 1000 }),
    runPrompt: model.runPrompt,
    config: { chunkBudgetChars: 10000 }
  })
  return { app: createApp({ orchestrator, rateLimiter }), model }
}

const postAnalyze = (app: ReturnType<typeof createApp>, body: string) =>
  app.request('/v1/analyze', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body
  })

describe('routes', () => {
  it('reports service status', async () => {
    const { app } = setup()

    const root = await app.request('/')
    const health = await app.request('/v1/health')

    expect(await root.json()).toEqual({ status: 'online', service: 'Competitor Analysis API' })
    expect(health.status).toBe(200)
    expect(await health.text()).toBe('ok')
  })

  it('analyzes files referenced in a copilot response', async () => {
    const { app, model } = setup()

    const response = await postAnalyze(
      app,
      JSON.stringify({
        target_company: 'Coca Cola',
        copilot_response: `Found one model. Full Path: ${LIBRARY_PATH}`
      })
    )
    const body: unknown = await response.json()

    expect(response.status).toBe(200)
    expect(body).toMatchObject({
      target_company: 'Coca Cola',
      verified_competitors: [{ name: 'PepsiCo', score: 92, reason: 'scored PepsiCo' }],
      to_crosscheck: [{ name: 'Nestlé', score: 35, reason: 'scored Nestlé' }],
      verified_count: 1,
      crosscheck_count: 1,
      reasoning: 'Soft drinks.',
      files_processed: 1,
      total_files_found: 1,
      failed_files: [],
      cached: false
    })
    expect(model.state.classificationCalls).toBe(1)

    const stats = await app.request('/v1/cache/stats')
    expect(await stats.json()).toMatchObject({
      entry_count: 1,
      hit_count: 0,
      miss_count: 1,
      max_entries: 100,
      ttl_hours: 48
    })
  })

  it('merges explicit references with ones found in the copilot response', async () => {
    const { app } = setup()

    const response = await postAnalyze(
      app,
      JSON.stringify({
        target_company: 'Coca Cola',
        file_references: ['deals/missing.xlsx', LIBRARY_PATH],
        copilot_response: `Full Path: ${LIBRARY_PATH}`
      })
    )

    expect(response.status).toBe(200)
    expect(await response.json()).toMatchObject({
      files_processed: 1,
      total_files_found: 2,
      failed_files: [
        { file: 'deals/missing.xlsx', reason: 'file not found: deals/missing.xlsx', kind: 'FILE_RESOLUTION' }
      ]
    })
  })

  it('rejects malformed requests', async () => {
    const { app } = setup()

    const notJson = await postAnalyze(app, 'not json')
    const missingTarget = await postAnalyze(app, JSON.stringify({ file_references: [LIBRARY_PATH] }))
    const badReferences = await postAnalyze(
      app,
      JSON.stringify({ target_company: 'Coca Cola', file_references: [1] })
    )

    expect(notJson.status).toBe(400)
    expect(await notJson.json()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'request body must be JSON' }
    })
    expect(await missingTarget.json()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'target_company is required' }
    })
    expect(await badReferences.json()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'file_references must be an array of strings' }
    })
  })

  it('maps pipeline failures to error responses', async () => {
    const { app } = setup()

    const response = await postAnalyze(
      app,
      JSON.stringify({ target_company: 'Coca Cola', file_references: ['deals/missing.xlsx'] })
    )

    expect(response.status).toBe(422)
    expect(await response.json()).toMatchObject({
      error: {
        code: 'NO_USABLE_FILES',
        details: { failedFiles: [{ file: 'deals/missing.xlsx', kind: 'FILE_RESOLUTION' }] }
      }
    })
  })

  it('rate limits analyze requests per client', async () => {
    const { app } = setup(createFixedWindowRateLimiter({ maxRequests: 1, windowMs: 60000 }))

    const first = await postAnalyze(app, '{}')
    const second = await postAnalyze(app, '{}')

    expect(first.status).toBe(400)
    expect(second.status).toBe(429)
    expect(await second.json()).toMatchObject({ error: { code: 'RATE_LIMITED' } })
  })
})

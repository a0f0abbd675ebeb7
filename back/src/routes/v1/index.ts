import { Hono } from 'hono'
import type { AnalysisOrchestrator } from '../../services/analysis/orchestrator.js'
import type { RateLimiter } from '../../utils/rateLimit.js'
import { registerAnalyzeRoutes } from './analyze.js'
import { registerCacheRoutes } from './cache.js'
import { registerHealthRoutes } from './health.js'

export type V1Dependencies = {
  orchestrator: AnalysisOrchestrator
  rateLimiter: RateLimiter
}

export const registerV1Routes = (app: Hono, deps: V1Dependencies) => {
  const v1 = new Hono()

  registerAnalyzeRoutes(v1, deps)
  registerCacheRoutes(v1, deps)
  registerHealthRoutes(v1)

  app.route('/v1', v1)
}

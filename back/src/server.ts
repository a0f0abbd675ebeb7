import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { ServiceStatusResponse } from 'shared'
import { AnalysisOrchestrator } from './services/analysis/orchestrator.js'
import { createRateLimiterFromEnv } from './utils/rateLimit.js'
import type { RateLimiter } from './utils/rateLimit.js'
import { registerV1Routes } from './routes/v1/index.js'

type AppDependencies = {
  orchestrator?: AnalysisOrchestrator
  rateLimiter?: RateLimiter
}

export const createApp = (deps: AppDependencies = {}) => {
  const app = new Hono()
  const orchestrator = deps.orchestrator ?? new AnalysisOrchestrator()
  const rateLimiter = deps.rateLimiter ?? createRateLimiterFromEnv()

  app.use(
    '*',
    cors({
      origin: (origin) => {
        if (!origin) return '*'
        return origin
      },
      allowHeaders: ['Content-Type', 'Authorization', 'X-Client-Token'],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      maxAge: 600
    })
  )

  app.get('/', (c) => {
    const status: ServiceStatusResponse = {
      status: 'online',
      service: 'Competitor Analysis API'
    }
    return c.json(status, 200)
  })

  registerV1Routes(app, { orchestrator, rateLimiter })

  return app
}

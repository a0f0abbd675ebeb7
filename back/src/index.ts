import { serve } from '@hono/node-server'
import type { AnalysisResult } from './domain/types.js'
import { AnalysisOrchestrator } from './services/analysis/orchestrator.js'
import { FingerprintCache } from './services/cache/fingerprintCache.js'
import { createApp } from './server.js'

const port = Number(process.env.PORT ?? 8080)

const cache = new FingerprintCache<AnalysisResult>()
const orchestrator = new AnalysisOrchestrator({ cache })

if (!process.env.GEMINI_API_KEY && !process.env.VERTEX_PROJECT_ID && !process.env.GCP_PROJECT_ID) {
  console.warn(
    JSON.stringify({
      event: 'llm_credentials_missing',
      reason: 'set GEMINI_API_KEY or VERTEX_PROJECT_ID before calling /v1/analyze'
    })
  )
}

cache.start()
const server = serve({ fetch: createApp({ orchestrator }).fetch, port }, (info) => {
  console.info(JSON.stringify({ event: 'server_started', port: info.port }))
})

const shutdown = (signal: string) => {
  console.info(JSON.stringify({ event: 'server_stopping', signal }))
  cache.stop()
  server.close()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))

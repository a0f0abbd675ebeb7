import type { Hono } from 'hono'
import type { CacheStatsResponse } from 'shared'
import type { AnalysisOrchestrator } from '../../services/analysis/orchestrator.js'

const HOUR_MS = 60 * 60 * 1000

export const registerCacheRoutes = (
  app: Hono,
  deps: { orchestrator: AnalysisOrchestrator }
) => {
  app.get('/cache/stats', (c) => {
    const cache = deps.orchestrator.describeCache()
    const response: CacheStatsResponse = {
      entry_count: cache.entryCount,
      hit_count: cache.hitCount,
      miss_count: cache.missCount,
      max_entries: cache.maxEntries,
      ttl_hours: cache.ttlMs / HOUR_MS,
      keys: cache.keys
    }
    return c.json(response, 200)
  })
}

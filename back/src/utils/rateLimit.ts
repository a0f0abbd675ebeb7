import { AppError, ErrorCodes } from './errors.js'

export { createFixedWindowRateLimiter, createNoopRateLimiter, createRateLimiterFromEnv }
export type { RateLimiter, RateLimitConfig }

type RateLimitConfig = {
  maxRequests: number
  windowMs: number
  now?: () => number
}

type RateLimiter = {
  check: (key: string) => void
}

const createFixedWindowRateLimiter = (config: RateLimitConfig): RateLimiter => {
  const buckets = new Map<string, { count: number; windowStart: number }>()
  const now = config.now ?? Date.now

  return {
    check: (key: string) => {
      const current = buckets.get(key)
      const timestamp = now()

      if (!current || timestamp - current.windowStart >= config.windowMs) {
        buckets.set(key, { count: 1, windowStart: timestamp })
        return
      }

      if (current.count >= config.maxRequests) {
        throw new AppError(
          ErrorCodes.RATE_LIMITED,
          'too many requests',
          429,
          { retryAfterMs: config.windowMs - (timestamp - current.windowStart) }
        )
      }

      current.count += 1
    }
  }
}

const createNoopRateLimiter = (): RateLimiter => ({
  check: () => {}
})

const createRateLimiterFromEnv = (): RateLimiter => {
  const maxRequests = Number(process.env.ANALYZE_RATE_LIMIT_MAX ?? Number.NaN)
  const windowMs = Number(process.env.ANALYZE_RATE_LIMIT_WINDOW_MS ?? 60000)
  if (!Number.isFinite(maxRequests) || maxRequests <= 0) {
    return createNoopRateLimiter()
  }
  return createFixedWindowRateLimiter({
    maxRequests: Math.floor(maxRequests),
    windowMs: Number.isFinite(windowMs) && windowMs > 0 ? windowMs : 60000
  })
}

import type { CacheEntry, CacheStats } from '../../domain/types.js'

export { FingerprintCache, DEFAULT_CACHE_TTL_MS }
export type { FingerprintCacheOptions, CacheLookup }

type FingerprintCacheOptions = {
  ttlMs?: number
  maxEntries?: number
  sweepIntervalMs?: number
  now?: () => number
}

type CacheLookup<T> = {
  value: T
  cached: boolean
}

const HOUR_MS = 60 * 60 * 1000
const DEFAULT_CACHE_TTL_MS = 48 * HOUR_MS

const ENV_TTL_HOURS = Number(process.env.CACHE_TTL_HOURS ?? 48)
const ENV_MAX_ENTRIES = Number(process.env.CACHE_MAX_ENTRIES ?? 100)
const ENV_SWEEP_INTERVAL_MS = Number(process.env.CACHE_SWEEP_INTERVAL_MS ?? 10 * 60 * 1000)

/**
 * In-memory TTL cache with single-flight computation: while a value for a key
 * is being computed, later callers for the same key await that computation
 * instead of starting their own. Failed computations are never stored.
 */
class FingerprintCache<T extends object> {
  readonly ttlMs: number
  readonly maxEntries: number
  private readonly sweepIntervalMs: number
  private readonly now: () => number
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly inflight = new Map<string, Promise<T>>()
  private hitCount = 0
  private missCount = 0
  private sweepTimer: ReturnType<typeof setInterval> | null = null

  constructor(options: FingerprintCacheOptions = {}) {
    this.ttlMs = positiveOr(options.ttlMs, positiveOr(ENV_TTL_HOURS * HOUR_MS, DEFAULT_CACHE_TTL_MS))
    this.maxEntries = positiveOr(options.maxEntries, positiveOr(ENV_MAX_ENTRIES, 100))
    this.sweepIntervalMs = positiveOr(
      options.sweepIntervalMs,
      positiveOr(ENV_SWEEP_INTERVAL_MS, 10 * 60 * 1000)
    )
    this.now = options.now ?? Date.now
  }

  lookup(key: string): T | undefined {
    const entry = this.entries.get(key)
    if (entry && this.now() < entry.expiresAt) {
      this.hitCount += 1
      return entry.value
    }
    if (entry) {
      this.entries.delete(key)
    }
    this.missCount += 1
    return undefined
  }

  store(key: string, value: T): void {
    this.entries.delete(key)
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }

    const createdAt = this.now()
    this.entries.set(key, {
      key,
      value,
      createdAt,
      expiresAt: createdAt + this.ttlMs
    })
  }

  async getOrCompute(key: string, compute: () => Promise<T>): Promise<CacheLookup<T>> {
    const hit = this.lookup(key)
    if (hit !== undefined) {
      console.info(JSON.stringify({ event: 'cache_hit', key }))
      return { value: hit, cached: true }
    }

    const pending = this.inflight.get(key)
    if (pending) {
      console.info(JSON.stringify({ event: 'cache_join_inflight', key }))
      return { value: await pending, cached: false }
    }

    console.info(JSON.stringify({ event: 'cache_miss', key }))
    const task = compute().then((value) => {
      this.store(key, value)
      console.info(JSON.stringify({ event: 'cache_store', key }))
      return value
    })
    this.inflight.set(key, task)

    try {
      return { value: await task, cached: false }
    } finally {
      this.inflight.delete(key)
    }
  }

  stats(): CacheStats {
    this.sweep()
    return {
      entryCount: this.entries.size,
      hitCount: this.hitCount,
      missCount: this.missCount
    }
  }

  keys(): string[] {
    this.sweep()
    return [...this.entries.keys()]
  }

  sweep(): number {
    const now = this.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key)
        removed += 1
      }
    }
    if (removed > 0) {
      console.info(JSON.stringify({ event: 'cache_sweep', removed }))
    }
    return removed
  }

  start(): void {
    if (this.sweepTimer) return
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs)
    this.sweepTimer.unref()
  }

  stop(): void {
    if (!this.sweepTimer) return
    clearInterval(this.sweepTimer)
    this.sweepTimer = null
  }

  clear(): void {
    this.entries.clear()
    this.hitCount = 0
    this.missCount = 0
  }
}

const positiveOr = (value: number | undefined, fallback: number): number => {
  if (value === undefined || !Number.isFinite(value) || value <= 0) return fallback
  return Math.floor(value)
}

/**
 * Outbound call budgets for the retailer and beer database.
 *
 * Sliding window: at most `burst` acquisitions per window of
 * max(1000, ceil(1000 * burst / requestsPerSecond)) ms, per key. A window is
 * never shorter than a second, so no one-second span sees more than the
 * budget even when requestsPerSecond is fractional. Every external call
 * acquires a token first; the limiter is the only exclusion point shared
 * by concurrent matching workers.
 *
 * InMemoryRateLimiter covers a single process. RedisRateLimiter coordinates
 * every worker process through one sorted set per key.
 */

import { randomUUID } from 'node:crypto'
import type Redis from 'ioredis'

/** Key prefix for limiter state in Redis */
const REDIS_KEY_PREFIX = 'brewlink:ratelimit:'

/** TTL for limiter keys (prevents stale keys) */
const KEY_TTL_SECONDS = 3600

export interface RateLimitConfig {
  /** Sustained requests per second */
  requestsPerSecond: number
  /** Calls allowed back-to-back within one window */
  burst: number
  /** Floor on the wait between polling attempts while throttled */
  minDelayMs: number
}

/**
 * Proof of a limiter acquisition. Adapters take one per external call.
 */
export interface BudgetToken {
  readonly key: string
  readonly acquiredAt: number
}

export interface RateLimiter {
  /** Blocks until the key's budget allows one more call */
  acquire(key: string): Promise<BudgetToken>
  getConfig(key: string): RateLimitConfig
}

export function rateLimitFor(requestsPerSecond: number): RateLimitConfig {
  return {
    requestsPerSecond,
    burst: Math.max(1, Math.floor(requestsPerSecond)),
    minDelayMs: 0,
  }
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = rateLimitFor(1)

export function windowMsFor(config: RateLimitConfig): number {
  return Math.max(1000, Math.ceil((1000 * config.burst) / config.requestsPerSecond))
}

type Sleep = (ms: number) => Promise<void>

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface RateLimiterOptions {
  budgets?: Record<string, RateLimitConfig>
  sleep?: Sleep
  now?: () => number
}

// ═══════════════════════════════════════════════════════════════════════════════
// In-memory
// ═══════════════════════════════════════════════════════════════════════════════

export class InMemoryRateLimiter implements RateLimiter {
  private readonly budgets: Map<string, RateLimitConfig>
  private readonly windows = new Map<string, number[]>()
  private readonly sleep: Sleep
  private readonly now: () => number

  constructor(options: RateLimiterOptions = {}) {
    this.budgets = new Map(Object.entries(options.budgets ?? {}))
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
  }

  async acquire(key: string): Promise<BudgetToken> {
    const config = this.getConfig(key)

    while (true) {
      const now = this.now()
      const retryAfterMs = this.tryAcquire(key, now, config)
      if (retryAfterMs === null) {
        return { key, acquiredAt: now }
      }
      await this.sleep(Math.max(retryAfterMs, config.minDelayMs, 1))
    }
  }

  getConfig(key: string): RateLimitConfig {
    return this.budgets.get(key) ?? DEFAULT_RATE_LIMIT
  }

  /**
   * Synchronous check-and-record. Returns null when acquired,
   * otherwise the ms until the oldest entry leaves the window.
   */
  private tryAcquire(key: string, now: number, config: RateLimitConfig): number | null {
    const windowMs = windowMsFor(config)
    const entries = (this.windows.get(key) ?? []).filter((ts) => ts > now - windowMs)

    if (entries.length < config.burst) {
      entries.push(now)
      this.windows.set(key, entries)
      return null
    }

    this.windows.set(key, entries)
    return entries[0] + windowMs - now
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Redis
// ═══════════════════════════════════════════════════════════════════════════════

const ACQUIRE_LUA = `
  local key = KEYS[1]
  local now = tonumber(ARGV[1])
  local windowMs = tonumber(ARGV[2])
  local burst = tonumber(ARGV[3])
  local ttl = tonumber(ARGV[4])
  local member = ARGV[5]

  redis.call('ZREMRANGEBYSCORE', key, '-inf', now - windowMs)

  local count = redis.call('ZCARD', key)

  if count < burst then
    redis.call('ZADD', key, now, member)
    redis.call('EXPIRE', key, ttl)
    return {1, 0}
  else
    local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
    if #oldest >= 2 then
      return {0, tonumber(oldest[2]) + windowMs - now}
    end
    return {0, windowMs}
  end
`

export interface RedisRateLimiterOptions extends RateLimiterOptions {
  redis: Redis
}

export class RedisRateLimiter implements RateLimiter {
  private readonly redis: Redis
  private readonly budgets: Map<string, RateLimitConfig>
  private readonly sleep: Sleep
  private readonly now: () => number

  constructor(options: RedisRateLimiterOptions) {
    this.redis = options.redis
    this.budgets = new Map(Object.entries(options.budgets ?? {}))
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
  }

  async acquire(key: string): Promise<BudgetToken> {
    const config = this.getConfig(key)

    while (true) {
      const now = this.now()
      const result = await this.tryAcquire(key, now, config)

      if (result.acquired) {
        return { key, acquiredAt: now }
      }

      await this.sleep(Math.max(result.retryAfterMs, config.minDelayMs, 1))
    }
  }

  getConfig(key: string): RateLimitConfig {
    return this.budgets.get(key) ?? DEFAULT_RATE_LIMIT
  }

  private async tryAcquire(
    key: string,
    now: number,
    config: RateLimitConfig
  ): Promise<{ acquired: boolean; retryAfterMs: number }> {
    const windowMs = windowMsFor(config)

    const result = await this.redis.eval(
      ACQUIRE_LUA,
      1,
      `${REDIS_KEY_PREFIX}${key}`,
      now.toString(),
      windowMs.toString(),
      config.burst.toString(),
      KEY_TTL_SECONDS.toString(),
      `${now}:${randomUUID()}`
    )

    if (!Array.isArray(result) || result.length < 2) {
      throw new Error(`Unexpected rate limiter reply for ${key}`)
    }

    return {
      acquired: Number(result[0]) === 1,
      retryAfterMs: Math.max(Number(result[1]), 0),
    }
  }
}

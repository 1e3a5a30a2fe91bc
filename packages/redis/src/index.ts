/**
 * @brewlink/redis - Shared Redis connection utilities
 *
 * Single source of connection settings for the sync worker, the BullMQ
 * queues, the Redis rate limiter and the Redis catalog repository.
 * Always create connections through this package rather than from ioredis
 * directly.
 */

import Redis, { type RedisOptions } from 'ioredis'
import { createLogger } from '@brewlink/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  db: number
  redisUrl: string | undefined
}

/**
 * Parse Redis configuration from environment variables.
 *
 * REDIS_URL (redis://:password@host:port/db) wins over REDIS_HOST/PORT/PASSWORD.
 * A URL is always broken into components so the options object can be passed
 * to `new Redis(options)` without ioredis falling back to localhost.
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      const dbPath = url.pathname.replace('/', '')
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password || undefined,
        db: dbPath ? parseInt(dbPath, 10) : 0,
        redisUrl,
      }
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    db: parseInt(env.REDIS_DB || '0', 10),
    redisUrl: undefined,
  }
}

/**
 * Connection description for logs (password masked).
 */
export function describeRedisConfig(config: RedisConfig): string {
  return config.redisUrl
    ? config.redisUrl.replace(/\/\/:[^@]+@/, '//***@')
    : `${config.host}:${config.port}/${config.db}`
}

const config = parseRedisConfig()
const redisLogInfo = describeRedisConfig(config)

// =============================================================================
// Connection Options
// =============================================================================

// Circuit breaker state for reducing log spam during prolonged outages
let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/**
 * Connection options with keepalive, capped reconnect backoff and a
 * log circuit breaker after 20 failed attempts.
 *
 * maxRetriesPerRequest must stay null for BullMQ workers.
 */
export const redisConnection: RedisOptions = {
  host: config.host,
  port: config.port,
  password: config.password,
  db: config.db,

  maxRetriesPerRequest: null,
  keepAlive: 10000,
  connectTimeout: 10000,
  commandTimeout: 30000,
  enableOfflineQueue: true,

  retryStrategy(times: number) {
    consecutiveFailures = times

    if (times > 20) {
      const now = Date.now()
      if (now - lastCircuitBreakerLog > 60000) {
        lastCircuitBreakerLog = now
        log.error('Circuit breaker: prolonged outage', {
          attempts: times,
          connection: redisLogInfo,
        })
      }
      return 30000
    }

    const delay = Math.min(times * 500, 30000)
    log.info('Reconnecting', { attempt: times, delayMs: delay })
    return delay
  },

  reconnectOnError(err: Error) {
    if (RECONNECT_ERRORS.some((code) => err.message.includes(code))) {
      if (consecutiveFailures <= 20) {
        log.warn('Reconnecting due to error', { error: err.message })
      }
      return true
    }
    return false
  },
}

// =============================================================================
// Client Factory Functions
// =============================================================================

/**
 * Dedicated connection (blocking commands, isolation from other callers).
 */
export function createRedisClient(): Redis {
  return new Redis(redisConnection)
}

let singletonClient: Redis | null = null
let bullmqConnection: Redis | null = null

/**
 * Lazily created shared client for general commands.
 */
export function getRedisClient(): Redis {
  if (!singletonClient) {
    singletonClient = new Redis(redisConnection)

    singletonClient.on('error', (err: Error) => {
      log.error('Connection error', { error: err.message })
    })

    singletonClient.on('connect', () => {
      consecutiveFailures = 0
      log.info('Connected', { connection: redisLogInfo })
    })
  }
  return singletonClient
}

/**
 * Shared connection for BullMQ Queue/Worker constructors.
 * Close it only after every queue and worker using it has been closed.
 */
export function getSharedBullMQConnection(): Redis {
  if (!bullmqConnection) {
    bullmqConnection = new Redis(redisConnection)
    bullmqConnection.on('error', (err: Error) => {
      log.error('BullMQ connection error', { error: err.message })
    })
  }
  return bullmqConnection
}

export async function closeSharedBullMQConnection(): Promise<void> {
  if (bullmqConnection) {
    await bullmqConnection.quit()
    bullmqConnection = null
  }
}

/**
 * Disconnect the shared client. Safe when no client was created.
 */
export async function disconnectRedis(): Promise<void> {
  if (singletonClient) {
    await singletonClient.quit()
    singletonClient = null
  }
}

// =============================================================================
// Warmup / Health Check
// =============================================================================

/**
 * Ping Redis with exponential backoff before workers start.
 * Returns false after maxAttempts failures.
 */
export async function warmupRedis(maxAttempts = 5): Promise<boolean> {
  const warmupOptions: RedisOptions = {
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    maxRetriesPerRequest: 1,
    retryStrategy: () => null,
    connectTimeout: 5000,
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.info('Warmup attempt', { attempt, maxAttempts, connection: redisLogInfo })
      const client = new Redis(warmupOptions)

      await client.ping()
      await client.quit()
      log.info('Warmup successful')
      return true
    } catch (error) {
      log.error('Warmup failed', { attempt }, error)

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    }
  }

  log.error('Warmup failed after all attempts', { maxAttempts })
  return false
}

export function getRedisConnectionInfo(): string {
  return redisLogInfo
}

export {
  DEFAULT_LOCK_TTL_MS,
  acquireRedisLockWithClient,
  releaseRedisLockWithClient,
  extendRedisLockWithClient,
  withRedisLock,
} from './lock'
export type { RedisLockHandle } from './lock'

export { Redis }
export type { RedisOptions }

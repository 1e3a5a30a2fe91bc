/**
 * Cross-process cycle exclusion.
 *
 * The state machine keeps one cycle per process; this token lock keeps one
 * cycle per deployment when several syncer processes share Redis. The lock
 * is renewed while held so long cycles do not lose it.
 */

import type Redis from 'ioredis'
import {
  acquireRedisLockWithClient,
  extendRedisLockWithClient,
  releaseRedisLockWithClient,
  DEFAULT_LOCK_TTL_MS,
} from '@brewlink/redis/lock'
import { logger } from '../config/logger'

const log = logger.worker

const RENEWAL_INTERVAL_MS = 30_000

export interface CycleLockHandle {
  release(): Promise<boolean>
}

export interface CycleLockProvider {
  acquire(): Promise<CycleLockHandle | null>
}

export interface RedisCycleLockOptions {
  redis: Redis
  key?: string
  ttlMs?: number
  renewalIntervalMs?: number
}

export class RedisCycleLock implements CycleLockProvider {
  private readonly redis: Redis
  private readonly key: string
  private readonly ttlMs: number
  private readonly renewalIntervalMs: number

  constructor(options: RedisCycleLockOptions) {
    this.redis = options.redis
    this.key = options.key ?? 'brewlink:lock:sync-cycle'
    this.ttlMs = options.ttlMs ?? DEFAULT_LOCK_TTL_MS
    this.renewalIntervalMs = options.renewalIntervalMs ?? RENEWAL_INTERVAL_MS
  }

  async acquire(): Promise<CycleLockHandle | null> {
    const handle = await acquireRedisLockWithClient(this.redis, this.key, this.ttlMs)
    if (!handle) {
      log.debug('Cycle lock not available', { key: this.key })
      return null
    }

    const timer = setInterval(() => {
      extendRedisLockWithClient(this.redis, handle, this.ttlMs).then(
        (extended) => {
          if (!extended) {
            log.warn('Cycle lock renewal failed - lock may have expired', { key: this.key })
            clearInterval(timer)
          }
        },
        (error: unknown) => {
          log.warn('Cycle lock renewal error', { key: this.key }, error)
          clearInterval(timer)
        }
      )
    }, this.renewalIntervalMs)
    timer.unref()

    return {
      release: async () => {
        clearInterval(timer)
        const released = await releaseRedisLockWithClient(this.redis, handle)
        if (!released) {
          log.warn('Cycle lock release failed (token mismatch or expired)', { key: this.key })
        }
        return released
      },
    }
  }
}

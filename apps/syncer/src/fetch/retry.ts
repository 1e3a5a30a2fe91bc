/**
 * Declarative retry policy and the client guard every external call goes
 * through: acquire budget, apply the per-call timeout, retry with
 * exponential backoff while the policy says the error is retryable.
 */

import type { ExternalService } from '../lib/errors'
import { CallTimeoutError, TransientExternalError, errorMessage, isRetryableError } from '../lib/errors'
import { logger } from '../config/logger'
import { recordExternalCall } from '../metrics'
import type { BudgetToken, RateLimiter } from './rate-limiter'
import type { SyncSettings } from '../config/settings'

const log = logger.fetch

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  /** Per-attempt timeout */
  timeoutMs: number
  isRetryable: (error: unknown) => boolean
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  timeoutMs: 15000,
  isRetryable: isRetryableError,
}

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1)
  return Math.min(delay, policy.maxDelayMs)
}

/**
 * Run `fn` with a deadline. The signal is aborted when the deadline passes
 * and the returned promise rejects with CallTimeoutError.
 */
export function withTimeout<T>(
  service: ExternalService,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort()
      reject(new CallTimeoutError(service, timeoutMs))
    }, timeoutMs)

    fn(controller.signal).then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      }
    )
  })
}

export interface GuardedCallContext {
  budget: BudgetToken
  signal: AbortSignal
  attempt: number
}

export interface ClientGuardOptions {
  sleep?: (ms: number) => Promise<void>
}

export class ClientGuard {
  private readonly limiter: RateLimiter
  private readonly sleep: (ms: number) => Promise<void>

  constructor(limiter: RateLimiter, options: ClientGuardOptions = {}) {
    this.limiter = limiter
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
  }

  /**
   * Every attempt acquires its own budget token. Retryable failures that are
   * not already TransientExternalError are wrapped in one once attempts run
   * out, so callers can tell them apart from real negative results.
   */
  async call<T>(
    service: ExternalService,
    fn: (context: GuardedCallContext) => Promise<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const budget = await this.limiter.acquire(service)

      try {
        const result = await withTimeout(service, policy.timeoutMs, (signal) => fn({ budget, signal, attempt }))
        recordExternalCall(service, 'ok')
        return result
      } catch (error) {
        const retryable = policy.isRetryable(error)

        if (!retryable) {
          recordExternalCall(service, 'failed')
          throw error
        }

        if (attempt >= policy.maxAttempts) {
          recordExternalCall(service, 'failed')
          log.warn('EXTERNAL_CALL_EXHAUSTED', {
            event_name: 'EXTERNAL_CALL_EXHAUSTED',
            service,
            attempts: attempt,
            errorMessage: errorMessage(error),
          })
          throw error instanceof TransientExternalError
            ? error
            : new TransientExternalError(service, errorMessage(error), { cause: error })
        }

        const delayMs = backoffDelayMs(policy, attempt)
        recordExternalCall(service, 'retry')
        log.debug('EXTERNAL_CALL_RETRY', {
          event_name: 'EXTERNAL_CALL_RETRY',
          service,
          attempt,
          delayMs,
          errorMessage: errorMessage(error),
        })
        await this.sleep(delayMs)
      }
    }
  }
}

/**
 * Policy for one call site built from settings.
 */
export function retryPolicyFromSettings(
  settings: Pick<
    SyncSettings,
    'EXTERNAL_MAX_ATTEMPTS' | 'EXTERNAL_RETRY_INITIAL_DELAY_MS' | 'EXTERNAL_RETRY_MAX_DELAY_MS' | 'EXTERNAL_CALL_TIMEOUT_MS'
  >,
  overrides: Partial<RetryPolicy> = {}
): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: settings.EXTERNAL_MAX_ATTEMPTS,
    initialDelayMs: settings.EXTERNAL_RETRY_INITIAL_DELAY_MS,
    maxDelayMs: settings.EXTERNAL_RETRY_MAX_DELAY_MS,
    timeoutMs: settings.EXTERNAL_CALL_TIMEOUT_MS,
    ...overrides,
  }
}

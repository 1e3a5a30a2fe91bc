/**
 * Wires the engine from settings. Tests and embedders pass overrides for
 * the repository, adapters or limiter; everything else is built here.
 */

import type Redis from 'ioredis'
import { getRedisClient } from '@brewlink/redis'
import type { SyncSettings } from './config/settings'
import type { BeerDatabaseAdapter, RetailerAdapter } from './adapters/types'
import { HttpRetailerAdapter } from './adapters/retailer/adapter'
import { HttpBeerDatabaseAdapter } from './adapters/beerdb/adapter'
import type { RateLimiter } from './fetch/rate-limiter'
import { InMemoryRateLimiter, RedisRateLimiter, rateLimitFor } from './fetch/rate-limiter'
import { ClientGuard, retryPolicyFromSettings } from './fetch/retry'
import { Matcher, matcherConfigFromSettings } from './matcher/matcher'
import { LinkStore } from './links/link-store'
import { CorrectionService } from './links/corrections'
import type { CatalogRepository } from './store/types'
import { InMemoryCatalogRepository } from './store/memory'
import { RedisCatalogRepository } from './store/redis'
import type { CycleFailure } from './sync/orchestrator'
import { SyncOrchestrator } from './sync/orchestrator'
import type { CycleLockProvider } from './sync/cycle-lock'
import { RedisCycleLock } from './sync/cycle-lock'
import { EnrichmentService } from './api/enrichment-service'

export interface SyncEngine {
  settings: SyncSettings
  repository: CatalogRepository
  limiter: RateLimiter
  guard: ClientGuard
  retailer: RetailerAdapter
  beerDatabase: BeerDatabaseAdapter
  matcher: Matcher
  linkStore: LinkStore
  corrections: CorrectionService
  orchestrator: SyncOrchestrator
  enrichment: EnrichmentService
  /** Present with the Redis backend */
  cycleLock: CycleLockProvider | null
}

export interface SyncEngineOverrides {
  redis?: Redis
  repository?: CatalogRepository
  retailer?: RetailerAdapter
  beerDatabase?: BeerDatabaseAdapter
  limiter?: RateLimiter
  guard?: ClientGuard
  now?: () => Date
  generateCycleId?: () => string
  onFailure?: (failure: CycleFailure) => Promise<void> | void
}

export function createSyncEngine(settings: SyncSettings, overrides: SyncEngineOverrides = {}): SyncEngine {
  const useRedis = settings.STORE_BACKEND === 'redis'
  const redis = useRedis ? overrides.redis ?? getRedisClient() : null
  const now = overrides.now ?? (() => new Date())

  const repository = overrides.repository ?? (redis ? new RedisCatalogRepository({ redis }) : new InMemoryCatalogRepository())

  const budgets = {
    retailer: rateLimitFor(settings.RETAILER_RPS),
    beerdb: rateLimitFor(settings.BEERDB_RPS),
  }
  const limiter = overrides.limiter ?? (redis ? new RedisRateLimiter({ redis, budgets }) : new InMemoryRateLimiter({ budgets }))
  const guard = overrides.guard ?? new ClientGuard(limiter)
  const policy = retryPolicyFromSettings(settings)

  const retailer =
    overrides.retailer ??
    new HttpRetailerAdapter({ baseUrl: settings.RETAILER_BASE_URL, categories: settings.RETAILER_CATEGORIES })
  const beerDatabase =
    overrides.beerDatabase ??
    new HttpBeerDatabaseAdapter({ baseUrl: settings.BEERDB_BASE_URL, apiKey: settings.BEERDB_API_KEY, now })

  const matcher = new Matcher({ beerDatabase, guard, policy }, matcherConfigFromSettings(settings))
  const linkStore = new LinkStore({ repository, failureThreshold: settings.LINK_FAILURE_THRESHOLD, now })
  const corrections = new CorrectionService({
    repository,
    linkStore,
    autoAccept: settings.AUTO_ACCEPT_CORRECTIONS,
    now,
  })

  const orchestrator = new SyncOrchestrator({
    repository,
    retailer,
    matcher,
    linkStore,
    guard,
    settings,
    retailerPolicy: policy,
    now,
    generateCycleId: overrides.generateCycleId,
    onFailure: overrides.onFailure,
  })

  return {
    settings,
    repository,
    limiter,
    guard,
    retailer,
    beerDatabase,
    matcher,
    linkStore,
    corrections,
    orchestrator,
    enrichment: new EnrichmentService({ repository, linkStore, corrections }),
    cycleLock: redis ? new RedisCycleLock({ redis }) : null,
  }
}

/**
 * brewlink catalog syncer
 *
 * Retailer catalog sync, cross-source matching against the beer database,
 * link maintenance and change detection.
 */

export { createSyncEngine } from './container'
export type { SyncEngine, SyncEngineOverrides } from './container'

export { loadSettings, settingsSchema } from './config/settings'
export type { SyncSettings } from './config/settings'

export * from './catalog/types'

export { normalize, normalizeBrewery, styleFamily } from './normalizer'
export { match, rankCandidates, Matcher, DEFAULT_MATCHER_CONFIG, matcherConfigFromSettings } from './matcher/matcher'
export type { MatcherConfig } from './matcher/matcher'
export { queryVariations } from './matcher/query-variations'

export { LinkStore, LinkBatch } from './links/link-store'
export type { LinkRepository, LinkWrite, LinkWriteOutcome } from './links/link-store'
export { CorrectionService } from './links/corrections'
export type { CorrectionSuggestion } from './links/corrections'

export { diff, buildBaseline, sweepStaleProducts } from './snapshot/differ'

export { InMemoryRateLimiter, RedisRateLimiter, rateLimitFor } from './fetch/rate-limiter'
export type { RateLimiter, RateLimitConfig, BudgetToken } from './fetch/rate-limiter'
export { ClientGuard, DEFAULT_RETRY_POLICY, retryPolicyFromSettings } from './fetch/retry'
export type { RetryPolicy } from './fetch/retry'

export type { RetailerAdapter, BeerDatabaseAdapter, CatalogPage, PullCursor } from './adapters/types'
export { HttpRetailerAdapter } from './adapters/retailer/adapter'
export { HttpBeerDatabaseAdapter } from './adapters/beerdb/adapter'

export type { CatalogRepository } from './store/types'
export { InMemoryCatalogRepository } from './store/memory'
export { RedisCatalogRepository } from './store/redis'

export { SyncOrchestrator } from './sync/orchestrator'
export type { CycleReport, CycleFailure, TriggerOutcome } from './sync/orchestrator'
export { SyncStateMachine } from './sync/state-machine'
export type { CycleState } from './sync/state-machine'

export { EnrichmentService, deriveFigures } from './api/enrichment-service'
export type { EnrichedProduct, DerivedFigures } from './api/enrichment-service'

export * from './lib/errors'
export { getMetricsSnapshot, exportPrometheusMetrics } from './metrics'

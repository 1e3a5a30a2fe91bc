/**
 * Catalog domain types shared by adapters, matcher, link store, differ and
 * the orchestrator.
 */

import type { SyncStage } from '../lib/errors'

// ═══════════════════════════════════════════════════════════════════════════════
// Products (retailer side)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One product as observed in a retailer pull, already normalized into the
 * common candidate shape.
 */
export interface ProductState {
  id: string
  name: string
  brewery: string | null
  style: string | null
  abv: number | null
  /** Package volume in litres */
  volumeLiters: number | null
  price: number | null
  available: boolean
  /** ISO date (YYYY-MM-DD) */
  releaseDate: string | null
  category: string
  url: string | null
}

/**
 * Persisted product record. Never deleted; `active` goes false once the
 * product stops appearing in complete pulls of its category.
 */
export interface Product extends ProductState {
  active: boolean
  firstSeenAt: Date
  lastSeenAt: Date
  lastMatchAttemptAt: Date | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// External beers
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExternalBeer {
  id: string
  name: string
  brewery: string
  style: string | null
  /** Average rating, 0-5 */
  rating: number | null
  ratingCount: number
  abv: number | null
  url: string | null
  fetchedAt: Date
}

// ═══════════════════════════════════════════════════════════════════════════════
// Links
// ═══════════════════════════════════════════════════════════════════════════════

export type LinkStatus = 'active' | 'ambiguous' | 'rejected'

export type MatchMethod = 'exact-id' | 'fuzzy' | 'manual'

export type RejectionOrigin = 'manual' | 'hysteresis'

export interface LinkRejection {
  reason: string
  origin: RejectionOrigin
  /** External id that was rejected, when there was one */
  externalId: string | null
  rejectedAt: Date
}

export interface Link {
  productId: string
  externalId: string | null
  confidence: number
  method: MatchMethod | null
  status: LinkStatus
  createdAt: Date
  reaffirmedAt: Date | null
  updatedAt: Date
  consecutiveFailures: number
  /** Top candidate ids while ambiguous */
  candidateIds: string[]
  rejection: LinkRejection | null
  previousExternalId: string | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Match results
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScoreBreakdown {
  name: number
  brewery: number
  style: number
  abv: number
}

export interface ScoredCandidate {
  beer: ExternalBeer
  score: number
  breakdown: ScoreBreakdown
}

export type MatchResult =
  | { kind: 'linked'; beer: ExternalBeer; confidence: number; method: MatchMethod }
  | { kind: 'ambiguous'; candidates: ScoredCandidate[] }
  | { kind: 'unmatched'; best: ScoredCandidate | null }

// ═══════════════════════════════════════════════════════════════════════════════
// Snapshots and change events
// ═══════════════════════════════════════════════════════════════════════════════

export interface Snapshot {
  cycleId: string
  sequence: number
  takenAt: Date
  complete: boolean
  /** Categories pulled completely in this cycle */
  scope: string[]
  products: ProductState[]
}

export type ChangeKind = 'new' | 'removed' | 'availability-changed' | 'price-changed'

interface ChangeEventBase {
  cycleId: string
  productId: string
  pulledAt: Date
}

export type ChangeEvent =
  | (ChangeEventBase & { kind: 'new'; before: null; after: ProductState })
  | (ChangeEventBase & { kind: 'removed'; before: ProductState; after: null })
  | (ChangeEventBase & { kind: 'availability-changed'; before: boolean; after: boolean })
  | (ChangeEventBase & { kind: 'price-changed'; before: number | null; after: number | null })

// ═══════════════════════════════════════════════════════════════════════════════
// Corrections
// ═══════════════════════════════════════════════════════════════════════════════

export type CorrectionStatus = 'pending' | 'accepted' | 'declined'

export interface Correction {
  id: string
  productId: string
  externalId: string
  suggestedBy: string
  note: string | null
  status: CorrectionStatus
  createdAt: Date
  resolvedAt: Date | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Cycles
// ═══════════════════════════════════════════════════════════════════════════════

export interface PulledCatalog {
  pulledAt: Date
  products: ProductState[]
  completeCategories: string[]
  incompleteCategories: string[]
  /** True when any category failed to pull completely */
  partial: boolean
}

/**
 * Stage outputs saved when a cycle fails, so a resume job can restart at
 * the failed stage.
 */
export interface CycleCheckpoint {
  cycleId: string
  startedAt: Date
  failedStage: SyncStage
  failedAt: Date
  error: string
  pulled: PulledCatalog | null
  changes: ChangeEvent[] | null
  links: Link[] | null
  beers: ExternalBeer[] | null
  matchAttempts: string[] | null
  retryProductIds: string[] | null
}

/**
 * Everything one cycle writes. Committed atomically or not at all.
 */
export interface CycleCommit {
  cycleId: string
  /** Links stored after this instant were written directly (manual paths) and win */
  startedAt: Date
  committedAt: Date
  products: Product[]
  links: Link[]
  beers: ExternalBeer[]
  snapshot: Omit<Snapshot, 'sequence'>
  events: ChangeEvent[]
  retryProductIds: string[]
}

export interface CycleSummary {
  cycleId: string
  sequence: number
  committedAt: Date
  complete: boolean
  eventCount: number
}

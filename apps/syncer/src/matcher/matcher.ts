/**
 * Cross-source matcher.
 *
 * match()   - pure decision over a candidate set
 * resolve() - exact-id reaffirmation, candidate retrieval through the
 *             client guard, then match()
 *
 * Lookup failures surface as TransientExternalError from resolve(), never
 * as an unmatched result.
 */

import type { ExternalBeer, Link, MatchResult, ProductState, ScoredCandidate } from '../catalog/types'
import type { BeerDatabaseAdapter } from '../adapters/types'
import type { ClientGuard, RetryPolicy } from '../fetch/retry'
import { DEFAULT_RETRY_POLICY } from '../fetch/retry'
import type { SyncSettings } from '../config/settings'
import { logger } from '../config/logger'
import type { MatchWeights } from './scoring/weighted'
import { DEFAULT_MATCH_WEIGHTS, prepareProduct, scoreCandidate } from './scoring/weighted'
import { queryVariations } from './query-variations'

const log = logger.matcher

export interface MatcherConfig {
  highThreshold: number
  ambiguousLow: number
  /** Runner-up closer than this to the top score makes the decision ambiguous */
  ambiguityMargin: number
  /** Also hold back a top score at or above highThreshold when a runner-up is within the margin */
  contestHighScores: boolean
  /** Candidates reported with an ambiguous result */
  maxCandidates: number
  /** Candidate lookups per product */
  maxLookups: number
  weights: MatchWeights
}

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  highThreshold: 0.85,
  ambiguousLow: 0.6,
  ambiguityMargin: 0.05,
  contestHighScores: false,
  maxCandidates: 3,
  maxLookups: 2,
  weights: DEFAULT_MATCH_WEIGHTS,
}

export function matcherConfigFromSettings(settings: SyncSettings): MatcherConfig {
  return {
    highThreshold: settings.MATCH_HIGH_THRESHOLD,
    ambiguousLow: settings.MATCH_AMBIGUOUS_LOW,
    ambiguityMargin: settings.MATCH_AMBIGUITY_MARGIN,
    contestHighScores: settings.MATCH_CONTEST_HIGH_SCORES,
    maxCandidates: settings.MATCH_MAX_CANDIDATES,
    maxLookups: settings.MATCH_MAX_LOOKUPS,
    weights: {
      ...DEFAULT_MATCH_WEIGHTS,
      name: settings.MATCH_WEIGHT_NAME,
      brewery: settings.MATCH_WEIGHT_BREWERY,
      styleBonus: settings.MATCH_STYLE_BONUS,
      stylePenalty: settings.MATCH_STYLE_PENALTY,
      abvTolerance: settings.MATCH_ABV_TOLERANCE,
      abvBonus: settings.MATCH_ABV_BONUS,
      abvPenalty: settings.MATCH_ABV_PENALTY,
    },
  }
}

/**
 * Rank candidates: score desc, then rating count desc, then id asc.
 * Duplicate candidate ids keep their first occurrence.
 */
export function rankCandidates(
  product: ProductState,
  candidates: readonly ExternalBeer[],
  weights: MatchWeights = DEFAULT_MATCH_WEIGHTS
): ScoredCandidate[] {
  const prepared = prepareProduct(product)
  const seen = new Set<string>()
  const scored: ScoredCandidate[] = []

  for (const beer of candidates) {
    if (seen.has(beer.id)) continue
    seen.add(beer.id)
    scored.push(scoreCandidate(prepared, beer, weights))
  }

  return scored.sort(
    (a, b) =>
      b.score - a.score ||
      b.beer.ratingCount - a.beer.ratingCount ||
      (a.beer.id < b.beer.id ? -1 : a.beer.id > b.beer.id ? 1 : 0)
  )
}

/**
 * Decide link / ambiguous / unmatched. Deterministic for a given product,
 * candidate set and config.
 */
export function match(
  product: ProductState,
  candidates: readonly ExternalBeer[],
  config: MatcherConfig = DEFAULT_MATCHER_CONFIG
): MatchResult {
  const ranked = rankCandidates(product, candidates, config.weights)
  const top = ranked[0]
  if (!top) {
    return { kind: 'unmatched', best: null }
  }

  const contenders = ranked.filter((c) => c === top || top.score - c.score < config.ambiguityMargin)
  const contested = contenders.length > 1

  if (top.score >= config.highThreshold && !(contested && config.contestHighScores)) {
    return { kind: 'linked', beer: top.beer, confidence: top.score, method: 'fuzzy' }
  }

  if (top.score >= config.ambiguousLow && contested) {
    return { kind: 'ambiguous', candidates: contenders.slice(0, config.maxCandidates) }
  }

  return { kind: 'unmatched', best: top }
}

export interface Resolution {
  result: MatchResult
  /** Beer records fetched while resolving (for the cache) */
  fetched: ExternalBeer[]
  lookups: number
}

export interface MatcherDeps {
  beerDatabase: BeerDatabaseAdapter
  guard: ClientGuard
  policy?: RetryPolicy
}

export class Matcher {
  readonly config: MatcherConfig
  private readonly beerDatabase: BeerDatabaseAdapter
  private readonly guard: ClientGuard
  private readonly policy: RetryPolicy

  constructor(deps: MatcherDeps, config: MatcherConfig = DEFAULT_MATCHER_CONFIG) {
    this.config = config
    this.beerDatabase = deps.beerDatabase
    this.guard = deps.guard
    this.policy = deps.policy ?? DEFAULT_RETRY_POLICY
  }

  match(product: ProductState, candidates: readonly ExternalBeer[]): MatchResult {
    return match(product, candidates, this.config)
  }

  async resolve(product: ProductState, existing: Link | null): Promise<Resolution> {
    const fetched: ExternalBeer[] = []

    // 1. Exact-id short-circuit
    if (existing?.status === 'active' && existing.externalId) {
      const externalId = existing.externalId
      const beer = await this.guard.call(
        'beerdb',
        ({ budget, signal }) => this.beerDatabase.getById(externalId, { budget, signal }),
        this.policy
      )

      if (beer) {
        return {
          result: {
            kind: 'linked',
            beer,
            confidence: existing.confidence,
            method: existing.method === 'manual' ? 'manual' : 'exact-id',
          },
          fetched: [beer],
          lookups: 0,
        }
      }

      log.info('LINKED_BEER_GONE', {
        event_name: 'LINKED_BEER_GONE',
        productId: product.id,
        externalId,
      })
    }

    // 2. Candidate retrieval, bounded per product
    const queries = queryVariations(product.name, product.brewery).slice(0, this.config.maxLookups)
    let candidates: ExternalBeer[] = []
    let lookups = 0

    for (const query of queries) {
      lookups++
      const results = await this.guard.call(
        'beerdb',
        ({ budget, signal }) => this.beerDatabase.lookupByBrewery(query, { budget, signal }),
        this.policy
      )
      if (results.length > 0) {
        candidates = results
        break
      }
    }

    fetched.push(...candidates)

    // A manual rejection of an id removes it from consideration
    const blocked = existing?.rejection?.origin === 'manual' ? existing.rejection.externalId : null
    const eligible = blocked ? candidates.filter((beer) => beer.id !== blocked) : candidates

    // 3-4. Score and decide
    const result = match(product, eligible, this.config)

    log.debug('MATCH_DECISION', {
      event_name: 'MATCH_DECISION',
      productId: product.id,
      decision: result.kind,
      candidates: eligible.length,
      lookups,
      topScore: topScore(result),
    })

    return { result, fetched, lookups }
  }
}

function topScore(result: MatchResult): number | null {
  switch (result.kind) {
    case 'linked':
      return result.confidence
    case 'ambiguous':
      return result.candidates[0]?.score ?? null
    case 'unmatched':
      return result.best?.score ?? null
  }
}

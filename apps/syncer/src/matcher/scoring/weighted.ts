/**
 * Weighted similarity scoring of a retailer product against one external beer.
 *
 * base  = (wName · nameSim + wBrewery · brewerySim) / (wName + wBrewery)
 * score = clamp(base + style + abv, 0, 1)
 *
 * Style and ABV only nudge the score: both are recorded inconsistently
 * across sources.
 */

import type { ExternalBeer, ProductState, ScoredCandidate } from '../../catalog/types'
import type { NormalizedBrewery, NormalizedText } from '../../normalizer'
import { GENERIC_BREWERY_TOKENS, normalize, normalizeBrewery, styleFamily } from '../../normalizer'
import type { TokenWeight } from './text-similarity'
import { tokenSimilarity } from './text-similarity'

export interface MatchWeights {
  name: number
  brewery: number
  styleBonus: number
  stylePenalty: number
  /** ABV difference (percentage points) still considered the same beer */
  abvTolerance: number
  abvBonus: number
  abvPenalty: number
  /** Weight of generic brewery tokens ("brewing", "co") in token overlap */
  genericTokenWeight: number
}

export const DEFAULT_MATCH_WEIGHTS: MatchWeights = {
  name: 0.6,
  brewery: 0.4,
  styleBonus: 0.03,
  stylePenalty: 0.1,
  abvTolerance: 0.5,
  abvBonus: 0.03,
  abvPenalty: 0.15,
  genericTokenWeight: 0.25,
}

export interface PreparedProduct {
  name: NormalizedText
  brewery: NormalizedBrewery | null
  styleFamily: string | null
  abv: number | null
}

export function prepareProduct(product: ProductState): PreparedProduct {
  const brewery = normalizeBrewery(product.brewery)
  return {
    name: normalize(product.name),
    brewery: brewery.tokens.length > 0 ? brewery : null,
    styleFamily: styleFamily(product.style),
    abv: product.abv,
  }
}

export function scoreCandidate(
  product: PreparedProduct,
  beer: ExternalBeer,
  weights: MatchWeights = DEFAULT_MATCH_WEIGHTS
): ScoredCandidate {
  const genericWeight: TokenWeight = (token) =>
    GENERIC_BREWERY_TOKENS.has(token) ? weights.genericTokenWeight : 1

  const beerName = normalize(beer.name)
  const beerBrewery = normalizeBrewery(beer.brewery)

  let nameScore: number
  let breweryScore: number
  let base: number

  if (product.brewery) {
    // Retailer names often repeat the brewery: "Lervig Tasty Juice" vs "Tasty Juice"
    const breweryTokens = new Set(product.brewery.tokens)
    const stripped = product.name.tokens.filter((t) => !breweryTokens.has(t))
    nameScore = Math.max(
      tokenSimilarity(product.name.tokens, beerName.tokens),
      stripped.length > 0 ? tokenSimilarity(stripped, beerName.tokens) : 0
    )
    breweryScore = tokenSimilarity(product.brewery.tokens, beerBrewery.tokens, genericWeight)

    const totalWeight = weights.name + weights.brewery
    base = (weights.name * nameScore + weights.brewery * breweryScore) / totalWeight
  } else {
    // No brewery field: compare the whole name against "brewery + name"
    const combined = [...beerBrewery.tokens, ...beerName.tokens]
    nameScore = tokenSimilarity(product.name.tokens, combined, genericWeight)
    breweryScore = nameScore
    base = nameScore
  }

  const style = styleAdjustment(product.styleFamily, styleFamily(beer.style), weights)
  const abv = abvAdjustment(product.abv, beer.abv, weights)

  return {
    beer,
    score: round(clamp(base + style + abv)),
    breakdown: {
      name: round(nameScore),
      brewery: round(breweryScore),
      style,
      abv,
    },
  }
}

function styleAdjustment(productFamily: string | null, beerFamily: string | null, weights: MatchWeights): number {
  if (!productFamily || !beerFamily) return 0
  return productFamily === beerFamily ? weights.styleBonus : -weights.stylePenalty
}

function abvAdjustment(productAbv: number | null, beerAbv: number | null, weights: MatchWeights): number {
  if (productAbv === null || beerAbv === null) return 0
  return Math.abs(productAbv - beerAbv) <= weights.abvTolerance + 1e-9 ? weights.abvBonus : -weights.abvPenalty
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value))
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000
}

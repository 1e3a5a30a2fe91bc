import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_MATCHER_CONFIG, Matcher, match, rankCandidates } from '../matcher'
import { prepareProduct, scoreCandidate } from '../scoring/weighted'
import { ClientGuard, DEFAULT_RETRY_POLICY } from '../../fetch/retry'
import { InMemoryRateLimiter, rateLimitFor } from '../../fetch/rate-limiter'
import { TransientExternalError } from '../../lib/errors'
import type { BeerDatabaseAdapter } from '../../adapters/types'
import { T0, beer, link, productState } from '../../__tests__/fixtures'

vi.mock('../../config/logger', () => {
  const mockLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }
  return { logger: { matcher: mockLogger, fetch: mockLogger } }
})

// ═══════════════════════════════════════════════════════════════════════════════
// Scoring
// ═══════════════════════════════════════════════════════════════════════════════

describe('scoreCandidate', () => {
  it('scores an identical beer at the ceiling with both bonuses', () => {
    const scored = scoreCandidate(prepareProduct(productState()), beer())

    expect(scored.score).toBe(1)
    expect(scored.breakdown).toEqual({ name: 1, brewery: 1, style: 0.03, abv: 0.03 })
  })

  it('strips brewery tokens repeated in the retailer name', () => {
    const scored = scoreCandidate(prepareProduct(productState({ name: 'Lervig Tasty Juice' })), beer())
    expect(scored.breakdown.name).toBe(1)
  })

  it('compares against brewery + name when the product has no brewery', () => {
    const scored = scoreCandidate(
      prepareProduct(productState({ name: 'Lervig Tasty Juice', brewery: null })),
      beer()
    )
    expect(scored.breakdown.name).toBe(1)
    expect(scored.score).toBe(1)
  })

  it('treats an ABV difference at the tolerance as the same beer', () => {
    const prepared = prepareProduct(productState({ abv: 6.5 }))
    expect(scoreCandidate(prepared, beer({ abv: 7.0 })).breakdown.abv).toBe(0.03)
    expect(scoreCandidate(prepared, beer({ abv: 7.1 })).breakdown.abv).toBe(-0.15)
  })

  it('applies no style adjustment when either family is unknown', () => {
    const scored = scoreCandidate(prepareProduct(productState()), beer({ style: null }))
    expect(scored.breakdown.style).toBe(0)
  })

  it('penalises a different style family', () => {
    const scored = scoreCandidate(prepareProduct(productState()), beer({ style: 'Imperial Stout' }))
    expect(scored.breakdown.style).toBe(-0.1)
  })
})

// ═══════════════════════════════════════════════════════════════════════════════
// Decisions
// ═══════════════════════════════════════════════════════════════════════════════

describe('match', () => {
  const stronger = beer({ id: 'b-2', abv: 8.0 }) // 1 + 0.03 - 0.15 = 0.88

  it('links a clear winner', () => {
    const result = match(productState(), [stronger, beer()])

    expect(result).toEqual({ kind: 'linked', beer: beer(), confidence: 1, method: 'fuzzy' })
  })

  it('is unmatched with no candidates', () => {
    expect(match(productState(), [])).toEqual({ kind: 'unmatched', best: null })
  })

  const contesting = { ...DEFAULT_MATCHER_CONFIG, contestHighScores: true }

  it('links a high score even when the runner-up is within the margin', () => {
    const twin = beer({ id: 'b-2', ratingCount: 5000 })

    expect(match(productState(), [beer(), twin])).toEqual({ kind: 'linked', beer: twin, confidence: 1, method: 'fuzzy' })
  })

  it('is ambiguous below the high threshold when the runner-up is within the margin', () => {
    const twin = beer({ id: 'b-2', ratingCount: 5000 })
    const result = match(productState(), [beer(), twin], { ...DEFAULT_MATCHER_CONFIG, highThreshold: 1.01 })

    expect(result.kind).toBe('ambiguous')
    if (result.kind !== 'ambiguous') return
    expect(result.candidates.map((c) => c.beer.id)).toEqual(['b-2', 'b-1'])
  })

  it('holds back a contested high score when configured to', () => {
    const twin = beer({ id: 'b-2', ratingCount: 5000 })
    const result = match(productState(), [beer(), twin], contesting)

    expect(result.kind).toBe('ambiguous')
    if (result.kind !== 'ambiguous') return
    // equal scores fall back to rating count
    expect(result.candidates.map((c) => c.beer.id)).toEqual(['b-2', 'b-1'])
  })

  it('widening the margin turns a clear winner into an ambiguous result', () => {
    const result = match(productState(), [beer(), stronger], { ...contesting, ambiguityMargin: 0.2 })

    expect(result.kind).toBe('ambiguous')
    if (result.kind !== 'ambiguous') return
    expect(result.candidates.map((c) => [c.beer.id, c.score])).toEqual([
      ['b-1', 1],
      ['b-2', 0.88],
    ])
  })

  it('caps ambiguous candidates', () => {
    const twins = [beer({ id: 'b-1' }), beer({ id: 'b-2' }), beer({ id: 'b-3' })]
    const result = match(productState(), twins, { ...contesting, maxCandidates: 2 })

    expect(result.kind).toBe('ambiguous')
    if (result.kind !== 'ambiguous') return
    expect(result.candidates.map((c) => c.beer.id)).toEqual(['b-1', 'b-2'])
  })

  it('leaves an uncontested score below the high threshold unmatched', () => {
    const result = match(productState(), [beer()], { ...DEFAULT_MATCHER_CONFIG, highThreshold: 1.01 })

    expect(result.kind).toBe('unmatched')
    if (result.kind !== 'unmatched') return
    expect(result.best?.beer.id).toBe('b-1')
  })

  it('is unmatched for a different beer from the same brewery', () => {
    const other = beer({ id: 'b-9', name: 'Konrads Stout', style: 'Imperial Stout', abv: 10.4 })
    const result = match(productState(), [other])

    expect(result.kind).toBe('unmatched')
    if (result.kind !== 'unmatched') return
    expect(result.best?.beer.id).toBe('b-9')
    expect(result.best?.score).toBeLessThan(DEFAULT_MATCHER_CONFIG.ambiguousLow)
  })

  it('does not depend on candidate order', () => {
    const candidates = [beer({ id: 'b-3', name: 'Tasty Juice Double' }), stronger, beer()]
    const forward = match(productState(), candidates)
    const backward = match(productState(), [...candidates].reverse())

    expect(backward).toEqual(forward)
  })

  it('counts a repeated candidate id once', () => {
    expect(match(productState(), [beer(), beer()]).kind).toBe('linked')
    expect(rankCandidates(productState(), [beer(), beer()])).toHaveLength(1)
  })
})

// ═══════════════════════════════════════════════════════════════════════════════
// Resolution against the beer database
// ═══════════════════════════════════════════════════════════════════════════════

describe('Matcher.resolve', () => {
  let beerDatabase: { lookupByBrewery: ReturnType<typeof vi.fn>; getById: ReturnType<typeof vi.fn> }
  let matcher: Matcher

  beforeEach(() => {
    beerDatabase = { lookupByBrewery: vi.fn().mockResolvedValue([]), getById: vi.fn().mockResolvedValue(null) }
    const guard = new ClientGuard(new InMemoryRateLimiter({ budgets: { beerdb: rateLimitFor(1000) } }), {
      sleep: async () => {},
    })
    matcher = new Matcher({
      beerDatabase: beerDatabase as unknown as BeerDatabaseAdapter,
      guard,
      policy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 2, initialDelayMs: 0, timeoutMs: 1000 },
    })
  })

  it('reaffirms an active link by id without a candidate lookup', async () => {
    beerDatabase.getById.mockResolvedValue(beer())

    const resolution = await matcher.resolve(productState(), link({ confidence: 0.92 }))

    expect(resolution.result).toEqual({ kind: 'linked', beer: beer(), confidence: 0.92, method: 'exact-id' })
    expect(resolution.lookups).toBe(0)
    expect(beerDatabase.getById).toHaveBeenCalledWith('b-1', expect.objectContaining({ budget: expect.anything() }))
    expect(beerDatabase.lookupByBrewery).not.toHaveBeenCalled()
  })

  it('keeps the manual method on reaffirmation', async () => {
    beerDatabase.getById.mockResolvedValue(beer())

    const resolution = await matcher.resolve(productState(), link({ method: 'manual', confidence: 1 }))

    expect(resolution.result.kind === 'linked' && resolution.result.method).toBe('manual')
  })

  it('falls back to candidate retrieval when the linked beer is gone', async () => {
    beerDatabase.lookupByBrewery.mockResolvedValue([beer()])

    const resolution = await matcher.resolve(productState(), link())

    expect(beerDatabase.lookupByBrewery).toHaveBeenCalledWith('lervig', expect.anything())
    expect(resolution.result).toMatchObject({ kind: 'linked', method: 'fuzzy', confidence: 1 })
    expect(resolution.fetched).toEqual([beer()])
  })

  it('walks name prefixes up to the lookup cap when there is no brewery', async () => {
    beerDatabase.lookupByBrewery.mockImplementation(async (query: string) => (query === 'lervig' ? [beer()] : []))

    const resolution = await matcher.resolve(productState({ name: 'Lervig Tasty Juice', brewery: null }), null)

    expect(beerDatabase.lookupByBrewery.mock.calls.map((call) => call[0])).toEqual(['lervig tasty', 'lervig'])
    expect(resolution.lookups).toBe(2)
    expect(resolution.result.kind).toBe('linked')
  })

  it('never offers a manually rejected beer again', async () => {
    beerDatabase.lookupByBrewery.mockResolvedValue([beer()])
    const rejected = link({
      status: 'rejected',
      externalId: null,
      rejection: { reason: 'wrong vintage', origin: 'manual', externalId: 'b-1', rejectedAt: T0 },
    })

    const resolution = await matcher.resolve(productState(), rejected)

    expect(resolution.result).toEqual({ kind: 'unmatched', best: null })
    expect(beerDatabase.getById).not.toHaveBeenCalled()
  })

  it('surfaces lookup failures as transient errors after retrying', async () => {
    const failure = new TransientExternalError('beerdb', 'Service unavailable', { status: 503 })
    beerDatabase.lookupByBrewery.mockRejectedValue(failure)

    await expect(matcher.resolve(productState(), null)).rejects.toBe(failure)
    expect(beerDatabase.lookupByBrewery).toHaveBeenCalledTimes(2)
  })
})

import { describe, expect, it } from 'vitest'
import type { ExternalBeer, Link, Product } from '../../catalog/types'
import { selectForMatching } from '../selection'
import type { SelectionInput } from '../selection'
import { T0, beer, link, product } from '../../__tests__/fixtures'

const now = new Date('2026-03-10T06:00:00.000Z')
const hoursAgo = (h: number) => new Date(now.getTime() - h * 60 * 60 * 1000)

function input(products: Product[], links: Link[] = [], overrides: Partial<SelectionInput> = {}): SelectionInput {
  const beers: ExternalBeer[] = [beer()]
  return {
    products,
    links: new Map(links.map((l) => [l.productId, l])),
    beers: new Map(beers.map((b) => [b.id, b])),
    retryProductIds: new Set(),
    now,
    staleLinkHours: 72,
    unmatchedRetryHours: 24,
    limit: 100,
    ...overrides,
  }
}

describe('selectForMatching', () => {
  it('orders products by reason priority', () => {
    const products = [
      product({ id: 'unmatched', lastMatchAttemptAt: hoursAgo(30) }),
      product({ id: 'stale' }),
      product({ id: 'fresh' }),
      product({ id: 'retry', lastMatchAttemptAt: hoursAgo(1) }),
      product({ id: 'ambiguous', lastMatchAttemptAt: hoursAgo(1) }),
      product({ id: 'new' }),
      product({ id: 'unrated' }),
    ]
    const links = [
      link({ productId: 'stale', reaffirmedAt: hoursAgo(100) }),
      link({ productId: 'fresh', reaffirmedAt: hoursAgo(1) }),
      link({ productId: 'ambiguous', status: 'ambiguous', externalId: null, candidateIds: ['b-1', 'b-2'] }),
      link({ productId: 'unrated', externalId: 'b-unknown', reaffirmedAt: hoursAgo(1) }),
    ]

    const selected = selectForMatching(input(products, links, { retryProductIds: new Set(['retry']) }))

    expect(selected).toEqual([
      { productId: 'new', reason: 'never-attempted' },
      { productId: 'retry', reason: 'transient-retry' },
      { productId: 'ambiguous', reason: 'ambiguous' },
      { productId: 'stale', reason: 'stale-link' },
      { productId: 'unrated', reason: 'missing-rating' },
      { productId: 'unmatched', reason: 'unmatched-retry' },
    ])
  })

  it('counts a linked beer without a rating as missing', () => {
    const products = [product({ id: 'p-1' })]
    const links = [link({ reaffirmedAt: hoursAgo(1) })]
    const beers = new Map([['b-1', beer({ rating: null })]])

    expect(selectForMatching(input(products, links, { beers }))).toEqual([
      { productId: 'p-1', reason: 'missing-rating' },
    ])
  })

  it('waits out the retry window for unmatched products', () => {
    const products = [product({ id: 'p-1', lastMatchAttemptAt: hoursAgo(2) })]
    expect(selectForMatching(input(products))).toEqual([])
  })

  it('skips inactive, excluded and manually rejected products', () => {
    const products = [
      product({ id: 'gone', active: false }),
      product({ id: 'done' }),
      product({ id: 'rejected', lastMatchAttemptAt: hoursAgo(48) }),
    ]
    const links = [
      link({
        productId: 'rejected',
        status: 'rejected',
        externalId: null,
        rejection: { reason: 'not this', origin: 'manual', externalId: 'b-1', rejectedAt: T0 },
      }),
    ]

    expect(selectForMatching(input(products, links, { exclude: new Set(['done']) }))).toEqual([])
  })

  it('retries a hysteresis demotion like any unmatched product', () => {
    const products = [product({ id: 'p-1', lastMatchAttemptAt: hoursAgo(48) })]
    const links = [
      link({
        status: 'rejected',
        rejection: { reason: 'Reaffirmation failed 3 consecutive times', origin: 'hysteresis', externalId: 'b-1', rejectedAt: T0 },
      }),
    ]

    expect(selectForMatching(input(products, links))).toEqual([{ productId: 'p-1', reason: 'unmatched-retry' }])
  })

  it('takes the oldest first within a reason and stops at the limit', () => {
    const products = [
      product({ id: 'b', lastMatchAttemptAt: hoursAgo(30) }),
      product({ id: 'a', lastMatchAttemptAt: hoursAgo(30) }),
      product({ id: 'c', lastMatchAttemptAt: hoursAgo(90) }),
    ]

    expect(selectForMatching(input(products, [], { limit: 2 })).map((s) => s.productId)).toEqual(['c', 'a'])
  })
})

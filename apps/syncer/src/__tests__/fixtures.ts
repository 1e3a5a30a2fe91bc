/**
 * Builders for catalog records used across the syncer tests.
 */

import type { ExternalBeer, Link, Product, ProductState } from '../catalog/types'

export const T0 = new Date('2026-03-01T06:00:00.000Z')

export function productState(overrides: Partial<ProductState> = {}): ProductState {
  return {
    id: 'p-1',
    name: 'Tasty Juice',
    brewery: 'Lervig',
    style: 'IPA',
    abv: 6.5,
    volumeLiters: 0.5,
    price: 49.9,
    available: true,
    releaseDate: null,
    category: 'beer',
    url: null,
    ...overrides,
  }
}

export function product(overrides: Partial<Product> = {}): Product {
  return {
    ...productState(),
    active: true,
    firstSeenAt: T0,
    lastSeenAt: T0,
    lastMatchAttemptAt: null,
    ...overrides,
  }
}

export function beer(overrides: Partial<ExternalBeer> = {}): ExternalBeer {
  return {
    id: 'b-1',
    name: 'Tasty Juice',
    brewery: 'Lervig',
    style: 'IPA - New England',
    rating: 3.9,
    ratingCount: 1200,
    abv: 6.5,
    url: null,
    fetchedAt: T0,
    ...overrides,
  }
}

export function link(overrides: Partial<Link> = {}): Link {
  return {
    productId: 'p-1',
    externalId: 'b-1',
    confidence: 0.9,
    method: 'fuzzy',
    status: 'active',
    createdAt: T0,
    reaffirmedAt: null,
    updatedAt: T0,
    consecutiveFailures: 0,
    candidateIds: [],
    rejection: null,
    previousExternalId: null,
    ...overrides,
  }
}

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60_000)
}

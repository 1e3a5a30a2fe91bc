/**
 * In-process stand-ins for the retailer and the beer database.
 */

import type { ExternalBeer, ProductState } from '../catalog/types'
import type { BeerDatabaseAdapter, CallOptions, CatalogPage, PullCursor, RetailerAdapter } from '../adapters/types'
import { nextCategoryCursor } from '../adapters/types'
import { ExternalRequestError, TransientExternalError } from '../lib/errors'
import { normalizeBrewery } from '../normalizer'

/** A page is a product list, or a failure thrown when the page is requested */
export type FakePage = ProductState[] | 'fail'

export class FakeRetailer implements RetailerAdapter {
  readonly categories: readonly string[]
  readonly requests: PullCursor[] = []
  pages: Record<string, FakePage[]>

  constructor(pages: Record<string, FakePage[]>) {
    this.categories = Object.keys(pages)
    this.pages = pages
  }

  async pullCatalog(cursor: PullCursor | undefined, _options: CallOptions): Promise<CatalogPage> {
    const position = cursor ?? { category: this.categories[0], page: 1 }
    this.requests.push(position)

    const pages = this.pages[position.category] ?? []
    const page = pages[position.page - 1]
    if (page === undefined || page === 'fail') {
      throw new ExternalRequestError('retailer', 400, `retailer refused ${position.category}/${position.page}`)
    }

    return {
      category: position.category,
      products: page,
      nextCursor:
        position.page < pages.length
          ? { category: position.category, page: position.page + 1 }
          : nextCategoryCursor(this.categories, position.category),
      partial: false,
    }
  }

  skipCategory(cursor: PullCursor): PullCursor | null {
    return nextCategoryCursor(this.categories, cursor.category)
  }
}

export class FakeBeerDatabase implements BeerDatabaseAdapter {
  beers: ExternalBeer[]
  /** Brewery queries that fail with a transient error */
  readonly failingQueries = new Set<string>()
  readonly queries: string[] = []

  constructor(beers: ExternalBeer[]) {
    this.beers = beers
  }

  async lookupByBrewery(name: string, _options: CallOptions): Promise<ExternalBeer[]> {
    this.queries.push(name)
    if (this.failingQueries.has(name)) {
      throw new TransientExternalError('beerdb', 'Service unavailable', { status: 503 })
    }
    return this.beers.filter((beer) => normalizeBrewery(beer.brewery).value.startsWith(name))
  }

  async getById(id: string, _options: CallOptions): Promise<ExternalBeer | null> {
    return this.beers.find((beer) => beer.id === id) ?? null
  }
}

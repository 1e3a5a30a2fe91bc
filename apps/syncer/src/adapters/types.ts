/**
 * Capability interfaces for the two upstream sources.
 *
 * Adapters own upstream schema drift: they validate raw payloads and return
 * the normalized shapes in catalog/types. Callers pass a budget token from
 * the rate limiter with every call.
 */

import type { ExternalBeer, ProductState } from '../catalog/types'
import type { BudgetToken } from '../fetch/rate-limiter'

export interface CallOptions {
  budget: BudgetToken
  signal?: AbortSignal
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retailer
// ═══════════════════════════════════════════════════════════════════════════════

/** Position in a multi-category pull. Pages are 1-based. */
export interface PullCursor {
  category: string
  page: number
}

export interface CatalogPage {
  category: string
  products: ProductState[]
  /** Null when the pull has walked every category */
  nextCursor: PullCursor | null
  /** True when records on this page were skipped as malformed */
  partial: boolean
}

export interface RetailerAdapter {
  readonly categories: readonly string[]
  /** Omitting the cursor starts at page 1 of the first category */
  pullCatalog(cursor: PullCursor | undefined, options: CallOptions): Promise<CatalogPage>
  /** First cursor of the category after the cursor's one, or null */
  skipCategory(cursor: PullCursor): PullCursor | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Beer database
// ═══════════════════════════════════════════════════════════════════════════════

export interface BeerDatabaseAdapter {
  /** Beers whose normalized brewery name equals or starts with `name` */
  lookupByBrewery(name: string, options: CallOptions): Promise<ExternalBeer[]>
  /** Null when the id no longer resolves */
  getById(id: string, options: CallOptions): Promise<ExternalBeer | null>
}

/**
 * Walk cursors across categories in order.
 */
export function nextCategoryCursor(categories: readonly string[], current: string): PullCursor | null {
  const index = categories.indexOf(current)
  if (index < 0 || index + 1 >= categories.length) return null
  return { category: categories[index + 1], page: 1 }
}

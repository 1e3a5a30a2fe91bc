/**
 * Retailer catalog adapter (HTTP).
 *
 * GET {baseUrl}/api/products?category=<c>&page=<n> → { products, page, totalPages }
 *
 * Records failing validation are skipped and logged as DataShapeError;
 * the page is then reported as partial. A reply for a page other than the
 * one requested is rejected, and the next cursor always advances from the
 * requested page.
 */

import type { CallOptions, CatalogPage, PullCursor, RetailerAdapter } from '../types'
import { nextCategoryCursor } from '../types'
import type { ProductState } from '../../catalog/types'
import { DataShapeError } from '../../lib/errors'
import { logger } from '../../config/logger'
import { fetchJson, joinUrl } from '../http'
import { formatIssues, rawRecordId } from '../schema'
import { retailerPageSchema, retailerProductSchema, toProductState } from './schema'

const log = logger.retailer

export interface HttpRetailerAdapterOptions {
  baseUrl: string
  categories: readonly string[]
}

export class HttpRetailerAdapter implements RetailerAdapter {
  readonly categories: readonly string[]
  private readonly baseUrl: string

  constructor(options: HttpRetailerAdapterOptions) {
    if (options.categories.length === 0) {
      throw new Error('Retailer adapter needs at least one category')
    }
    this.baseUrl = options.baseUrl
    this.categories = options.categories
  }

  async pullCatalog(cursor: PullCursor | undefined, options: CallOptions): Promise<CatalogPage> {
    const position = cursor ?? { category: this.categories[0], page: 1 }
    const url = joinUrl(this.baseUrl, '/api/products', {
      category: position.category,
      page: position.page,
    })

    const body = await fetchJson('retailer', { url, signal: options.signal })
    if (body === null) {
      throw new DataShapeError('retailer', `Category ${position.category} not found`)
    }

    const envelope = retailerPageSchema.safeParse(body)
    if (!envelope.success) {
      throw new DataShapeError('retailer', 'Malformed retailer page', formatIssues(envelope.error))
    }

    if (envelope.data.page !== position.page) {
      throw new DataShapeError(
        'retailer',
        `Requested page ${position.page} of ${position.category} but received page ${envelope.data.page}`
      )
    }

    const products: ProductState[] = []
    let skipped = 0

    for (const raw of envelope.data.products) {
      const parsed = retailerProductSchema.safeParse(raw)
      if (!parsed.success) {
        skipped++
        const error = new DataShapeError('retailer', 'Malformed retailer product', formatIssues(parsed.error), rawRecordId(raw))
        log.warn('RETAILER_RECORD_SKIPPED', {
          event_name: 'RETAILER_RECORD_SKIPPED',
          category: position.category,
          page: position.page,
          recordId: error.recordId,
          issues: error.issues,
        })
        continue
      }
      products.push(toProductState(parsed.data, position.category))
    }

    const nextCursor =
      position.page < envelope.data.totalPages
        ? { category: position.category, page: position.page + 1 }
        : nextCategoryCursor(this.categories, position.category)

    return {
      category: position.category,
      products,
      nextCursor,
      partial: skipped > 0,
    }
  }

  skipCategory(cursor: PullCursor): PullCursor | null {
    return nextCategoryCursor(this.categories, cursor.category)
  }
}

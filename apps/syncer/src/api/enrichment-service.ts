/**
 * Read API over committed state, plus the manual link operations.
 *
 * Reads only ever see what a cycle committed (or a manual write saved);
 * nothing staged by a running cycle is visible here.
 */

import type { ChangeEvent, Correction, ExternalBeer, Link, Product } from '../catalog/types'
import type { LinkStore } from '../links/link-store'
import type { AcceptedCorrection, CorrectionService, CorrectionSuggestion } from '../links/corrections'
import type { CatalogRepository } from '../store/types'
import { NotFoundError } from '../lib/errors'
import { logger } from '../config/logger'

const log = logger.api

// ═══════════════════════════════════════════════════════════════════════════════
// Derived figures
// ═══════════════════════════════════════════════════════════════════════════════

/** Standard drink: 12 g of alcohol; ethanol weighs 0.8 g/ml */
const GRAMS_PER_UNIT = 12
const ETHANOL_DENSITY = 0.8

export interface DerivedFigures {
  pricePerLiter: number | null
  alcoholUnits: number | null
  /** Rating weighted against price per litre; higher is better value */
  valueScore: number | null
}

export function deriveFigures(
  product: Pick<Product, 'price' | 'volumeLiters' | 'abv'>,
  rating: number | null
): DerivedFigures {
  const pricePerLiter =
    product.price !== null && product.volumeLiters !== null && product.volumeLiters > 0
      ? product.price / product.volumeLiters
      : null

  const alcoholUnits =
    product.volumeLiters !== null && product.abv !== null
      ? (product.volumeLiters * 1000 * (product.abv / 100) * ETHANOL_DENSITY) / GRAMS_PER_UNIT
      : null

  const valueScore =
    rating !== null && rating > 0 && pricePerLiter !== null && pricePerLiter > 0
      ? (rating ** 4.8 / (pricePerLiter / 100) ** 0.32) * 0.0176
      : null

  return { pricePerLiter, alcoholUnits, valueScore }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Service
// ═══════════════════════════════════════════════════════════════════════════════

export interface EnrichedProduct extends DerivedFigures {
  product: Product
  link: Link | null
  beer: ExternalBeer | null
}

export interface EnrichmentServiceDeps {
  repository: CatalogRepository
  linkStore: LinkStore
  corrections: CorrectionService
}

export class EnrichmentService {
  private readonly repository: CatalogRepository
  private readonly linkStore: LinkStore
  private readonly corrections: CorrectionService

  constructor(deps: EnrichmentServiceDeps) {
    this.repository = deps.repository
    this.linkStore = deps.linkStore
    this.corrections = deps.corrections
  }

  async listActiveLinks(): Promise<Link[]> {
    return this.linkStore.listActiveLinks()
  }

  /** Ambiguous links waiting for a person to pick the candidate */
  async listPendingReview(): Promise<Link[]> {
    return this.linkStore.listPendingReview()
  }

  async getEnrichedProduct(productId: string): Promise<EnrichedProduct> {
    const product = await this.requireProduct(productId)
    const link = await this.linkStore.getActiveLink(productId)
    const beer = link?.externalId ? await this.repository.getBeer(link.externalId) : null

    return {
      product,
      link,
      beer,
      ...deriveFigures(product, beer?.rating ?? null),
    }
  }

  /**
   * Change events of every committed cycle after `afterCycleId`, in commit
   * order. Without a cursor, starts at the first committed cycle. The
   * iterable ends at the latest commit; call again with the last cycle id
   * to continue.
   */
  async *subscribeToChangeEvents(options: { afterCycleId?: string } = {}): AsyncGenerator<ChangeEvent> {
    const cycles = await this.repository.listCommittedCycles()
    let start = 0

    if (options.afterCycleId !== undefined) {
      const index = cycles.findIndex((c) => c.cycleId === options.afterCycleId)
      if (index < 0) {
        throw new NotFoundError('Cycle', options.afterCycleId)
      }
      start = index + 1
    }

    for (const cycle of cycles.slice(start)) {
      const events = await this.repository.getChangeEvents(cycle.cycleId)
      yield* events
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Manual link operations
  // ─────────────────────────────────────────────────────────────────────────────

  async overrideLink(productId: string, externalId: string): Promise<Link> {
    await this.requireProduct(productId)
    const link = await this.linkStore.override(productId, externalId)
    log.info('API_LINK_OVERRIDE', { event_name: 'API_LINK_OVERRIDE', productId, externalId })
    return link
  }

  async rejectLink(productId: string, reason: string): Promise<Link> {
    await this.requireProduct(productId)
    return this.linkStore.reject(productId, reason)
  }

  async releaseRejections(productIds?: readonly string[]): Promise<string[]> {
    return this.linkStore.releaseRejections(productIds)
  }

  async suggestCorrection(suggestion: CorrectionSuggestion): Promise<Correction> {
    return this.corrections.suggest(suggestion)
  }

  async acceptCorrection(correctionId: string): Promise<AcceptedCorrection> {
    return this.corrections.accept(correctionId)
  }

  async declineCorrection(correctionId: string): Promise<Correction> {
    return this.corrections.decline(correctionId)
  }

  async listPendingCorrections(): Promise<Correction[]> {
    return this.corrections.listPending()
  }

  private async requireProduct(productId: string): Promise<Product> {
    const product = await this.repository.getProduct(productId)
    if (!product) {
      throw new NotFoundError('Product', productId)
    }
    return product
  }
}

/**
 * User-suggested link corrections.
 *
 * A correction names the external beer a product should link to. Accepting
 * one applies a manual override. With AUTO_ACCEPT_CORRECTIONS on,
 * suggestions are accepted as they arrive.
 */

import { randomUUID } from 'node:crypto'
import type { Correction, CorrectionStatus, Link, Product } from '../catalog/types'
import { NotFoundError } from '../lib/errors'
import { logger } from '../config/logger'
import type { LinkStore } from './link-store'

const log = logger.links.child('corrections')

export interface CorrectionRepository {
  getProduct(id: string): Promise<Product | null>
  getCorrection(id: string): Promise<Correction | null>
  listCorrections(filter?: { status?: CorrectionStatus; productId?: string }): Promise<Correction[]>
  saveCorrection(correction: Correction): Promise<void>
}

export interface CorrectionSuggestion {
  productId: string
  externalId: string
  suggestedBy: string
  note?: string
}

export interface CorrectionServiceOptions {
  repository: CorrectionRepository
  linkStore: LinkStore
  autoAccept: boolean
  now?: () => Date
  generateId?: () => string
}

export interface AcceptedCorrection {
  correction: Correction
  link: Link
}

export class CorrectionService {
  private readonly repository: CorrectionRepository
  private readonly linkStore: LinkStore
  private readonly autoAccept: boolean
  private readonly now: () => Date
  private readonly generateId: () => string

  constructor(options: CorrectionServiceOptions) {
    this.repository = options.repository
    this.linkStore = options.linkStore
    this.autoAccept = options.autoAccept
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? randomUUID
  }

  async suggest(suggestion: CorrectionSuggestion): Promise<Correction> {
    const product = await this.repository.getProduct(suggestion.productId)
    if (!product) {
      throw new NotFoundError('Product', suggestion.productId)
    }

    const correction: Correction = {
      id: this.generateId(),
      productId: suggestion.productId,
      externalId: suggestion.externalId.trim(),
      suggestedBy: suggestion.suggestedBy,
      note: suggestion.note?.trim() || null,
      status: 'pending',
      createdAt: this.now(),
      resolvedAt: null,
    }
    await this.repository.saveCorrection(correction)

    log.info('CORRECTION_SUGGESTED', {
      event_name: 'CORRECTION_SUGGESTED',
      correctionId: correction.id,
      productId: correction.productId,
      externalId: correction.externalId,
      autoAccept: this.autoAccept,
    })

    if (this.autoAccept) {
      const { correction: accepted } = await this.accept(correction.id)
      return accepted
    }
    return correction
  }

  async accept(correctionId: string): Promise<AcceptedCorrection> {
    const correction = await this.requirePending(correctionId)
    const link = await this.linkStore.override(correction.productId, correction.externalId)

    const accepted: Correction = { ...correction, status: 'accepted', resolvedAt: this.now() }
    await this.repository.saveCorrection(accepted)

    // Other pending suggestions for the product are settled by this one
    const pending = await this.repository.listCorrections({ productId: correction.productId, status: 'pending' })
    const superseded = pending.filter((other) => other.id !== correction.id)
    for (const other of superseded) {
      await this.repository.saveCorrection({ ...other, status: 'declined', resolvedAt: accepted.resolvedAt })
    }

    log.info('CORRECTION_ACCEPTED', {
      event_name: 'CORRECTION_ACCEPTED',
      correctionId,
      productId: correction.productId,
      externalId: correction.externalId,
      supersededCount: superseded.length,
    })
    return { correction: accepted, link }
  }

  async decline(correctionId: string): Promise<Correction> {
    const correction = await this.requirePending(correctionId)
    const declined: Correction = { ...correction, status: 'declined', resolvedAt: this.now() }
    await this.repository.saveCorrection(declined)
    return declined
  }

  async listPending(): Promise<Correction[]> {
    return this.repository.listCorrections({ status: 'pending' })
  }

  private async requirePending(correctionId: string): Promise<Correction> {
    const correction = await this.repository.getCorrection(correctionId)
    if (!correction || correction.status !== 'pending') {
      throw new NotFoundError('Pending correction', correctionId)
    }
    return correction
  }
}

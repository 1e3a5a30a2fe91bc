/**
 * Link Store - sole writer of product → external beer links.
 *
 * Rules:
 * - linked, same external id      → reaffirm (timestamp, failure counter reset)
 * - linked, different external id → relink (previous id recorded)
 * - ambiguous / unmatched never removes an active link; it counts a failed
 *   reaffirmation, and LINK_FAILURE_THRESHOLD consecutive failures demote
 *   the link to rejected (hysteresis)
 * - unmatched after ambiguous takes the product out of the review queue
 * - manual links are never changed by automatic upserts
 * - a manual rejection of id X blocks automatic linking to X
 *
 * At most one link record exists per product, so at most one is active.
 * Writes for one product are serialized. Cycle writes are staged in a
 * LinkBatch and committed with the rest of the cycle.
 */

import type { Link, MatchResult } from '../catalog/types'
import { ConsistencyViolation } from '../lib/errors'
import { KeyedMutex } from '../lib/keyed-mutex'
import { logger } from '../config/logger'

const log = logger.links

export interface LinkRepository {
  getLink(productId: string): Promise<Link | null>
  listLinks(): Promise<Link[]>
  saveLink(link: Link): Promise<void>
}

export type LinkWriteOutcome =
  | 'created'
  | 'reaffirmed'
  | 'relinked'
  | 'failure-recorded'
  | 'demoted'
  | 'ambiguous'
  | 'review-cleared'
  | 'unchanged'
  | 'blocked'
  | 'manual-kept'
  | 'rejected'
  | 'overridden'
  | 'released'

export interface LinkWrite {
  outcome: LinkWriteOutcome
  link: Link | null
}

/**
 * Link writes of one cycle, committed atomically with the cycle.
 * A second write for the same product is an invariant breach.
 */
export class LinkBatch {
  readonly cycleId: string
  private readonly writes = new Map<string, Link>()

  constructor(cycleId: string, initial: readonly Link[] = []) {
    this.cycleId = cycleId
    for (const link of initial) {
      this.stage(link)
    }
  }

  stage(link: Link): void {
    if (this.writes.has(link.productId)) {
      throw new ConsistencyViolation('Second link write for one product in a cycle', {
        cycleId: this.cycleId,
        productId: link.productId,
      })
    }
    this.writes.set(link.productId, link)
  }

  has(productId: string): boolean {
    return this.writes.has(productId)
  }

  links(): Link[] {
    return [...this.writes.values()]
  }

  get size(): number {
    return this.writes.size
  }
}

export interface LinkStoreOptions {
  repository: LinkRepository
  failureThreshold: number
  now?: () => Date
}

export interface WriteOptions {
  batch?: LinkBatch
}

export class LinkStore {
  private readonly repository: LinkRepository
  private readonly failureThreshold: number
  private readonly now: () => Date
  private readonly mutex = new KeyedMutex()

  constructor(options: LinkStoreOptions) {
    if (options.failureThreshold < 1) {
      throw new Error('failureThreshold must be at least 1')
    }
    this.repository = options.repository
    this.failureThreshold = options.failureThreshold
    this.now = options.now ?? (() => new Date())
  }

  async getActiveLink(productId: string): Promise<Link | null> {
    const link = await this.repository.getLink(productId)
    return link?.status === 'active' ? link : null
  }

  async listActiveLinks(): Promise<Link[]> {
    return (await this.repository.listLinks()).filter((link) => link.status === 'active')
  }

  async listPendingReview(): Promise<Link[]> {
    return (await this.repository.listLinks()).filter((link) => link.status === 'ambiguous')
  }

  /**
   * Apply a matcher decision.
   */
  async upsert(productId: string, result: MatchResult, options: WriteOptions = {}): Promise<LinkWrite> {
    return this.write(productId, options, (current, now) => this.applyResult(productId, current, result, now))
  }

  /**
   * Manual rejection. Blocks automatic relinking to the rejected id.
   */
  async reject(productId: string, reason: string, options: WriteOptions = {}): Promise<Link> {
    const write = await this.write(productId, options, (current, now) => {
      const base = current ?? blankLink(productId, now)
      return {
        outcome: 'rejected',
        link: {
          ...base,
          status: 'rejected',
          candidateIds: [],
          updatedAt: now,
          rejection: {
            reason,
            origin: 'manual',
            externalId: current?.externalId ?? null,
            rejectedAt: now,
          },
        },
      }
    })
    log.info('LINK_REJECTED', { event_name: 'LINK_REJECTED', productId, reason })
    return requireLink(write)
  }

  /**
   * Manual override. Always wins and is never replaced by automatic upserts.
   */
  async override(productId: string, externalId: string, options: WriteOptions = {}): Promise<Link> {
    const write = await this.write(productId, options, (current, now) => ({
      outcome: 'overridden',
      link: {
        productId,
        externalId,
        confidence: 1,
        method: 'manual',
        status: 'active',
        createdAt: now,
        reaffirmedAt: now,
        updatedAt: now,
        consecutiveFailures: 0,
        candidateIds: [],
        rejection: null,
        previousExternalId:
          current?.externalId && current.externalId !== externalId ? current.externalId : current?.previousExternalId ?? null,
      },
    }))
    log.info('LINK_OVERRIDDEN', { event_name: 'LINK_OVERRIDDEN', productId, externalId })
    return requireLink(write)
  }

  /**
   * Lift manual rejections so the products are matched automatically again.
   * Without ids, every manual rejection is released.
   */
  async releaseRejections(productIds?: readonly string[]): Promise<string[]> {
    const wanted = productIds ? new Set(productIds) : null
    const candidates = (await this.repository.listLinks()).filter(
      (link) => link.rejection?.origin === 'manual' && (!wanted || wanted.has(link.productId))
    )

    const released: string[] = []
    for (const link of candidates) {
      await this.write(link.productId, {}, (current, now) => {
        if (current?.rejection?.origin !== 'manual') {
          return { outcome: 'unchanged', link: null }
        }
        released.push(current.productId)
        return {
          outcome: 'released',
          link: {
            ...current,
            status: current.status === 'active' ? 'active' : 'rejected',
            externalId: current.status === 'active' ? current.externalId : null,
            rejection: null,
            updatedAt: now,
          },
        }
      })
    }

    if (released.length > 0) {
      log.info('LINK_REJECTIONS_RELEASED', { event_name: 'LINK_REJECTIONS_RELEASED', count: released.length })
    }
    return released
  }

  // ═══════════════════════════════════════════════════════════════════════════════

  private async write(
    productId: string,
    options: WriteOptions,
    decide: (current: Link | null, now: Date) => LinkWrite
  ): Promise<LinkWrite> {
    return this.mutex.run(productId, async () => {
      if (options.batch?.has(productId)) {
        throw new ConsistencyViolation('Second link write for one product in a cycle', {
          cycleId: options.batch.cycleId,
          productId,
        })
      }

      const current = await this.repository.getLink(productId)
      const write = decide(current, this.now())

      if (write.link) {
        if (options.batch) {
          options.batch.stage(write.link)
        } else {
          await this.repository.saveLink(write.link)
        }
      }
      return write
    })
  }

  private applyResult(productId: string, current: Link | null, result: MatchResult, now: Date): LinkWrite {
    const active = current?.status === 'active' ? current : null

    if (active?.method === 'manual') {
      if (result.kind === 'linked' && result.beer.id === active.externalId) {
        return {
          outcome: 'reaffirmed',
          link: { ...active, reaffirmedAt: now, updatedAt: now, consecutiveFailures: 0 },
        }
      }
      return { outcome: 'manual-kept', link: null }
    }

    if (result.kind === 'linked') {
      const blocked = current?.rejection?.origin === 'manual' && current.rejection.externalId === result.beer.id
      if (blocked) {
        return { outcome: 'blocked', link: null }
      }

      if (active && active.externalId === result.beer.id) {
        return {
          outcome: 'reaffirmed',
          link: {
            ...active,
            confidence: result.confidence,
            method: result.method,
            reaffirmedAt: now,
            updatedAt: now,
            consecutiveFailures: 0,
          },
        }
      }

      return {
        outcome: active ? 'relinked' : 'created',
        link: {
          productId,
          externalId: result.beer.id,
          confidence: result.confidence,
          method: result.method,
          status: 'active',
          createdAt: now,
          reaffirmedAt: now,
          updatedAt: now,
          consecutiveFailures: 0,
          candidateIds: [],
          // Keep a manual block on another id
          rejection: current?.rejection?.origin === 'manual' ? current.rejection : null,
          previousExternalId: active?.externalId ?? current?.previousExternalId ?? null,
        },
      }
    }

    // ambiguous or unmatched
    if (active) {
      const failures = active.consecutiveFailures + 1
      if (failures >= this.failureThreshold) {
        log.warn('LINK_DEMOTED', {
          event_name: 'LINK_DEMOTED',
          productId,
          externalId: active.externalId,
          failures,
        })
        return {
          outcome: 'demoted',
          link: {
            ...active,
            status: 'rejected',
            consecutiveFailures: failures,
            updatedAt: now,
            rejection: {
              reason: `Reaffirmation failed ${failures} consecutive times`,
              origin: 'hysteresis',
              externalId: active.externalId,
              rejectedAt: now,
            },
          },
        }
      }
      return {
        outcome: 'failure-recorded',
        link: { ...active, consecutiveFailures: failures, updatedAt: now },
      }
    }

    if (result.kind === 'ambiguous') {
      const base = current ?? blankLink(productId, now)
      return {
        outcome: 'ambiguous',
        link: {
          ...base,
          externalId: null,
          status: 'ambiguous',
          method: null,
          confidence: result.candidates[0]?.score ?? 0,
          candidateIds: result.candidates.map((c) => c.beer.id),
          updatedAt: now,
          rejection: current?.rejection?.origin === 'manual' ? current.rejection : null,
        },
      }
    }

    // Candidates no longer contend; back to the unmatched retry schedule
    if (current?.status === 'ambiguous') {
      return {
        outcome: 'review-cleared',
        link: { ...current, status: 'rejected', confidence: 0, candidateIds: [], updatedAt: now },
      }
    }

    return { outcome: 'unchanged', link: null }
  }
}

function blankLink(productId: string, now: Date): Link {
  return {
    productId,
    externalId: null,
    confidence: 0,
    method: null,
    status: 'rejected',
    createdAt: now,
    reaffirmedAt: null,
    updatedAt: now,
    consecutiveFailures: 0,
    candidateIds: [],
    rejection: null,
    previousExternalId: null,
  }
}

function requireLink(write: LinkWrite): Link {
  if (!write.link) {
    throw new ConsistencyViolation('Manual link write produced no link')
  }
  return write.link
}

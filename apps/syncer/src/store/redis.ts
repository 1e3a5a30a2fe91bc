/**
 * Redis-backed repository (STORE_BACKEND=redis).
 *
 * Layout (prefix brewlink:):
 *   products, links, beers, corrections, checkpoints, cycles   hashes of JSON
 *   snapshot:<cycleId>, events:<cycleId>, retry                JSON strings
 *   snapshots:complete, snapshots:partial                      zsets by sequence
 *   seq                                                        snapshot sequence
 *
 * commitCycle holds the commit lock and applies every write in one
 * MULTI/EXEC, so readers see all of a cycle or none of it. The links hash
 * and sequence are WATCHed, so a direct link write that lands between the
 * staged-link check and EXEC makes the attempt start over.
 * Everything read back is validated with zod.
 */

import type Redis from 'ioredis'
import type { ZodType, ZodTypeDef } from 'zod'
import { withRedisLock } from '@brewlink/redis'
import type {
  ChangeEvent,
  Correction,
  CorrectionStatus,
  CycleCheckpoint,
  CycleCommit,
  CycleSummary,
  ExternalBeer,
  Link,
  Product,
  Snapshot,
} from '../catalog/types'
import { ConsistencyViolation } from '../lib/errors'
import { logger } from '../config/logger'
import type { CatalogRepository } from './types'
import { assertCommitConsistent, shouldApplyStagedLink } from './types'
import {
  beerSchema,
  changeEventSchema,
  checkpointSchema,
  correctionSchema,
  cycleSummarySchema,
  idListSchema,
  linkSchema,
  productSchema,
  snapshotSchema,
} from './schemas'

const log = logger.store

const COMMIT_LOCK_TTL_MS = 60_000
const MAX_COMMIT_ATTEMPTS = 5

export interface RedisCatalogRepositoryOptions {
  redis: Redis
  prefix?: string
}

export class CommitLockBusyError extends Error {
  constructor() {
    super('Commit lock is held by another process')
    this.name = 'CommitLockBusyError'
  }
}

export class RedisCatalogRepository implements CatalogRepository {
  private readonly redis: Redis
  private readonly prefix: string

  constructor(options: RedisCatalogRepositoryOptions) {
    this.redis = options.redis
    this.prefix = options.prefix ?? 'brewlink:'
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Reads
  // ═══════════════════════════════════════════════════════════════════════════════

  async getProduct(id: string): Promise<Product | null> {
    return this.parse(productSchema, await this.redis.hget(this.key('products'), id))
  }

  async listProducts(): Promise<Product[]> {
    return this.parseAll(productSchema, await this.redis.hvals(this.key('products')))
  }

  async getLink(productId: string): Promise<Link | null> {
    return this.parse(linkSchema, await this.redis.hget(this.key('links'), productId))
  }

  async listLinks(): Promise<Link[]> {
    return this.parseAll(linkSchema, await this.redis.hvals(this.key('links')))
  }

  async getBeer(id: string): Promise<ExternalBeer | null> {
    return this.parse(beerSchema, await this.redis.hget(this.key('beers'), id))
  }

  async getLatestCompleteSnapshot(): Promise<Snapshot | null> {
    const [cycleId] = await this.redis.zrevrange(this.key('snapshots:complete'), 0, 0)
    if (!cycleId) return null
    return this.parse(snapshotSchema, await this.redis.get(this.key(`snapshot:${cycleId}`)))
  }

  async listPartialSnapshotsAfter(sequence: number): Promise<Snapshot[]> {
    const cycleIds = await this.redis.zrangebyscore(this.key('snapshots:partial'), `(${sequence}`, '+inf')
    const snapshots: Snapshot[] = []
    for (const cycleId of cycleIds) {
      const snapshot = this.parse(snapshotSchema, await this.redis.get(this.key(`snapshot:${cycleId}`)))
      if (snapshot) snapshots.push(snapshot)
    }
    return snapshots
  }

  async listCommittedCycles(): Promise<CycleSummary[]> {
    const cycles = this.parseAll(cycleSummarySchema, await this.redis.hvals(this.key('cycles')))
    return cycles.sort((a, b) => a.sequence - b.sequence)
  }

  async getChangeEvents(cycleId: string): Promise<ChangeEvent[]> {
    const raw = await this.redis.get(this.key(`events:${cycleId}`))
    if (raw === null) return []
    return this.parseAll(changeEventSchema, this.parseJsonArray(raw))
  }

  async getRetryProductIds(): Promise<string[]> {
    return this.parse(idListSchema, await this.redis.get(this.key('retry'))) ?? []
  }

  async getCheckpoint(cycleId: string): Promise<CycleCheckpoint | null> {
    return this.parse(checkpointSchema, await this.redis.hget(this.key('checkpoints'), cycleId))
  }

  async getCorrection(id: string): Promise<Correction | null> {
    return this.parse(correctionSchema, await this.redis.hget(this.key('corrections'), id))
  }

  async listCorrections(filter: { status?: CorrectionStatus; productId?: string } = {}): Promise<Correction[]> {
    const all = this.parseAll(correctionSchema, await this.redis.hvals(this.key('corrections')))
    return all.filter(
      (c) =>
        (filter.status === undefined || c.status === filter.status) &&
        (filter.productId === undefined || c.productId === filter.productId)
    )
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Direct writes
  // ═══════════════════════════════════════════════════════════════════════════════

  async saveLink(link: Link): Promise<void> {
    await this.redis.hset(this.key('links'), link.productId, JSON.stringify(link))
  }

  async saveBeer(beer: ExternalBeer): Promise<void> {
    await this.redis.hset(this.key('beers'), beer.id, JSON.stringify(beer))
  }

  async saveCheckpoint(checkpoint: CycleCheckpoint): Promise<void> {
    await this.redis.hset(this.key('checkpoints'), checkpoint.cycleId, JSON.stringify(checkpoint))
  }

  async deleteCheckpoint(cycleId: string): Promise<void> {
    await this.redis.hdel(this.key('checkpoints'), cycleId)
  }

  async saveCorrection(correction: Correction): Promise<void> {
    await this.redis.hset(this.key('corrections'), correction.id, JSON.stringify(correction))
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Cycle commit
  // ═══════════════════════════════════════════════════════════════════════════════

  async commitCycle(commit: CycleCommit): Promise<CycleSummary> {
    const outcome = await withRedisLock(
      this.redis,
      this.key('lock:commit'),
      () => this.applyCommit(commit),
      COMMIT_LOCK_TTL_MS
    )

    if (!outcome.acquired) {
      throw new CommitLockBusyError()
    }
    return outcome.value
  }

  private async applyCommit(commit: CycleCommit): Promise<CycleSummary> {
    const alreadyCommitted = (await this.redis.hexists(this.key('cycles'), commit.cycleId)) === 1
    assertCommitConsistent(commit, new Set(alreadyCommitted ? [commit.cycleId] : []))

    for (let attempt = 1; attempt <= MAX_COMMIT_ATTEMPTS; attempt++) {
      const summary = await this.tryApplyCommit(commit)
      if (summary) return summary
      log.warn('CYCLE_COMMIT_CONFLICT', { event_name: 'CYCLE_COMMIT_CONFLICT', cycleId: commit.cycleId, attempt })
    }
    throw new Error(`Commit of cycle ${commit.cycleId} kept conflicting with direct link writes`)
  }

  /**
   * One optimistic attempt: resolves to null when links or the sequence
   * changed between the reads and EXEC.
   */
  private async tryApplyCommit(commit: CycleCommit): Promise<CycleSummary | null> {
    await this.redis.watch(this.key('links'), this.key('seq'))

    let links: Link[]
    let sequence: number
    try {
      links = await this.freshLinks(commit)
      sequence = Number((await this.redis.get(this.key('seq'))) ?? '0') + 1
    } catch (error) {
      await this.redis.unwatch()
      throw error
    }

    const snapshot: Snapshot = { ...commit.snapshot, sequence }
    const summary: CycleSummary = {
      cycleId: commit.cycleId,
      sequence,
      committedAt: commit.committedAt,
      complete: snapshot.complete,
      eventCount: commit.events.length,
    }

    const tx = this.redis.multi()
    if (commit.products.length > 0) {
      tx.hset(this.key('products'), toHash(commit.products, (p) => p.id))
    }
    if (links.length > 0) {
      tx.hset(this.key('links'), toHash(links, (l) => l.productId))
    }
    if (commit.beers.length > 0) {
      tx.hset(this.key('beers'), toHash(commit.beers, (b) => b.id))
    }
    tx.set(this.key('seq'), String(sequence))
    tx.set(this.key(`snapshot:${commit.cycleId}`), JSON.stringify(snapshot))
    tx.zadd(this.key(snapshot.complete ? 'snapshots:complete' : 'snapshots:partial'), sequence, commit.cycleId)
    tx.set(this.key(`events:${commit.cycleId}`), JSON.stringify(commit.events))
    tx.set(this.key('retry'), JSON.stringify(commit.retryProductIds))
    tx.hset(this.key('cycles'), commit.cycleId, JSON.stringify(summary))

    const results = await tx.exec()
    if (!results) return null
    for (const [error] of results) {
      if (error) throw error
    }

    log.info('CYCLE_COMMITTED', {
      event_name: 'CYCLE_COMMITTED',
      cycleId: commit.cycleId,
      sequence,
      products: commit.products.length,
      links: links.length,
      skippedLinks: commit.links.length - links.length,
      events: commit.events.length,
    })
    return summary
  }

  private async freshLinks(commit: CycleCommit): Promise<Link[]> {
    if (commit.links.length === 0) return []
    const stored = await this.redis.hmget(this.key('links'), ...commit.links.map((l) => l.productId))
    return commit.links.filter((_, i) => shouldApplyStagedLink(this.parse(linkSchema, stored[i] ?? null), commit.startedAt))
  }

  // ═══════════════════════════════════════════════════════════════════════════════

  private key(name: string): string {
    return `${this.prefix}${name}`
  }

  private parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: string | null): T | null {
    if (raw === null) return null
    return this.validate(schema, this.parseJson(raw))
  }

  private parseAll<T>(schema: ZodType<T, ZodTypeDef, unknown>, raws: readonly unknown[]): T[] {
    return raws.map((raw) => this.validate(schema, typeof raw === 'string' ? this.parseJson(raw) : raw))
  }

  private validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
    const result = schema.safeParse(value)
    if (!result.success) {
      throw new ConsistencyViolation('Stored value failed validation', {
        issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      })
    }
    return result.data
  }

  private parseJson(raw: string): unknown {
    return JSON.parse(raw)
  }

  private parseJsonArray(raw: string): unknown[] {
    const value = this.parseJson(raw)
    return Array.isArray(value) ? value : []
  }
}

function toHash<T>(values: readonly T[], keyOf: (value: T) => string): Record<string, string> {
  return Object.fromEntries(values.map((value) => [keyOf(value), JSON.stringify(value)]))
}

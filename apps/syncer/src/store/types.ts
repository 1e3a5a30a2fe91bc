/**
 * Persistence boundary. The engine only talks to this interface; the
 * in-memory and Redis implementations are interchangeable.
 */

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
import type { LinkRepository } from '../links/link-store'
import type { CorrectionRepository } from '../links/corrections'

export interface CatalogRepository extends LinkRepository, CorrectionRepository {
  // Products
  getProduct(id: string): Promise<Product | null>
  listProducts(): Promise<Product[]>

  // Links (direct writes come from manual Link Store paths)
  getLink(productId: string): Promise<Link | null>
  listLinks(): Promise<Link[]>
  saveLink(link: Link): Promise<void>

  // External beer cache
  getBeer(id: string): Promise<ExternalBeer | null>
  saveBeer(beer: ExternalBeer): Promise<void>

  // Snapshots and cycles
  getLatestCompleteSnapshot(): Promise<Snapshot | null>
  listPartialSnapshotsAfter(sequence: number): Promise<Snapshot[]>
  listCommittedCycles(): Promise<CycleSummary[]>
  getChangeEvents(cycleId: string): Promise<ChangeEvent[]>
  getRetryProductIds(): Promise<string[]>

  // Checkpoints of failed cycles
  saveCheckpoint(checkpoint: CycleCheckpoint): Promise<void>
  getCheckpoint(cycleId: string): Promise<CycleCheckpoint | null>
  deleteCheckpoint(cycleId: string): Promise<void>

  // Corrections
  getCorrection(id: string): Promise<Correction | null>
  listCorrections(filter?: { status?: CorrectionStatus; productId?: string }): Promise<Correction[]>
  saveCorrection(correction: Correction): Promise<void>

  /**
   * Make every write of a cycle visible at once, assigning the snapshot its
   * sequence. Throws ConsistencyViolation for a cycle committed twice or a
   * commit with two links for one product. Staged links older than a link
   * written directly since `startedAt` are dropped.
   */
  commitCycle(commit: CycleCommit): Promise<CycleSummary>
}

/**
 * Checks shared by every implementation before a commit is applied.
 */
export function assertCommitConsistent(commit: CycleCommit, committedCycleIds: ReadonlySet<string>): void {
  if (committedCycleIds.has(commit.cycleId)) {
    throw new ConsistencyViolation(`Cycle ${commit.cycleId} already committed`, { cycleId: commit.cycleId })
  }

  const seen = new Set<string>()
  for (const link of commit.links) {
    if (seen.has(link.productId)) {
      throw new ConsistencyViolation('Two links for one product in a commit', {
        cycleId: commit.cycleId,
        productId: link.productId,
      })
    }
    seen.add(link.productId)
  }
}

/**
 * Keep a staged link unless the stored one was written after the cycle began.
 */
export function shouldApplyStagedLink(stored: Link | null, startedAt: Date): boolean {
  return !stored || stored.updatedAt.getTime() <= startedAt.getTime()
}

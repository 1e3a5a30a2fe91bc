/**
 * In-process repository. Used by tests and single-process deployments
 * (STORE_BACKEND=memory). Values are cloned on the way in and out so callers
 * never share references with stored state.
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
import type { CatalogRepository } from './types'
import { assertCommitConsistent, shouldApplyStagedLink } from './types'

interface State {
  products: Map<string, Product>
  links: Map<string, Link>
  beers: Map<string, ExternalBeer>
  snapshots: Snapshot[]
  events: Map<string, ChangeEvent[]>
  cycles: CycleSummary[]
  retryProductIds: string[]
}

export class InMemoryCatalogRepository implements CatalogRepository {
  private state: State = {
    products: new Map(),
    links: new Map(),
    beers: new Map(),
    snapshots: [],
    events: new Map(),
    cycles: [],
    retryProductIds: [],
  }
  private readonly checkpoints = new Map<string, CycleCheckpoint>()
  private readonly corrections = new Map<string, Correction>()
  private commitChain: Promise<unknown> = Promise.resolve()

  async getProduct(id: string): Promise<Product | null> {
    return copy(this.state.products.get(id) ?? null)
  }

  async listProducts(): Promise<Product[]> {
    return copy([...this.state.products.values()])
  }

  async getLink(productId: string): Promise<Link | null> {
    return copy(this.state.links.get(productId) ?? null)
  }

  async listLinks(): Promise<Link[]> {
    return copy([...this.state.links.values()])
  }

  async saveLink(link: Link): Promise<void> {
    this.state.links.set(link.productId, copy(link))
  }

  async getBeer(id: string): Promise<ExternalBeer | null> {
    return copy(this.state.beers.get(id) ?? null)
  }

  async saveBeer(beer: ExternalBeer): Promise<void> {
    this.state.beers.set(beer.id, copy(beer))
  }

  async getLatestCompleteSnapshot(): Promise<Snapshot | null> {
    const complete = this.state.snapshots.filter((s) => s.complete)
    return copy(complete[complete.length - 1] ?? null)
  }

  async listPartialSnapshotsAfter(sequence: number): Promise<Snapshot[]> {
    return copy(this.state.snapshots.filter((s) => !s.complete && s.sequence > sequence))
  }

  async listCommittedCycles(): Promise<CycleSummary[]> {
    return copy(this.state.cycles)
  }

  async getChangeEvents(cycleId: string): Promise<ChangeEvent[]> {
    return copy(this.state.events.get(cycleId) ?? [])
  }

  async getRetryProductIds(): Promise<string[]> {
    return [...this.state.retryProductIds]
  }

  async saveCheckpoint(checkpoint: CycleCheckpoint): Promise<void> {
    this.checkpoints.set(checkpoint.cycleId, copy(checkpoint))
  }

  async getCheckpoint(cycleId: string): Promise<CycleCheckpoint | null> {
    return copy(this.checkpoints.get(cycleId) ?? null)
  }

  async deleteCheckpoint(cycleId: string): Promise<void> {
    this.checkpoints.delete(cycleId)
  }

  async getCorrection(id: string): Promise<Correction | null> {
    return copy(this.corrections.get(id) ?? null)
  }

  async listCorrections(filter: { status?: CorrectionStatus; productId?: string } = {}): Promise<Correction[]> {
    return copy(
      [...this.corrections.values()].filter(
        (c) =>
          (filter.status === undefined || c.status === filter.status) &&
          (filter.productId === undefined || c.productId === filter.productId)
      )
    )
  }

  async saveCorrection(correction: Correction): Promise<void> {
    this.corrections.set(correction.id, copy(correction))
  }

  /**
   * Build the next state aside and swap it in, one commit at a time.
   */
  async commitCycle(commit: CycleCommit): Promise<CycleSummary> {
    const run = this.commitChain.then(() => this.applyCommit(commit))
    this.commitChain = run.catch(() => undefined)
    return run
  }

  private applyCommit(commit: CycleCommit): CycleSummary {
    const current = this.state
    assertCommitConsistent(commit, new Set(current.cycles.map((c) => c.cycleId)))

    const sequence = (current.cycles[current.cycles.length - 1]?.sequence ?? 0) + 1
    const next: State = {
      products: new Map(current.products),
      links: new Map(current.links),
      beers: new Map(current.beers),
      snapshots: [...current.snapshots, copy({ ...commit.snapshot, sequence })],
      events: new Map(current.events).set(commit.cycleId, copy(commit.events)),
      cycles: current.cycles,
      retryProductIds: [...commit.retryProductIds],
    }

    for (const product of commit.products) {
      next.products.set(product.id, copy(product))
    }
    for (const link of commit.links) {
      if (shouldApplyStagedLink(current.links.get(link.productId) ?? null, commit.startedAt)) {
        next.links.set(link.productId, copy(link))
      }
    }
    for (const beer of commit.beers) {
      next.beers.set(beer.id, copy(beer))
    }

    const summary: CycleSummary = {
      cycleId: commit.cycleId,
      sequence,
      committedAt: commit.committedAt,
      complete: commit.snapshot.complete,
      eventCount: commit.events.length,
    }
    next.cycles = [...current.cycles, summary]

    this.state = next
    return copy(summary)
  }
}

function copy<T>(value: T): T {
  return structuredClone(value)
}

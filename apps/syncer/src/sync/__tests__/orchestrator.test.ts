import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { ProductState } from '../../catalog/types'
import { SyncOrchestrator } from '../orchestrator'
import type { CycleFailure, OrchestratorSettings } from '../orchestrator'
import { Matcher } from '../../matcher/matcher'
import { LinkStore } from '../../links/link-store'
import { InMemoryCatalogRepository } from '../../store/memory'
import { ClientGuard, DEFAULT_RETRY_POLICY } from '../../fetch/retry'
import { InMemoryRateLimiter, rateLimitFor } from '../../fetch/rate-limiter'
import { ConsistencyViolation } from '../../lib/errors'
import { FakeBeerDatabase, FakeRetailer } from '../../__tests__/fake-sources'
import { T0, beer, minutesAfter, productState } from '../../__tests__/fixtures'

const settings: OrchestratorSettings = {
  MATCH_CONCURRENCY: 2,
  MAX_MATCHES_PER_CYCLE: 50,
  LINK_STALE_AFTER_HOURS: 168,
  UNMATCHED_RETRY_AFTER_HOURS: 168,
  PRODUCT_STALE_AFTER_DAYS: 30,
  PRICE_EPSILON: 0.01,
}

const fastPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 1, timeoutMs: 1000 }

const tastyJuice = productState({ id: 'p-1' })
const konrads = productState({ id: 'p-2', name: 'Konrads Stout', style: 'Imperial Stout', abv: 10.4, price: 89.9 })
const mystery = productState({ id: 'p-3', name: 'Mystery Ale', brewery: 'Nobody', style: null, abv: null })
const dryCider = productState({ id: 'c-1', name: 'Dry Cider', brewery: 'Nobody', style: 'Cider', category: 'cider' })

const beers = [
  beer({ id: 'b-1' }),
  beer({ id: 'b-2', name: 'Konrads Stout', style: 'Imperial Stout', abv: 10.4, rating: 4.1, ratingCount: 800 }),
]

describe('SyncOrchestrator', () => {
  let clock: Date
  let repository: InMemoryCatalogRepository
  let retailer: FakeRetailer
  let beerDatabase: FakeBeerDatabase
  let linkStore: LinkStore
  let failures: CycleFailure[]
  let orchestrator: SyncOrchestrator

  function createOrchestrator(
    pages: Record<string, (ProductState[] | 'fail')[]>,
    overrides: Partial<OrchestratorSettings> = {}
  ): SyncOrchestrator {
    retailer = new FakeRetailer(pages)
    const guard = new ClientGuard(
      new InMemoryRateLimiter({ budgets: { retailer: rateLimitFor(1000), beerdb: rateLimitFor(1000) } }),
      { sleep: async () => {} }
    )
    let cycles = 0
    orchestrator = new SyncOrchestrator({
      repository,
      retailer,
      matcher: new Matcher({ beerDatabase, guard, policy: fastPolicy }),
      linkStore,
      guard,
      settings: { ...settings, ...overrides },
      retailerPolicy: fastPolicy,
      now: () => clock,
      generateCycleId: () => `cycle-${++cycles}`,
      onFailure: (failure) => {
        failures.push(failure)
      },
    })
    return orchestrator
  }

  async function runCycle() {
    expect(orchestrator.trigger()).toBe('started')
    return orchestrator.whenIdle()
  }

  beforeEach(() => {
    clock = T0
    failures = []
    repository = new InMemoryCatalogRepository()
    beerDatabase = new FakeBeerDatabase(beers)
    linkStore = new LinkStore({ repository, failureThreshold: 3, now: () => clock })
  })

  // ═══════════════════════════════════════════════════════════════════════════════
  // Committed cycles
  // ═══════════════════════════════════════════════════════════════════════════════

  it('pulls, diffs, matches and commits a cycle', async () => {
    createOrchestrator({ beer: [[tastyJuice, konrads]] })

    const report = await runCycle()

    expect(report).toMatchObject({
      cycleId: 'cycle-1',
      status: 'committed',
      resumedFrom: null,
      partial: false,
      sequence: 1,
      events: 2,
      attempted: 2,
      decisions: { linked: 2, ambiguous: 0, unmatched: 0, transient_error: 0, skipped: 0 },
    })
    expect(await repository.getLink('p-1')).toMatchObject({ externalId: 'b-1', status: 'active', method: 'fuzzy' })
    expect(await repository.getLink('p-2')).toMatchObject({ externalId: 'b-2', status: 'active' })
    expect(await repository.getBeer('b-2')).toMatchObject({ rating: 4.1 })
    expect(await repository.getProduct('p-1')).toMatchObject({ active: true, firstSeenAt: T0, lastMatchAttemptAt: T0 })
    expect((await repository.getChangeEvents('cycle-1')).map((e) => `${e.productId}:${e.kind}`)).toEqual([
      'p-1:new',
      'p-2:new',
    ])
    expect(orchestrator.machine.state).toEqual({ status: 'idle' })
  })

  it('reports new and removed products against the previous snapshot', async () => {
    createOrchestrator({ beer: [[tastyJuice, konrads]] })
    await runCycle()

    clock = minutesAfter(T0, 60)
    retailer.pages = { beer: [[konrads, mystery]] }
    const report = await runCycle()

    expect((await repository.getChangeEvents('cycle-2')).map((e) => `${e.productId}:${e.kind}`)).toEqual([
      'p-3:new',
      'p-1:removed',
    ])
    expect(await repository.getProduct('p-1')).toMatchObject({ active: false })
    // p-2 is linked and fresh; only the new product is matched
    expect(report).toMatchObject({ attempted: 1, decisions: { unmatched: 1 } })
  })

  it('reports only the availability change for a product that sold out', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })
    await runCycle()

    retailer.pages = { beer: [[{ ...tastyJuice, available: false }]] }
    await runCycle()

    expect(await repository.getChangeEvents('cycle-2')).toEqual([
      { cycleId: 'cycle-2', pulledAt: T0, productId: 'p-1', kind: 'availability-changed', before: true, after: false },
    ])
  })

  // ═══════════════════════════════════════════════════════════════════════════════
  // Failures and resume
  // ═══════════════════════════════════════════════════════════════════════════════

  it('commits nothing when a stage fails and resumes from that stage', async () => {
    createOrchestrator({ beer: [[tastyJuice, konrads]] })
    vi.spyOn(repository, 'commitCycle').mockRejectedValueOnce(new Error('disk full'))

    const failed = await runCycle()

    expect(failed).toMatchObject({ status: 'failed', failedStage: 'persisting', attempted: 2 })
    expect(failed?.error).toBe('Cycle cycle-1 failed in persisting: disk full')
    expect(await repository.listCommittedCycles()).toEqual([])
    expect(await repository.getLink('p-1')).toBeNull()
    expect(orchestrator.machine.state).toMatchObject({ status: 'failed', stage: 'persisting' })
    expect(failures).toHaveLength(1)
    expect(failures[0]).toMatchObject({ cycleId: 'cycle-1', stage: 'persisting', resumable: true })
    expect(await repository.getCheckpoint('cycle-1')).toMatchObject({ failedStage: 'persisting', startedAt: T0 })

    const requests = retailer.requests.length
    const queries = beerDatabase.queries.length
    const resumed = await orchestrator.resume('cycle-1')

    expect(resumed).toMatchObject({ cycleId: 'cycle-1', status: 'committed', resumedFrom: 'persisting', sequence: 1 })
    expect(retailer.requests).toHaveLength(requests)
    expect(beerDatabase.queries).toHaveLength(queries)
    expect(await repository.getLink('p-1')).toMatchObject({ externalId: 'b-1' })
    expect(await repository.getCheckpoint('cycle-1')).toBeNull()
  })

  it('fails the pull when no page can be fetched', async () => {
    createOrchestrator({ beer: ['fail'] })

    const report = await runCycle()

    expect(report).toMatchObject({ status: 'failed', failedStage: 'pulling' })
    expect(await repository.getLatestCompleteSnapshot()).toBeNull()

    retailer.pages = { beer: [[tastyJuice]] }
    const resumed = await orchestrator.resume('cycle-1')
    expect(resumed).toMatchObject({ status: 'committed', resumedFrom: 'pulling', events: 1 })
  })

  it('discards a checkpoint once a later cycle has committed', async () => {
    createOrchestrator({ beer: ['fail'] })
    await runCycle()

    clock = minutesAfter(T0, 30)
    retailer.pages = { beer: [[tastyJuice]] }
    await runCycle()

    const resumed = await orchestrator.resume('cycle-1')

    expect(resumed).toMatchObject({ cycleId: 'cycle-1', status: 'superseded' })
    expect(await repository.getCheckpoint('cycle-1')).toBeNull()
    expect((await repository.listCommittedCycles()).map((c) => c.cycleId)).toEqual(['cycle-2'])
  })

  it('resolves resume to null without a checkpoint', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })
    expect(await orchestrator.resume('unknown')).toBeNull()
  })

  it('treats an invariant breach as fatal and not resumable', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })
    vi.spyOn(linkStore, 'upsert').mockRejectedValueOnce(new ConsistencyViolation('two active links', { productId: 'p-1' }))

    const report = await runCycle()

    expect(report).toMatchObject({ status: 'failed', failedStage: 'matching' })
    expect(failures[0]).toMatchObject({ stage: 'matching', resumable: false })
    expect(failures[0].classified.category).toBe('consistency')
    expect(await repository.listCommittedCycles()).toEqual([])
  })

  it('fails the cycle once queued matches drain after an invariant breach', async () => {
    createOrchestrator({ beer: [[tastyJuice, konrads, mystery]] }, { MATCH_CONCURRENCY: 1 })
    const upsert = vi
      .spyOn(linkStore, 'upsert')
      .mockRejectedValueOnce(new ConsistencyViolation('two active links', { productId: 'p-1' }))

    const report = await runCycle()

    expect(report).toMatchObject({ status: 'failed', failedStage: 'matching' })
    expect(upsert).toHaveBeenCalledTimes(1)
    expect(failures).toHaveLength(1)
    expect(orchestrator.isRunning).toBe(false)
    expect(orchestrator.machine.state).toMatchObject({ status: 'failed', stage: 'matching' })
    expect(await repository.listCommittedCycles()).toEqual([])
  })

  // ═══════════════════════════════════════════════════════════════════════════════
  // Per-product failures
  // ═══════════════════════════════════════════════════════════════════════════════

  it('keeps transient lookup failures for the next cycle without aborting', async () => {
    createOrchestrator({ beer: [[tastyJuice, konrads]] })
    beerDatabase.failingQueries.add('lervig')

    const first = await runCycle()

    expect(first).toMatchObject({ status: 'committed', decisions: { transient_error: 2, linked: 0 } })
    expect((await repository.getRetryProductIds()).sort()).toEqual(['p-1', 'p-2'])

    beerDatabase.failingQueries.clear()
    const second = await runCycle()

    expect(second).toMatchObject({ attempted: 2, decisions: { linked: 2 } })
    expect(await repository.getRetryProductIds()).toEqual([])
  })

  // ═══════════════════════════════════════════════════════════════════════════════
  // Partial pulls
  // ═══════════════════════════════════════════════════════════════════════════════

  it('does not remove products of a category whose pull failed', async () => {
    createOrchestrator({ beer: [[tastyJuice]], cider: [[dryCider]] })
    await runCycle()

    clock = minutesAfter(T0, 60)
    retailer.pages = { beer: [[tastyJuice]], cider: ['fail'] }
    const report = await runCycle()

    expect(report).toMatchObject({ status: 'committed', partial: true, events: 0 })
    expect(await repository.getProduct('c-1')).toMatchObject({ active: true })
    expect(await repository.listPartialSnapshotsAfter(1)).toEqual([
      expect.objectContaining({ cycleId: 'cycle-2', complete: false, scope: ['beer'] }),
    ])
  })

  it('sweeps products unseen for the stale window in failing categories', async () => {
    createOrchestrator({ beer: [[tastyJuice]], cider: [[dryCider]] })
    await runCycle()

    clock = minutesAfter(T0, 31 * 24 * 60)
    retailer.pages = { beer: [[tastyJuice]], cider: ['fail'] }
    await runCycle()

    expect((await repository.getChangeEvents('cycle-2')).map((e) => `${e.productId}:${e.kind}`)).toEqual([
      'c-1:removed',
    ])
    expect(await repository.getProduct('c-1')).toMatchObject({ active: false })
  })

  // ═══════════════════════════════════════════════════════════════════════════════
  // Triggers
  // ═══════════════════════════════════════════════════════════════════════════════

  it('defers one cycle behind a running one and coalesces further triggers', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })

    expect(orchestrator.trigger()).toBe('started')
    expect(orchestrator.trigger()).toBe('deferred')
    expect(orchestrator.trigger()).toBe('coalesced')
    expect(orchestrator.hasDeferredCycle).toBe(true)

    const last = await orchestrator.whenIdle()

    expect(last?.cycleId).toBe('cycle-2')
    expect((await repository.listCommittedCycles()).map((c) => c.cycleId)).toEqual(['cycle-1', 'cycle-2'])
    expect(orchestrator.isRunning).toBe(false)
  })

  it('refuses to resume while a cycle runs', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })
    orchestrator.trigger()

    expect(await orchestrator.resume('cycle-1')).toBeNull()
    await orchestrator.whenIdle()
  })

  it('cancels at the next stage boundary without a checkpoint', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })

    orchestrator.trigger()
    expect(orchestrator.cancel()).toBe(true)
    const report = await orchestrator.whenIdle()

    expect(report).toMatchObject({ cycleId: 'cycle-1', status: 'cancelled' })
    expect(orchestrator.machine.state).toEqual({ status: 'idle' })
    expect(await repository.getCheckpoint('cycle-1')).toBeNull()
    expect(await repository.listCommittedCycles()).toEqual([])
    expect(orchestrator.cancel()).toBe(false)
  })

  it('drops a deferred cycle when the running one is cancelled', async () => {
    createOrchestrator({ beer: [[tastyJuice]] })

    orchestrator.trigger()
    expect(orchestrator.trigger()).toBe('deferred')
    orchestrator.cancel()
    const report = await orchestrator.whenIdle()

    expect(report).toMatchObject({ cycleId: 'cycle-1', status: 'cancelled' })
    expect(orchestrator.hasDeferredCycle).toBe(false)
    expect(await repository.listCommittedCycles()).toEqual([])
  })
})

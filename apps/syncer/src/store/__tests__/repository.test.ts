import { describe, it, expect, beforeEach } from 'vitest'
import type { CycleCommit, Snapshot } from '../../catalog/types'
import { ConsistencyViolation } from '../../lib/errors'
import { InMemoryCatalogRepository } from '../memory'
import { CommitLockBusyError, RedisCatalogRepository } from '../redis'
import type { CatalogRepository } from '../types'
import { FakeRedis } from '../../__tests__/fake-redis'
import { T0, beer, link, minutesAfter, product, productState } from '../../__tests__/fixtures'

function commit(cycleId: string, overrides: Partial<CycleCommit> = {}): CycleCommit {
  const snapshot: Omit<Snapshot, 'sequence'> = {
    cycleId,
    takenAt: T0,
    complete: true,
    scope: ['beer'],
    products: [productState()],
  }
  return {
    cycleId,
    startedAt: T0,
    committedAt: minutesAfter(T0, 5),
    products: [product()],
    links: [link()],
    beers: [beer()],
    snapshot,
    events: [],
    retryProductIds: [],
    ...overrides,
  }
}

const backends: [string, () => CatalogRepository][] = [
  ['memory', () => new InMemoryCatalogRepository()],
  ['redis', () => new RedisCatalogRepository({ redis: new FakeRedis().asRedis() })],
]

describe.each(backends)('%s catalog repository', (_name, create) => {
  let repo: CatalogRepository

  beforeEach(() => {
    repo = create()
  })

  it('makes every write of a cycle visible after commit', async () => {
    const summary = await repo.commitCycle(commit('c-1'))

    expect(summary).toEqual({
      cycleId: 'c-1',
      sequence: 1,
      committedAt: minutesAfter(T0, 5),
      complete: true,
      eventCount: 0,
    })
    expect(await repo.getProduct('p-1')).toEqual(product())
    expect(await repo.getLink('p-1')).toEqual(link())
    expect(await repo.getBeer('b-1')).toEqual(beer())
    expect((await repo.getLatestCompleteSnapshot())?.sequence).toBe(1)
  })

  it('assigns increasing sequences', async () => {
    await repo.commitCycle(commit('c-1'))
    const second = await repo.commitCycle(commit('c-2', { links: [] }))

    expect(second.sequence).toBe(2)
    expect((await repo.listCommittedCycles()).map((c) => c.cycleId)).toEqual(['c-1', 'c-2'])
  })

  it('refuses to commit the same cycle twice', async () => {
    await repo.commitCycle(commit('c-1'))

    await expect(repo.commitCycle(commit('c-1'))).rejects.toBeInstanceOf(ConsistencyViolation)
    expect(await repo.listCommittedCycles()).toHaveLength(1)
  })

  it('rejects a commit with two links for one product and writes nothing', async () => {
    const bad = commit('c-1', { links: [link(), link({ externalId: 'b-2' })] })

    await expect(repo.commitCycle(bad)).rejects.toBeInstanceOf(ConsistencyViolation)
    expect(await repo.getProduct('p-1')).toBeNull()
    expect(await repo.getLink('p-1')).toBeNull()
    expect(await repo.getLatestCompleteSnapshot()).toBeNull()
  })

  it('keeps a link written directly after the cycle started', async () => {
    const manual = link({ externalId: 'b-9', method: 'manual', confidence: 1, updatedAt: minutesAfter(T0, 2) })
    await repo.saveLink(manual)

    await repo.commitCycle(commit('c-1'))

    expect(await repo.getLink('p-1')).toEqual(manual)
  })

  it('overwrites a link stored before the cycle started', async () => {
    await repo.saveLink(link({ externalId: 'b-0', updatedAt: minutesAfter(T0, -10) }))

    await repo.commitCycle(commit('c-1'))

    expect((await repo.getLink('p-1'))?.externalId).toBe('b-1')
  })

  it('separates complete and partial snapshots', async () => {
    await repo.commitCycle(commit('c-1'))
    const partialSnapshot: Omit<Snapshot, 'sequence'> = {
      cycleId: 'c-2',
      takenAt: minutesAfter(T0, 60),
      complete: false,
      scope: [],
      products: [],
    }
    await repo.commitCycle(commit('c-2', { links: [], snapshot: partialSnapshot }))

    expect((await repo.getLatestCompleteSnapshot())?.cycleId).toBe('c-1')
    expect((await repo.listPartialSnapshotsAfter(1)).map((s) => s.cycleId)).toEqual(['c-2'])
    expect(await repo.listPartialSnapshotsAfter(2)).toEqual([])
  })

  it('stores change events and the retry set per commit', async () => {
    const event = {
      kind: 'availability-changed' as const,
      cycleId: 'c-1',
      productId: 'p-1',
      pulledAt: T0,
      before: true,
      after: false,
    }
    await repo.commitCycle(commit('c-1', { events: [event], retryProductIds: ['p-7'] }))

    expect(await repo.getChangeEvents('c-1')).toEqual([event])
    expect(await repo.getChangeEvents('missing')).toEqual([])
    expect(await repo.getRetryProductIds()).toEqual(['p-7'])
  })

  it('filters corrections by status and product', async () => {
    const base = {
      externalId: 'b-1',
      suggestedBy: 'editor',
      note: null,
      createdAt: T0,
      resolvedAt: null,
    }
    await repo.saveCorrection({ ...base, id: 'k-1', productId: 'p-1', status: 'pending' })
    await repo.saveCorrection({ ...base, id: 'k-2', productId: 'p-2', status: 'pending' })
    await repo.saveCorrection({ ...base, id: 'k-3', productId: 'p-1', status: 'declined' })

    const pending = await repo.listCorrections({ status: 'pending', productId: 'p-1' })

    expect(pending.map((c) => c.id)).toEqual(['k-1'])
    expect((await repo.getCorrection('k-3'))?.status).toBe('declined')
  })

  it('saves, reads and deletes checkpoints', async () => {
    await repo.saveCheckpoint({
      cycleId: 'c-1',
      startedAt: T0,
      failedStage: 'matching',
      failedAt: T0,
      error: 'beerdb down',
      pulled: null,
      changes: [],
      links: [link()],
      beers: null,
      matchAttempts: ['p-1'],
      retryProductIds: null,
    })

    const checkpoint = await repo.getCheckpoint('c-1')
    expect(checkpoint?.failedAt).toEqual(T0)
    expect(checkpoint?.links).toEqual([link()])

    await repo.deleteCheckpoint('c-1')
    expect(await repo.getCheckpoint('c-1')).toBeNull()
  })
})

describe('RedisCatalogRepository', () => {
  it('refuses to commit while another process holds the commit lock', async () => {
    const redis = new FakeRedis()
    redis.strings.set('brewlink:lock:commit', 'other-owner')
    const repo = new RedisCatalogRepository({ redis: redis.asRedis() })

    await expect(repo.commitCycle(commit('c-1'))).rejects.toBeInstanceOf(CommitLockBusyError)
    expect(await repo.getProduct('p-1')).toBeNull()
  })

  it('releases the commit lock after committing', async () => {
    const redis = new FakeRedis()
    const repo = new RedisCatalogRepository({ redis: redis.asRedis() })

    await repo.commitCycle(commit('c-1'))

    expect(redis.strings.has('brewlink:lock:commit')).toBe(false)
  })

  it('keeps a manual link saved while the commit is reading links', async () => {
    const redis = new FakeRedis()
    const repo = new RedisCatalogRepository({ redis: redis.asRedis() })
    const manual = link({ externalId: 'b-9', method: 'manual', confidence: 1, updatedAt: minutesAfter(T0, 2) })
    const readLinks = redis.hmget.bind(redis)
    let overridden = false
    redis.hmget = async (key, ...fields) => {
      const values = await readLinks(key, ...fields)
      if (!overridden) {
        overridden = true
        await repo.saveLink(manual)
      }
      return values
    }

    const summary = await repo.commitCycle(commit('c-1'))

    expect(summary.sequence).toBe(1)
    expect(await repo.getLink('p-1')).toEqual(manual)
    expect(await repo.getProduct('p-1')).toEqual(product())
  })

  it('uses the configured key prefix', async () => {
    const redis = new FakeRedis()
    const repo = new RedisCatalogRepository({ redis: redis.asRedis(), prefix: 'test:' })

    await repo.commitCycle(commit('c-1'))

    expect(redis.hashes.get('test:products')?.has('p-1')).toBe(true)
    expect(redis.strings.get('test:seq')).toBe('1')
  })

  it('rejects a stored value that fails validation', async () => {
    const redis = new FakeRedis()
    await redis.hset('brewlink:links', 'p-1', JSON.stringify({ productId: 'p-1' }))
    const repo = new RedisCatalogRepository({ redis: redis.asRedis() })

    await expect(repo.getLink('p-1')).rejects.toBeInstanceOf(ConsistencyViolation)
  })
})

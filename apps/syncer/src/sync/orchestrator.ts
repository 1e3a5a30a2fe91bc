/**
 * Sync Orchestrator
 *
 * Drives one cycle at a time through the state machine:
 *
 *   pulling    - walk retailer categories page by page through the client guard
 *   diffing    - diff against the baseline, reconcile with the registry, sweep stale
 *   matching   - resolve selected products on a bounded pool, stage link writes
 *   persisting - commit products, links, beers, snapshot, events and retry set at once
 *
 * A failed stage saves a checkpoint of everything produced so far; resume()
 * restarts the cycle at that stage. Nothing reaches the read side until the
 * commit, so a failure leaves committed state untouched.
 */

import { randomUUID } from 'node:crypto'
import pLimit from 'p-limit'
import type {
  ChangeEvent,
  CycleCheckpoint,
  CycleCommit,
  CycleSummary,
  ExternalBeer,
  Link,
  MatchResult,
  Product,
  ProductState,
  PulledCatalog,
} from '../catalog/types'
import { applyPull } from '../catalog/registry'
import type { PullCursor, RetailerAdapter } from '../adapters/types'
import type { ClientGuard, RetryPolicy } from '../fetch/retry'
import { DEFAULT_RETRY_POLICY } from '../fetch/retry'
import type { Matcher } from '../matcher/matcher'
import type { LinkStore } from '../links/link-store'
import { LinkBatch } from '../links/link-store'
import { buildBaseline, dedupeEvents, diff, reconcileWithRegistry, sweepStaleProducts } from '../snapshot/differ'
import type { CatalogRepository } from '../store/types'
import type { SyncSettings } from '../config/settings'
import { logger } from '../config/logger'
import type { ClassifiedError, SyncStage } from '../lib/errors'
import {
  ConsistencyViolation,
  CycleCancelledError,
  StageFailedError,
  TransientExternalError,
  classifyError,
  errorMessage,
  formatErrorForLog,
} from '../lib/errors'
import type { WorkflowLogger } from '../lib/structured-log'
import { createWorkflowLogger } from '../lib/structured-log'
import { recordChangeEvents, recordCycle, recordCycleDuration, recordDecision } from '../metrics'
import { STAGE_ORDER, SyncStateMachine } from './state-machine'
import type { SelectionReason } from './selection'
import { selectForMatching } from './selection'

const log = logger.sync

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type TriggerOutcome = 'started' | 'deferred' | 'coalesced'

export type DecisionCounts = Record<MatchResult['kind'] | 'transient_error' | 'skipped', number>

export interface CycleReport {
  cycleId: string
  status: 'committed' | 'failed' | 'cancelled' | 'superseded'
  resumedFrom: SyncStage | null
  partial: boolean
  sequence: number | null
  events: number
  attempted: number
  decisions: DecisionCounts
  failedStage: SyncStage | null
  error: string | null
  durationMs: number
}

export interface CycleFailure {
  cycleId: string
  stage: SyncStage
  error: StageFailedError
  classified: ClassifiedError
  /** False for invariant breaches, which need an operator before a retry */
  resumable: boolean
}

export type OrchestratorSettings = Pick<
  SyncSettings,
  | 'MATCH_CONCURRENCY'
  | 'MAX_MATCHES_PER_CYCLE'
  | 'LINK_STALE_AFTER_HOURS'
  | 'UNMATCHED_RETRY_AFTER_HOURS'
  | 'PRODUCT_STALE_AFTER_DAYS'
  | 'PRICE_EPSILON'
>

export interface SyncOrchestratorDeps {
  repository: CatalogRepository
  retailer: RetailerAdapter
  matcher: Matcher
  linkStore: LinkStore
  guard: ClientGuard
  settings: OrchestratorSettings
  retailerPolicy?: RetryPolicy
  now?: () => Date
  generateCycleId?: () => string
  /** Called after a failed cycle has saved its checkpoint */
  onFailure?: (failure: CycleFailure) => Promise<void> | void
}

interface CycleContext {
  cycleId: string
  startedAt: Date
  stage: SyncStage
  resumedFrom: SyncStage | null
  log: WorkflowLogger
  pulled: PulledCatalog | null
  changes: ChangeEvent[] | null
  batch: LinkBatch
  beers: Map<string, ExternalBeer>
  matchAttempts: Set<string>
  transientFailures: Set<string>
  decisions: DecisionCounts
  summary: CycleSummary | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestrator
// ═══════════════════════════════════════════════════════════════════════════════

export class SyncOrchestrator {
  readonly machine = new SyncStateMachine()

  private readonly repository: CatalogRepository
  private readonly retailer: RetailerAdapter
  private readonly matcher: Matcher
  private readonly linkStore: LinkStore
  private readonly guard: ClientGuard
  private readonly settings: OrchestratorSettings
  private readonly retailerPolicy: RetryPolicy
  private readonly now: () => Date
  private readonly generateCycleId: () => string
  private readonly onFailure?: (failure: CycleFailure) => Promise<void> | void

  private active = false
  private deferred = false
  private cancelRequested = false
  private inFlight: Promise<CycleReport | null> = Promise.resolve(null)
  private settled: Promise<void> = Promise.resolve()
  private lastReport: CycleReport | null = null

  constructor(deps: SyncOrchestratorDeps) {
    this.repository = deps.repository
    this.retailer = deps.retailer
    this.matcher = deps.matcher
    this.linkStore = deps.linkStore
    this.guard = deps.guard
    this.settings = deps.settings
    this.retailerPolicy = deps.retailerPolicy ?? DEFAULT_RETRY_POLICY
    this.now = deps.now ?? (() => new Date())
    this.generateCycleId = deps.generateCycleId ?? (() => randomUUID())
    this.onFailure = deps.onFailure
  }

  /**
   * Start a cycle, or defer one behind the running cycle. Only one deferral
   * is kept; further triggers while one is pending coalesce into it.
   */
  trigger(): TriggerOutcome {
    if (!this.active) {
      this.launch(() => this.executeCycle(null))
      return 'started'
    }

    if (!this.deferred) {
      this.deferred = true
      recordCycle('deferred')
      log.info('SYNC_CYCLE_DEFERRED', { event_name: 'SYNC_CYCLE_DEFERRED', state: this.machine.state.status })
      return 'deferred'
    }

    recordCycle('coalesced')
    log.debug('SYNC_CYCLE_COALESCED', { event_name: 'SYNC_CYCLE_COALESCED' })
    return 'coalesced'
  }

  /**
   * Restart a failed cycle at its failed stage. Resolves to null when another
   * cycle is running or no checkpoint exists for the id.
   */
  async resume(cycleId: string): Promise<CycleReport | null> {
    if (this.active) {
      log.info('SYNC_RESUME_SKIPPED_BUSY', { event_name: 'SYNC_RESUME_SKIPPED_BUSY', cycleId })
      return null
    }
    this.launch(() => this.executeResume(cycleId))
    return this.inFlight
  }

  /**
   * Request cancellation of the running cycle. Honoured at the next stage
   * boundary; a stage in progress runs to completion first.
   */
  cancel(): boolean {
    if (!this.active) return false
    this.cancelRequested = true
    log.info('SYNC_CYCLE_CANCEL_REQUESTED', {
      event_name: 'SYNC_CYCLE_CANCEL_REQUESTED',
      state: this.machine.state.status,
    })
    return true
  }

  /**
   * Resolves once the running cycle and any deferred one have finished.
   */
  async whenIdle(): Promise<CycleReport | null> {
    while (this.active) {
      await this.settled
    }
    return this.lastReport
  }

  get isRunning(): boolean {
    return this.active
  }

  get hasDeferredCycle(): boolean {
    return this.deferred
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Run bookkeeping
  // ═══════════════════════════════════════════════════════════════════════════════

  private launch(run: () => Promise<CycleReport | null>): void {
    this.active = true
    this.inFlight = run()
    this.settled = this.inFlight
      .then(
        (report) => {
          if (report) this.lastReport = report
        },
        (error: unknown) => {
          log.error(
            'SYNC_RUN_CRASHED',
            { event_name: 'SYNC_RUN_CRASHED', errorMessage: errorMessage(error) },
            error
          )
        }
      )
      .then(() => this.afterRun())
  }

  private afterRun(): void {
    this.active = false
    if (this.cancelRequested) this.deferred = false
    this.cancelRequested = false

    if (this.deferred) {
      this.deferred = false
      log.info('SYNC_DEFERRED_CYCLE_START', { event_name: 'SYNC_DEFERRED_CYCLE_START' })
      this.launch(() => this.executeCycle(null))
    }
  }

  private async executeResume(cycleId: string): Promise<CycleReport | null> {
    const checkpoint = await this.repository.getCheckpoint(cycleId)
    if (!checkpoint) {
      log.warn('SYNC_RESUME_CHECKPOINT_MISSING', { event_name: 'SYNC_RESUME_CHECKPOINT_MISSING', cycleId })
      return null
    }

    const committed = await this.repository.listCommittedCycles()
    const supersededBy = committed.find((c) => c.committedAt.getTime() > checkpoint.failedAt.getTime())
    if (supersededBy) {
      await this.repository.deleteCheckpoint(cycleId)
      log.info('SYNC_RESUME_SUPERSEDED', {
        event_name: 'SYNC_RESUME_SUPERSEDED',
        cycleId,
        supersededBy: supersededBy.cycleId,
      })
      return {
        ...emptyReport(cycleId, checkpoint.failedStage),
        status: 'superseded',
      }
    }

    return this.executeCycle(checkpoint)
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Cycle
  // ═══════════════════════════════════════════════════════════════════════════════

  private async executeCycle(checkpoint: CycleCheckpoint | null): Promise<CycleReport> {
    const cycleId = checkpoint?.cycleId ?? this.generateCycleId()
    const firstStage = checkpoint?.failedStage ?? 'pulling'

    if (!this.machine.begin(cycleId, firstStage)) {
      throw new ConsistencyViolation('State machine busy while no cycle is active', {
        cycleId,
        status: this.machine.state.status,
      })
    }

    const ctx = this.createContext(cycleId, checkpoint)
    ctx.log.info(checkpoint ? 'CYCLE_RESUMED' : 'CYCLE_STARTED', {
      stage: firstStage,
      restoredLinks: ctx.batch.size,
      restoredAttempts: ctx.matchAttempts.size,
    })

    try {
      for (const stage of STAGE_ORDER.slice(STAGE_ORDER.indexOf(firstStage))) {
        if (this.cancelRequested) {
          throw new CycleCancelledError(cycleId, stage)
        }
        if (stage !== firstStage) {
          this.machine.advance(cycleId, stage)
        }
        ctx.stage = stage
        ctx.log = ctx.log.child({ stage })
        await this.runStage(ctx, stage)
      }
      this.machine.finish(cycleId)
    } catch (error) {
      return this.handleFailure(ctx, error)
    }

    return this.completeCycle(ctx)
  }

  private createContext(cycleId: string, checkpoint: CycleCheckpoint | null): CycleContext {
    const startedAt = checkpoint?.startedAt ?? this.now()
    return {
      cycleId,
      startedAt,
      stage: checkpoint?.failedStage ?? 'pulling',
      resumedFrom: checkpoint?.failedStage ?? null,
      log: createWorkflowLogger(log, {
        workflow: 'catalog-sync',
        stage: checkpoint?.failedStage ?? 'pulling',
        cycleId,
      }),
      pulled: checkpoint?.pulled ?? null,
      changes: checkpoint?.changes ?? null,
      batch: new LinkBatch(cycleId, checkpoint?.links ?? []),
      beers: new Map((checkpoint?.beers ?? []).map((beer) => [beer.id, beer])),
      matchAttempts: new Set(checkpoint?.matchAttempts ?? []),
      transientFailures: new Set(checkpoint?.retryProductIds ?? []),
      decisions: { linked: 0, ambiguous: 0, unmatched: 0, transient_error: 0, skipped: 0 },
      summary: null,
    }
  }

  private async runStage(ctx: CycleContext, stage: SyncStage): Promise<void> {
    switch (stage) {
      case 'pulling':
        ctx.pulled = await this.pull(ctx)
        return
      case 'diffing':
        ctx.changes = await this.diffAgainstBaseline(ctx)
        return
      case 'matching':
        await this.matchSelected(ctx)
        return
      case 'persisting':
        ctx.summary = await this.persist(ctx)
        return
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Pulling
  // ─────────────────────────────────────────────────────────────────────────────

  private async pull(ctx: CycleContext): Promise<PulledCatalog> {
    const categories = this.retailer.categories
    const [firstCategory] = categories
    if (firstCategory === undefined) {
      throw new ConsistencyViolation('Retailer adapter has no categories')
    }

    const pulledAt = this.now()
    const products: ProductState[] = []
    const incomplete = new Set<string>()
    let pages = 0
    let lastError: unknown = null
    let cursor: PullCursor | undefined

    for (;;) {
      const position: PullCursor = cursor ?? { category: firstCategory, page: 1 }

      try {
        const requested = cursor
        const page = await this.guard.call(
          'retailer',
          ({ budget, signal }) => this.retailer.pullCatalog(requested, { budget, signal }),
          this.retailerPolicy
        )
        pages++
        products.push(...page.products)
        if (page.partial) incomplete.add(page.category)
        if (!page.nextCursor) break
        cursor = page.nextCursor
      } catch (error) {
        if (error instanceof ConsistencyViolation) throw error
        lastError = error
        incomplete.add(position.category)
        ctx.log.warn('PULL_CATEGORY_ABANDONED', {
          category: position.category,
          page: position.page,
          ...formatErrorForLog(classifyError(error)),
        })
        const next = this.retailer.skipCategory(position)
        if (!next) break
        cursor = next
      }
    }

    if (pages === 0) {
      throw lastError instanceof Error
        ? lastError
        : new TransientExternalError('retailer', 'No catalog page could be pulled', { cause: lastError })
    }

    const pulled: PulledCatalog = {
      pulledAt,
      products,
      completeCategories: categories.filter((c) => !incomplete.has(c)),
      incompleteCategories: categories.filter((c) => incomplete.has(c)),
      partial: incomplete.size > 0,
    }

    ctx.log.info('PULL_COMPLETE', {
      pages,
      products: products.length,
      completeCategories: pulled.completeCategories,
      incompleteCategories: pulled.incompleteCategories,
      partial: pulled.partial,
    })
    return pulled
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Diffing
  // ─────────────────────────────────────────────────────────────────────────────

  private async diffAgainstBaseline(ctx: CycleContext): Promise<ChangeEvent[]> {
    const pulled = requirePulled(ctx)
    const latest = await this.repository.getLatestCompleteSnapshot()
    const partials = await this.repository.listPartialSnapshotsAfter(latest?.sequence ?? 0)
    const baseline = buildBaseline(latest, partials)
    const registry = indexProducts(await this.repository.listProducts())
    const base = { cycleId: ctx.cycleId, pulledAt: pulled.pulledAt }

    const diffed = diff(baseline, pulled.products, {
      ...base,
      priceEpsilon: this.settings.PRICE_EPSILON,
      scope: pulled.completeCategories,
    })
    const reconciled = reconcileWithRegistry(diffed, registry, pulled.products, base)
    const swept = sweepStaleProducts([...registry.values()], {
      cycleId: ctx.cycleId,
      now: pulled.pulledAt,
      staleAfterDays: this.settings.PRODUCT_STALE_AFTER_DAYS,
      scope: pulled.completeCategories,
      seenIds: new Set(pulled.products.map((p) => p.id)),
    })
    const changes = dedupeEvents([...reconciled, ...swept])

    ctx.log.info('DIFF_COMPLETE', {
      baselineProducts: baseline.length,
      baselinePartials: partials.length,
      events: changes.length,
      swept: swept.length,
    })
    return changes
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Matching
  // ─────────────────────────────────────────────────────────────────────────────

  private async matchSelected(ctx: CycleContext): Promise<void> {
    const pulled = requirePulled(ctx)
    const registry = indexProducts(await this.repository.listProducts())
    for (const product of applyPull(registry, pulled, removedIds(requireChanges(ctx)))) {
      registry.set(product.id, product)
    }

    const links = new Map((await this.repository.listLinks()).map((l) => [l.productId, l]))
    const linkedBeers = await this.loadLinkedBeers(links)
    const retryIds = new Set(await this.repository.getRetryProductIds())

    const selection = selectForMatching({
      products: [...registry.values()],
      links,
      beers: linkedBeers,
      retryProductIds: retryIds,
      now: pulled.pulledAt,
      staleLinkHours: this.settings.LINK_STALE_AFTER_HOURS,
      unmatchedRetryHours: this.settings.UNMATCHED_RETRY_AFTER_HOURS,
      limit: Math.max(0, this.settings.MAX_MATCHES_PER_CYCLE - ctx.matchAttempts.size),
      exclude: ctx.matchAttempts,
    })

    ctx.log.info('MATCHING_SELECTED', {
      selected: selection.length,
      alreadyAttempted: ctx.matchAttempts.size,
      byReason: countBy(selection.map((s) => s.reason)),
    })

    // Queued tasks drain without work once a task has failed, so every promise settles
    const limit = pLimit(this.settings.MATCH_CONCURRENCY)
    const stop: { failed: boolean; error: unknown } = { failed: false, error: null }
    await Promise.allSettled(
      selection.map(({ productId, reason }) =>
        limit(async () => {
          if (stop.failed) return
          const product = registry.get(productId)
          if (!product) return
          try {
            await this.matchOne(ctx, product, links.get(productId) ?? null, reason)
          } catch (error) {
            if (!stop.failed) {
              stop.failed = true
              stop.error = error
            }
          }
        })
      )
    )

    if (stop.failed) throw stop.error

    ctx.log.info('MATCHING_COMPLETE', {
      attempted: ctx.matchAttempts.size,
      staged: ctx.batch.size,
      transientFailures: ctx.transientFailures.size,
      ...ctx.decisions,
    })
  }

  private async matchOne(ctx: CycleContext, product: Product, existing: Link | null, reason: SelectionReason): Promise<void> {
    const productLog = ctx.log.child({ productId: product.id })

    try {
      const { result, fetched } = await this.matcher.resolve(product, existing)
      for (const beer of fetched) {
        ctx.beers.set(beer.id, beer)
      }

      const write = await this.linkStore.upsert(product.id, result, { batch: ctx.batch })
      ctx.transientFailures.delete(product.id)
      ctx.decisions[result.kind]++
      recordDecision(result.kind)
      productLog.debug('PRODUCT_MATCHED', { reason, decision: result.kind, outcome: write.outcome })
    } catch (error) {
      if (error instanceof ConsistencyViolation) throw error

      const classified = classifyError(error)
      if (classified.isRetryable) {
        ctx.transientFailures.add(product.id)
        ctx.decisions.transient_error++
        recordDecision('transient_error')
      } else {
        ctx.decisions.skipped++
        recordDecision('skipped')
      }
      productLog.warn('PRODUCT_MATCH_FAILED', { reason, ...formatErrorForLog(classified) })
    } finally {
      ctx.matchAttempts.add(product.id)
    }
  }

  private async loadLinkedBeers(links: ReadonlyMap<string, Link>): Promise<Map<string, ExternalBeer>> {
    const ids = new Set<string>()
    for (const link of links.values()) {
      if (link.status === 'active' && link.externalId) ids.add(link.externalId)
    }

    const beers = new Map<string, ExternalBeer>()
    const loaded = await Promise.all([...ids].map((id) => this.repository.getBeer(id)))
    for (const beer of loaded) {
      if (beer) beers.set(beer.id, beer)
    }
    return beers
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Persisting
  // ─────────────────────────────────────────────────────────────────────────────

  private async persist(ctx: CycleContext): Promise<CycleSummary> {
    const pulled = requirePulled(ctx)
    const changes = requireChanges(ctx)
    const registry = indexProducts(await this.repository.listProducts())
    const products = indexProducts(applyPull(registry, pulled, removedIds(changes)))
    const committedAt = this.now()

    for (const id of ctx.matchAttempts) {
      const product = products.get(id) ?? registry.get(id)
      if (product) products.set(id, { ...product, lastMatchAttemptAt: committedAt })
    }

    const previousRetry = await this.repository.getRetryProductIds()
    const retryProductIds = [
      ...new Set([...previousRetry.filter((id) => !ctx.matchAttempts.has(id)), ...ctx.transientFailures]),
    ]

    const commit: CycleCommit = {
      cycleId: ctx.cycleId,
      startedAt: ctx.startedAt,
      committedAt,
      products: [...products.values()],
      links: ctx.batch.links(),
      beers: [...ctx.beers.values()],
      snapshot: {
        cycleId: ctx.cycleId,
        takenAt: pulled.pulledAt,
        complete: !pulled.partial,
        scope: pulled.completeCategories,
        products: uniqueById(pulled.products),
      },
      events: changes,
      retryProductIds,
    }

    return this.repository.commitCycle(commit)
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Outcomes
  // ═══════════════════════════════════════════════════════════════════════════════

  private async completeCycle(ctx: CycleContext): Promise<CycleReport> {
    const summary = ctx.summary
    const changes = ctx.changes ?? []
    const partial = ctx.pulled?.partial ?? false

    if (ctx.resumedFrom) {
      try {
        await this.repository.deleteCheckpoint(ctx.cycleId)
      } catch (error) {
        ctx.log.warn('CHECKPOINT_DELETE_FAILED', { errorMessage: errorMessage(error) })
      }
    }

    for (const [kind, count] of Object.entries(countBy(changes.map((e) => e.kind)))) {
      if (isChangeKind(kind) && count !== undefined) recordChangeEvents(kind, count)
    }
    recordCycle(partial ? 'partial' : 'committed')

    const report: CycleReport = {
      ...emptyReport(ctx.cycleId, ctx.resumedFrom),
      status: 'committed',
      partial,
      sequence: summary?.sequence ?? null,
      events: changes.length,
      attempted: ctx.matchAttempts.size,
      decisions: ctx.decisions,
      durationMs: this.elapsedMs(ctx),
    }
    recordCycleDuration(report.durationMs)

    ctx.log.info('CYCLE_COMMITTED', {
      sequence: report.sequence,
      partial,
      events: report.events,
      attempted: report.attempted,
      durationMs: report.durationMs,
    })
    return report
  }

  private async handleFailure(ctx: CycleContext, error: unknown): Promise<CycleReport> {
    const durationMs = this.elapsedMs(ctx)

    if (error instanceof CycleCancelledError) {
      this.machine.abandon(ctx.cycleId)
      recordCycle('cancelled')
      ctx.log.info('CYCLE_CANCELLED', { beforeStage: error.stage, durationMs })
      return {
        ...emptyReport(ctx.cycleId, ctx.resumedFrom),
        status: 'cancelled',
        durationMs,
      }
    }

    const stageError = new StageFailedError(ctx.cycleId, ctx.stage, error)
    const classified = classifyError(error)
    const resumable = !(error instanceof ConsistencyViolation)
    this.machine.fail(ctx.cycleId, ctx.stage, stageError.message)

    if (error instanceof ConsistencyViolation) {
      ctx.log.fatal('ALERT_CONSISTENCY_VIOLATION', { ...formatErrorForLog(classified), details: error.details }, error)
    } else {
      ctx.log.error('CYCLE_FAILED', { ...formatErrorForLog(classified), durationMs }, error)
    }

    await this.saveCheckpoint(ctx, stageError)
    recordCycle('failed')
    recordCycleDuration(durationMs)

    if (this.onFailure) {
      try {
        await this.onFailure({ cycleId: ctx.cycleId, stage: ctx.stage, error: stageError, classified, resumable })
      } catch (hookError) {
        ctx.log.error('CYCLE_FAILURE_HOOK_FAILED', { errorMessage: errorMessage(hookError) }, hookError)
      }
    }

    return {
      ...emptyReport(ctx.cycleId, ctx.resumedFrom),
      status: 'failed',
      partial: ctx.pulled?.partial ?? false,
      attempted: ctx.matchAttempts.size,
      decisions: ctx.decisions,
      failedStage: ctx.stage,
      error: stageError.message,
      durationMs,
    }
  }

  private async saveCheckpoint(ctx: CycleContext, error: StageFailedError): Promise<void> {
    const checkpoint: CycleCheckpoint = {
      cycleId: ctx.cycleId,
      startedAt: ctx.startedAt,
      failedStage: ctx.stage,
      failedAt: this.now(),
      error: error.message,
      pulled: ctx.pulled,
      changes: ctx.changes,
      links: ctx.batch.links(),
      beers: [...ctx.beers.values()],
      matchAttempts: [...ctx.matchAttempts],
      retryProductIds: [...ctx.transientFailures],
    }

    try {
      await this.repository.saveCheckpoint(checkpoint)
      ctx.log.info('CHECKPOINT_SAVED', { failedStage: ctx.stage })
    } catch (saveError) {
      ctx.log.error('CHECKPOINT_SAVE_FAILED', { errorMessage: errorMessage(saveError) }, saveError)
    }
  }

  private elapsedMs(ctx: CycleContext): number {
    return Math.max(0, this.now().getTime() - ctx.startedAt.getTime())
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function emptyReport(cycleId: string, resumedFrom: SyncStage | null): CycleReport {
  return {
    cycleId,
    status: 'committed',
    resumedFrom,
    partial: false,
    sequence: null,
    events: 0,
    attempted: 0,
    decisions: { linked: 0, ambiguous: 0, unmatched: 0, transient_error: 0, skipped: 0 },
    failedStage: null,
    error: null,
    durationMs: 0,
  }
}

function requirePulled(ctx: CycleContext): PulledCatalog {
  if (!ctx.pulled) {
    throw new ConsistencyViolation(`Stage ${ctx.stage} reached without a pull`, { cycleId: ctx.cycleId })
  }
  return ctx.pulled
}

function requireChanges(ctx: CycleContext): ChangeEvent[] {
  if (!ctx.changes) {
    throw new ConsistencyViolation(`Stage ${ctx.stage} reached without a diff`, { cycleId: ctx.cycleId })
  }
  return ctx.changes
}

function indexProducts(products: readonly Product[]): Map<string, Product> {
  return new Map(products.map((p) => [p.id, p]))
}

function removedIds(changes: readonly ChangeEvent[]): Set<string> {
  return new Set(changes.filter((e) => e.kind === 'removed').map((e) => e.productId))
}

function uniqueById(products: readonly ProductState[]): ProductState[] {
  const byId = new Map<string, ProductState>()
  for (const product of products) {
    if (!byId.has(product.id)) byId.set(product.id, product)
  }
  return [...byId.values()]
}

function countBy<K extends string>(values: readonly K[]): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {}
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1
  }
  return counts
}

function isChangeKind(kind: string): kind is ChangeEvent['kind'] {
  return kind === 'new' || kind === 'removed' || kind === 'availability-changed' || kind === 'price-changed'
}

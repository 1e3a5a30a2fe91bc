/**
 * Snapshot Differ.
 *
 * Compares the baseline (last complete snapshot overlaid with later partial
 * ones) against the current pull. Linear in |previous| + |current| through
 * id-indexed maps.
 *
 * - present now, absent before                → new
 * - present before, absent now (in scope)     → removed
 * - availability flag differs                 → availability-changed
 * - price differs by more than priceEpsilon   → price-changed
 *
 * A product with several differences yields one event per kind.
 */

import type { ChangeEvent, Product, ProductState, Snapshot } from '../catalog/types'

export interface DiffOptions {
  cycleId: string
  pulledAt: Date
  priceEpsilon: number
  /**
   * Categories pulled completely. When given, `removed` is only emitted for
   * products of these categories; a product missing because its page failed
   * is not a removal.
   */
  scope?: readonly string[] | null
}

export function diff(
  previous: readonly ProductState[],
  current: readonly ProductState[],
  options: DiffOptions
): ChangeEvent[] {
  const base = { cycleId: options.cycleId, pulledAt: options.pulledAt }
  const previousById = indexById(previous)
  const currentById = indexById(current)
  const scope = options.scope ? new Set(options.scope) : null
  const events: ChangeEvent[] = []

  for (const [id, now] of currentById) {
    const before = previousById.get(id)

    if (!before) {
      events.push({ ...base, productId: id, kind: 'new', before: null, after: now })
      continue
    }

    if (before.available !== now.available) {
      events.push({
        ...base,
        productId: id,
        kind: 'availability-changed',
        before: before.available,
        after: now.available,
      })
    }

    if (priceChanged(before.price, now.price, options.priceEpsilon)) {
      events.push({ ...base, productId: id, kind: 'price-changed', before: before.price, after: now.price })
    }
  }

  for (const [id, before] of previousById) {
    if (currentById.has(id)) continue
    if (scope && !scope.has(before.category)) continue
    events.push({ ...base, productId: id, kind: 'removed', before, after: null })
  }

  return events
}

function priceChanged(before: number | null, after: number | null, epsilon: number): boolean {
  if (before === null || after === null) return before !== after
  return Math.abs(before - after) > epsilon
}

/**
 * First occurrence wins for duplicate ids.
 */
function indexById(products: readonly ProductState[]): Map<string, ProductState> {
  const byId = new Map<string, ProductState>()
  for (const product of products) {
    if (!byId.has(product.id)) byId.set(product.id, product)
  }
  return byId
}

/**
 * Baseline for the next diff. Partial snapshots after the last complete one
 * supplement it: categories they pulled completely replace the baseline's
 * products of those categories; everything else they saw is overlaid.
 */
export function buildBaseline(lastComplete: Snapshot | null, partialsAfter: readonly Snapshot[]): ProductState[] {
  const baseline = new Map<string, ProductState>()
  for (const product of lastComplete?.products ?? []) {
    if (!baseline.has(product.id)) baseline.set(product.id, product)
  }

  const ordered = [...partialsAfter].sort((a, b) => a.sequence - b.sequence)
  for (const partial of ordered) {
    const replaced = new Set(partial.scope)
    for (const [id, product] of baseline) {
      if (replaced.has(product.category)) baseline.delete(id)
    }
    for (const product of indexById(partial.products).values()) {
      baseline.set(product.id, product)
    }
  }

  return [...baseline.values()]
}

/**
 * Align diff output with the product registry:
 * - `removed` for a product already inactive was reported in an earlier cycle
 * - an inactive product that shows up again is `new`
 */
export function reconcileWithRegistry(
  events: readonly ChangeEvent[],
  registry: ReadonlyMap<string, Product>,
  current: readonly ProductState[],
  options: Pick<DiffOptions, 'cycleId' | 'pulledAt'>
): ChangeEvent[] {
  const result = events.filter((event) => {
    if (event.kind !== 'removed') return true
    return registry.get(event.productId)?.active !== false
  })

  const reported = new Set(result.filter((e) => e.kind === 'new').map((e) => e.productId))
  for (const product of indexById(current).values()) {
    if (registry.get(product.id)?.active === false && !reported.has(product.id)) {
      result.push({
        cycleId: options.cycleId,
        pulledAt: options.pulledAt,
        productId: product.id,
        kind: 'new',
        before: null,
        after: product,
      })
    }
  }

  return dedupeEvents(result)
}

export interface SweepOptions {
  cycleId: string
  now: Date
  staleAfterDays: number
  /** Categories pulled completely this cycle (the differ covers those) */
  scope: readonly string[]
  seenIds: ReadonlySet<string>
}

/**
 * Active products outside the complete scope that have not been seen for
 * `staleAfterDays` are reported removed.
 */
export function sweepStaleProducts(products: readonly Product[], options: SweepOptions): ChangeEvent[] {
  const scope = new Set(options.scope)
  const cutoff = options.now.getTime() - options.staleAfterDays * 24 * 60 * 60 * 1000
  const events: ChangeEvent[] = []

  for (const product of products) {
    if (!product.active) continue
    if (options.seenIds.has(product.id)) continue
    if (scope.has(product.category)) continue
    if (product.lastSeenAt.getTime() > cutoff) continue

    events.push({
      cycleId: options.cycleId,
      pulledAt: options.now,
      productId: product.id,
      kind: 'removed',
      before: toProductState(product),
      after: null,
    })
  }

  return events
}

/**
 * At most one event per (product, kind); first wins.
 */
export function dedupeEvents(events: readonly ChangeEvent[]): ChangeEvent[] {
  const seen = new Set<string>()
  const result: ChangeEvent[] = []
  for (const event of events) {
    const key = `${event.productId}\u0000${event.kind}`
    if (seen.has(key)) continue
    seen.add(key)
    result.push(event)
  }
  return result
}

export function toProductState(product: Product): ProductState {
  return {
    id: product.id,
    name: product.name,
    brewery: product.brewery,
    style: product.style,
    abv: product.abv,
    volumeLiters: product.volumeLiters,
    price: product.price,
    available: product.available,
    releaseDate: product.releaseDate,
    category: product.category,
    url: product.url,
  }
}

/**
 * Which products a cycle sends to the matcher.
 *
 * Priority, highest first:
 *   1. never attempted
 *   2. transient failure in an earlier cycle
 *   3. ambiguous link awaiting a clearer candidate set
 *   4. active link not reaffirmed within the staleness window
 *   5. active link whose cached beer has no rating
 *   6. unlinked and last attempted before the retry window
 *
 * Each product is selected once, under its highest reason. Products with a
 * manual rejection and no active link stay out until the rejection is released.
 */

import type { ExternalBeer, Link, Product } from '../catalog/types'

export type SelectionReason =
  | 'never-attempted'
  | 'transient-retry'
  | 'ambiguous'
  | 'stale-link'
  | 'missing-rating'
  | 'unmatched-retry'

const PRIORITY: readonly SelectionReason[] = [
  'never-attempted',
  'transient-retry',
  'ambiguous',
  'stale-link',
  'missing-rating',
  'unmatched-retry',
]

const HOUR_MS = 60 * 60 * 1000

export interface SelectionInput {
  products: readonly Product[]
  links: ReadonlyMap<string, Link>
  /** Cached beers for active links; a missing entry counts as no rating */
  beers: ReadonlyMap<string, ExternalBeer>
  retryProductIds: ReadonlySet<string>
  now: Date
  staleLinkHours: number
  unmatchedRetryHours: number
  limit: number
  /** Already attempted in this cycle (resume) */
  exclude?: ReadonlySet<string>
}

export interface Selection {
  productId: string
  reason: SelectionReason
}

export function selectForMatching(input: SelectionInput): Selection[] {
  const staleCutoff = input.now.getTime() - input.staleLinkHours * HOUR_MS
  const retryCutoff = input.now.getTime() - input.unmatchedRetryHours * HOUR_MS
  const buckets = new Map<SelectionReason, { product: Product; since: number }[]>()

  for (const product of input.products) {
    if (!product.active || input.exclude?.has(product.id)) continue

    const link = input.links.get(product.id) ?? null
    const reason = reasonFor(product, link, input, staleCutoff, retryCutoff)
    if (!reason) continue

    const bucket = buckets.get(reason) ?? []
    bucket.push({ product, since: sinceFor(product, link) })
    buckets.set(reason, bucket)
  }

  const selected: Selection[] = []
  for (const reason of PRIORITY) {
    const bucket = (buckets.get(reason) ?? []).sort(
      (a, b) => a.since - b.since || (a.product.id < b.product.id ? -1 : a.product.id > b.product.id ? 1 : 0)
    )
    for (const { product } of bucket) {
      if (selected.length >= input.limit) return selected
      selected.push({ productId: product.id, reason })
    }
  }
  return selected
}

function reasonFor(
  product: Product,
  link: Link | null,
  input: SelectionInput,
  staleCutoff: number,
  retryCutoff: number
): SelectionReason | null {
  const active = link?.status === 'active' ? link : null
  if (!active && link?.rejection?.origin === 'manual') return null

  if (!link && product.lastMatchAttemptAt === null) return 'never-attempted'
  if (input.retryProductIds.has(product.id)) return 'transient-retry'
  if (link?.status === 'ambiguous') return 'ambiguous'

  if (active) {
    if ((active.reaffirmedAt ?? active.createdAt).getTime() <= staleCutoff) return 'stale-link'
    const beer = active.externalId ? input.beers.get(active.externalId) : undefined
    if (!beer || beer.rating === null) return 'missing-rating'
    return null
  }

  const lastAttempt = product.lastMatchAttemptAt?.getTime() ?? 0
  return lastAttempt <= retryCutoff ? 'unmatched-retry' : null
}

function sinceFor(product: Product, link: Link | null): number {
  if (link?.status === 'active') return (link.reaffirmedAt ?? link.createdAt).getTime()
  return product.lastMatchAttemptAt?.getTime() ?? product.firstSeenAt.getTime()
}

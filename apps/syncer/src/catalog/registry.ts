import type { Product, PulledCatalog } from './types'

/**
 * Fold one pull into the product registry. Returns only the records that
 * changed. Products are never deleted: missing from a complete category,
 * or swept as stale, they go inactive.
 */
export function applyPull(
  registry: ReadonlyMap<string, Product>,
  pulled: PulledCatalog,
  staleIds: ReadonlySet<string> = new Set()
): Product[] {
  const changed = new Map<string, Product>()
  const seen = new Set<string>()

  for (const state of pulled.products) {
    if (seen.has(state.id)) continue
    seen.add(state.id)

    const existing = registry.get(state.id)
    changed.set(
      state.id,
      existing
        ? { ...existing, ...state, active: true, lastSeenAt: pulled.pulledAt }
        : {
            ...state,
            active: true,
            firstSeenAt: pulled.pulledAt,
            lastSeenAt: pulled.pulledAt,
            lastMatchAttemptAt: null,
          }
    )
  }

  const complete = new Set(pulled.completeCategories)
  for (const product of registry.values()) {
    if (!product.active || seen.has(product.id)) continue
    if (complete.has(product.category) || staleIds.has(product.id)) {
      changed.set(product.id, { ...product, active: false })
    }
  }

  return [...changed.values()]
}

/**
 * Sync engine metrics.
 *
 * In-memory counters, exported in Prometheus text format.
 *
 * Metrics:
 * - sync_cycles_total: Counter by outcome
 * - sync_match_decisions_total: Counter by decision
 * - sync_external_calls_total: Counter by service, outcome
 * - sync_change_events_total: Counter by kind
 * - sync_cycle_duration_ms: Histogram
 *
 * No high-cardinality labels (no productId, cycleId, etc.)
 */

import type { ChangeKind } from './catalog/types'

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type CycleOutcomeLabel = 'committed' | 'partial' | 'failed' | 'cancelled' | 'deferred' | 'coalesced'
export type DecisionLabel = 'linked' | 'ambiguous' | 'unmatched' | 'transient_error' | 'skipped'
export type CallOutcomeLabel = 'ok' | 'retry' | 'failed'

export interface SyncMetricsSnapshot {
  cycles: Record<string, number>
  decisions: Record<string, number>
  externalCalls: Record<string, number>
  changeEvents: Record<string, number>
  cycleDuration: {
    count: number
    sum: number
    buckets: Record<number, number>
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Histogram buckets (milliseconds)
// ═══════════════════════════════════════════════════════════════════════════════

const DURATION_BUCKETS = [1000, 5000, 15000, 60000, 300000, 900000, 1800000]

// ═══════════════════════════════════════════════════════════════════════════════
// In-memory storage
// ═══════════════════════════════════════════════════════════════════════════════

const cycles = new Map<string, number>()
const decisions = new Map<string, number>()
const externalCalls = new Map<string, number>() // key: `${service}:${outcome}`
const changeEvents = new Map<string, number>()
const cycleDuration = {
  count: 0,
  sum: 0,
  buckets: new Map<number, number>(),
}

for (const bucket of DURATION_BUCKETS) {
  cycleDuration.buckets.set(bucket, 0)
}

function increment<K>(map: Map<K, number>, key: K, by = 1): void {
  map.set(key, (map.get(key) ?? 0) + by)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Recording
// ═══════════════════════════════════════════════════════════════════════════════

export function recordCycle(outcome: CycleOutcomeLabel): void {
  increment(cycles, outcome)
}

export function recordDecision(decision: DecisionLabel): void {
  increment(decisions, decision)
}

export function recordExternalCall(service: string, outcome: CallOutcomeLabel): void {
  increment(externalCalls, `${service}:${outcome}`)
}

export function recordChangeEvents(kind: ChangeKind, count: number): void {
  increment(changeEvents, kind, count)
}

export function recordCycleDuration(durationMs: number): void {
  cycleDuration.count++
  cycleDuration.sum += durationMs

  for (const bucket of DURATION_BUCKETS) {
    if (durationMs <= bucket) {
      increment(cycleDuration.buckets, bucket)
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Export
// ═══════════════════════════════════════════════════════════════════════════════

export function getMetricsSnapshot(): SyncMetricsSnapshot {
  return {
    cycles: Object.fromEntries(cycles),
    decisions: Object.fromEntries(decisions),
    externalCalls: Object.fromEntries(externalCalls),
    changeEvents: Object.fromEntries(changeEvents),
    cycleDuration: {
      count: cycleDuration.count,
      sum: cycleDuration.sum,
      buckets: Object.fromEntries(cycleDuration.buckets),
    },
  }
}

/**
 * Reset all metrics (for testing)
 */
export function resetMetrics(): void {
  cycles.clear()
  decisions.clear()
  externalCalls.clear()
  changeEvents.clear()
  cycleDuration.count = 0
  cycleDuration.sum = 0
  for (const bucket of DURATION_BUCKETS) {
    cycleDuration.buckets.set(bucket, 0)
  }
}

/**
 * Prometheus text exposition format
 */
export function exportPrometheusMetrics(): string {
  const lines: string[] = []

  lines.push('# HELP sync_cycles_total Sync cycles by outcome')
  lines.push('# TYPE sync_cycles_total counter')
  for (const [outcome, count] of cycles) {
    lines.push(`sync_cycles_total{outcome="${outcome}"} ${count}`)
  }

  lines.push('# HELP sync_match_decisions_total Matcher decisions')
  lines.push('# TYPE sync_match_decisions_total counter')
  for (const [decision, count] of decisions) {
    lines.push(`sync_match_decisions_total{decision="${decision}"} ${count}`)
  }

  lines.push('# HELP sync_external_calls_total External call attempts')
  lines.push('# TYPE sync_external_calls_total counter')
  for (const [key, count] of externalCalls) {
    const [service, outcome] = key.split(':')
    lines.push(`sync_external_calls_total{service="${service}",outcome="${outcome}"} ${count}`)
  }

  lines.push('# HELP sync_change_events_total Change events emitted')
  lines.push('# TYPE sync_change_events_total counter')
  for (const [kind, count] of changeEvents) {
    lines.push(`sync_change_events_total{kind="${kind}"} ${count}`)
  }

  lines.push('# HELP sync_cycle_duration_ms Cycle duration')
  lines.push('# TYPE sync_cycle_duration_ms histogram')
  for (const bucket of DURATION_BUCKETS) {
    lines.push(`sync_cycle_duration_ms_bucket{le="${bucket}"} ${cycleDuration.buckets.get(bucket) ?? 0}`)
  }
  lines.push(`sync_cycle_duration_ms_bucket{le="+Inf"} ${cycleDuration.count}`)
  lines.push(`sync_cycle_duration_ms_sum ${cycleDuration.sum}`)
  lines.push(`sync_cycle_duration_ms_count ${cycleDuration.count}`)

  return lines.join('\n')
}

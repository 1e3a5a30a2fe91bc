import { beforeEach, describe, expect, it } from 'vitest'
import {
  exportPrometheusMetrics,
  getMetricsSnapshot,
  recordChangeEvents,
  recordCycle,
  recordCycleDuration,
  recordDecision,
  recordExternalCall,
  resetMetrics,
} from '../metrics'

describe('sync metrics', () => {
  beforeEach(() => {
    resetMetrics()
  })

  it('counts cycles, decisions, calls and events', () => {
    recordCycle('committed')
    recordCycle('committed')
    recordCycle('failed')
    recordDecision('linked')
    recordExternalCall('beerdb', 'retry')
    recordChangeEvents('new', 3)
    recordChangeEvents('new', 2)

    const snapshot = getMetricsSnapshot()

    expect(snapshot.cycles).toEqual({ committed: 2, failed: 1 })
    expect(snapshot.decisions).toEqual({ linked: 1 })
    expect(snapshot.externalCalls).toEqual({ 'beerdb:retry': 1 })
    expect(snapshot.changeEvents).toEqual({ new: 5 })
  })

  it('fills every duration bucket at or above the observation', () => {
    recordCycleDuration(4000)

    expect(getMetricsSnapshot().cycleDuration).toEqual({
      count: 1,
      sum: 4000,
      buckets: { 1000: 0, 5000: 1, 15000: 1, 60000: 1, 300000: 1, 900000: 1, 1800000: 1 },
    })
  })

  it('exports Prometheus text', () => {
    recordCycle('committed')
    recordExternalCall('retailer', 'ok')
    recordCycleDuration(4000)

    const lines = exportPrometheusMetrics().split('\n')

    expect(lines).toContain('sync_cycles_total{outcome="committed"} 1')
    expect(lines).toContain('sync_external_calls_total{service="retailer",outcome="ok"} 1')
    expect(lines).toContain('sync_cycle_duration_ms_bucket{le="1000"} 0')
    expect(lines).toContain('sync_cycle_duration_ms_bucket{le="+Inf"} 1')
    expect(lines[lines.length - 1]).toBe('sync_cycle_duration_ms_count 1')
  })
})

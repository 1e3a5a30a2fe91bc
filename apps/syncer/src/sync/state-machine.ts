/**
 * Cycle state machine.
 *
 *   Idle → Pulling → Diffing → Matching → Persisting → Idle
 *                 ↘ Failed(stage) ↙
 *
 * Only one cycle runs per process. Leaving Idle (or Failed) is a
 * compare-and-set: the caller that loses the race gets `false` and must defer.
 */

import type { SyncStage } from '../lib/errors'
import { ConsistencyViolation } from '../lib/errors'

export type CycleState =
  | { status: 'idle' }
  | { status: SyncStage; cycleId: string }
  | { status: 'failed'; cycleId: string; stage: SyncStage; error: string }

export type CycleStatus = CycleState['status']

export const STAGE_ORDER: readonly SyncStage[] = ['pulling', 'diffing', 'matching', 'persisting']

export class SyncStateMachine {
  private current: CycleState = { status: 'idle' }

  get state(): CycleState {
    return this.current
  }

  get busy(): boolean {
    return this.current.status !== 'idle' && this.current.status !== 'failed'
  }

  /**
   * Start a cycle at `stage` (pulling for a fresh cycle, the failed stage
   * for a resume). False when another cycle holds the machine.
   */
  begin(cycleId: string, stage: SyncStage = 'pulling'): boolean {
    if (this.busy) return false
    this.current = { status: stage, cycleId }
    return true
  }

  /**
   * Move to the next stage. Skipping or reordering stages is an invariant breach.
   */
  advance(cycleId: string, stage: SyncStage): void {
    const current = this.requireRunning(cycleId)
    const from = STAGE_ORDER.indexOf(current.status)
    const to = STAGE_ORDER.indexOf(stage)
    if (to !== from + 1) {
      throw new ConsistencyViolation(`Illegal transition ${current.status} → ${stage}`, { cycleId })
    }
    this.current = { status: stage, cycleId }
  }

  finish(cycleId: string): void {
    const current = this.requireRunning(cycleId)
    if (current.status !== 'persisting') {
      throw new ConsistencyViolation(`Illegal transition ${current.status} → idle`, { cycleId })
    }
    this.current = { status: 'idle' }
  }

  fail(cycleId: string, stage: SyncStage, error: string): void {
    this.requireRunning(cycleId)
    this.current = { status: 'failed', cycleId, stage, error }
  }

  /** Cancelled cycles leave no failure behind. */
  abandon(cycleId: string): void {
    this.requireRunning(cycleId)
    this.current = { status: 'idle' }
  }

  private requireRunning(cycleId: string): { status: SyncStage; cycleId: string } {
    const current = this.current
    if (current.status === 'idle' || current.status === 'failed' || current.cycleId !== cycleId) {
      throw new ConsistencyViolation(`Cycle ${cycleId} does not hold the state machine`, {
        cycleId,
        status: current.status,
      })
    }
    return current
  }
}

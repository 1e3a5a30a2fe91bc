/**
 * Catalog Sync Scheduler
 *
 * Keeps the repeatable RUN_SYNC_CYCLE job on the catalog-sync queue in line
 * with SYNC_CRON, and queues delayed RESUME_SYNC_CYCLE jobs for failed cycles.
 *
 * Only one scheduler instance should run per deployment.
 */

import { CronExpressionParser } from 'cron-parser'
import {
  JOB_NAMES,
  SCHEDULED_SYNC_JOB_ID,
  enqueueResumeCycle,
  enqueueSyncCycle,
  getCatalogSyncQueue,
} from '../config/queues'
import type { RunSyncCycleJobData } from '../config/queues'
import { logger } from '../config/logger'
import { errorMessage } from '../lib/errors'
import type { CycleFailure } from './orchestrator'

const log = logger.scheduler

let isEnabled = false
let cronPattern: string | null = null

/**
 * Next run of a cron pattern after `from` (UTC). Throws for an invalid pattern.
 */
export function nextRunAfter(pattern: string, from: Date): Date {
  return CronExpressionParser.parse(pattern, { currentDate: from, tz: 'UTC' }).next().toDate()
}

/**
 * Start the sync scheduler. Replaces any repeatable job left by an earlier
 * process so a changed SYNC_CRON takes effect.
 */
export async function startSyncScheduler(pattern: string): Promise<void> {
  if (isEnabled) {
    log.warn('SYNC_SCHEDULER_ALREADY_RUNNING', {
      event_name: 'SYNC_SCHEDULER_ALREADY_RUNNING',
      cronPattern,
    })
    return
  }

  // Fails fast on a bad pattern before touching the queue
  nextRunAfter(pattern, new Date())

  log.info('SYNC_SCHEDULER_START', {
    event_name: 'SYNC_SCHEDULER_START',
    cronPattern: pattern,
  })

  try {
    await removeScheduledSyncJobs()

    await getCatalogSyncQueue().add(
      JOB_NAMES.RUN_SYNC_CYCLE,
      {
        type: 'run',
        trigger: 'SCHEDULED',
        triggeredBy: 'scheduler',
        correlationId: 'scheduled',
      } satisfies RunSyncCycleJobData,
      {
        repeat: { pattern, tz: 'UTC' },
        jobId: SCHEDULED_SYNC_JOB_ID,
      }
    )

    log.info('SYNC_SCHEDULER_REPEATABLE_JOB_CONFIGURED', {
      event_name: 'SYNC_SCHEDULER_REPEATABLE_JOB_CONFIGURED',
      cronPattern: pattern,
    })
  } catch (error) {
    log.error(
      'SYNC_SCHEDULER_SETUP_FAILED',
      {
        event_name: 'SYNC_SCHEDULER_SETUP_FAILED',
        errorMessage: errorMessage(error),
      },
      error
    )
    throw error
  }

  isEnabled = true
  cronPattern = pattern
}

async function removeScheduledSyncJobs(): Promise<number> {
  const queue = getCatalogSyncQueue()
  const repeatableJobs = await queue.getRepeatableJobs()
  let removedCount = 0

  for (const job of repeatableJobs) {
    if (job.name === JOB_NAMES.RUN_SYNC_CYCLE) {
      await queue.removeRepeatableByKey(job.key)
      removedCount += 1
    }
  }

  return removedCount
}

/**
 * Stop the sync scheduler
 */
export async function stopSyncScheduler(): Promise<void> {
  if (!isEnabled) return

  log.info('SYNC_SCHEDULER_STOP', {
    event_name: 'SYNC_SCHEDULER_STOP',
  })

  try {
    const removedRepeatableJobs = await removeScheduledSyncJobs()
    log.info('SYNC_SCHEDULER_REPEATABLE_JOBS_REMOVED', {
      event_name: 'SYNC_SCHEDULER_REPEATABLE_JOBS_REMOVED',
      removedRepeatableJobs,
    })
  } catch (error) {
    log.error(
      'SYNC_SCHEDULER_STOP_FAILED',
      {
        event_name: 'SYNC_SCHEDULER_STOP_FAILED',
        errorMessage: errorMessage(error),
      },
      error
    )
  } finally {
    isEnabled = false
    cronPattern = null
  }
}

export function isSyncSchedulerRunning(): boolean {
  return isEnabled
}

export interface SyncSchedulerStatus {
  enabled: boolean
  cronPattern: string | null
  nextRunAt: Date | null
  queuedJobs: number
  delayedJobs: number
}

export async function getSyncSchedulerStatus(now: Date = new Date()): Promise<SyncSchedulerStatus> {
  const counts = await getCatalogSyncQueue().getJobCounts('waiting', 'active', 'delayed')

  return {
    enabled: isEnabled,
    cronPattern,
    nextRunAt: isEnabled && cronPattern ? nextRunAfter(cronPattern, now) : null,
    queuedJobs: (counts.waiting ?? 0) + (counts.active ?? 0),
    delayedJobs: counts.delayed ?? 0,
  }
}

/**
 * Manually trigger a sync cycle (for operators and tests)
 */
export async function triggerSyncManual(triggeredBy?: string): Promise<string> {
  return enqueueSyncCycle('MANUAL', triggeredBy ?? 'manual')
}

/**
 * Queue an earlier-than-usual resume of a failed cycle. Invariant breaches
 * are left for an operator.
 */
export async function scheduleResume(failure: CycleFailure, delayMs: number): Promise<string | null> {
  if (!failure.resumable) {
    log.warn('SYNC_RESUME_NOT_SCHEDULED', {
      event_name: 'SYNC_RESUME_NOT_SCHEDULED',
      cycleId: failure.cycleId,
      stage: failure.stage,
      errorCategory: failure.classified.category,
    })
    return null
  }

  const jobId = await enqueueResumeCycle(failure.cycleId, failure.stage, delayMs)
  log.info('SYNC_RESUME_SCHEDULED', {
    event_name: 'SYNC_RESUME_SCHEDULED',
    cycleId: failure.cycleId,
    stage: failure.stage,
    delayMs,
    jobId,
  })
  return jobId
}

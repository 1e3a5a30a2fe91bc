/**
 * Catalog Sync BullMQ Worker
 *
 * Processes RUN_SYNC_CYCLE and RESUME_SYNC_CYCLE jobs. Concurrency 1: the
 * orchestrator runs one cycle at a time and the cycle lock extends that
 * across processes.
 */

import { Worker } from 'bullmq'
import type { Job } from 'bullmq'
import { getSharedBullMQConnection } from '@brewlink/redis'
import { QUEUE_NAMES } from '../config/queues'
import type { CatalogSyncJobData } from '../config/queues'
import { logger } from '../config/logger'
import { errorMessage } from '../lib/errors'
import type { CycleLockProvider } from './cycle-lock'
import type { CycleReport, SyncOrchestrator } from './orchestrator'

const log = logger.worker

export interface SyncWorkerDeps {
  orchestrator: SyncOrchestrator
  /** Omitted for single-process deployments */
  cycleLock?: CycleLockProvider
}

// Metrics
let processedCount = 0
let errorCount = 0
let lastProcessedAt: Date | null = null

export let syncWorker: Worker<CatalogSyncJobData> | null = null

/**
 * Process a single sync job. Resolves to null when the job was skipped
 * because another process or cycle holds the engine.
 */
export async function processSyncJob(job: Job<CatalogSyncJobData>, deps: SyncWorkerDeps): Promise<CycleReport | null> {
  const data = job.data

  log.info('SYNC_WORKER_JOB_RECEIVED', {
    event_name: 'SYNC_WORKER_JOB_RECEIVED',
    jobId: job.id,
    jobName: job.name,
    ...(data.type === 'run'
      ? { trigger: data.trigger, triggeredBy: data.triggeredBy, correlationId: data.correlationId }
      : { cycleId: data.cycleId, stage: data.stage }),
  })

  const lock = deps.cycleLock ? await deps.cycleLock.acquire() : null
  if (deps.cycleLock && !lock) {
    log.info('SYNC_WORKER_JOB_SKIPPED_LOCKED', {
      event_name: 'SYNC_WORKER_JOB_SKIPPED_LOCKED',
      jobId: job.id,
    })
    return null
  }

  try {
    const report = data.type === 'run' ? await runCycle(deps.orchestrator) : await deps.orchestrator.resume(data.cycleId)

    log.info('SYNC_WORKER_JOB_DONE', {
      event_name: 'SYNC_WORKER_JOB_DONE',
      jobId: job.id,
      cycleId: report?.cycleId,
      status: report?.status ?? 'skipped',
      durationMs: report?.durationMs,
    })
    return report
  } catch (error) {
    log.error(
      'SYNC_WORKER_JOB_ERROR',
      {
        event_name: 'SYNC_WORKER_JOB_ERROR',
        jobId: job.id,
        errorMessage: errorMessage(error),
      },
      error
    )
    throw error // Re-throw for BullMQ retry
  } finally {
    await lock?.release()
  }
}

async function runCycle(orchestrator: SyncOrchestrator): Promise<CycleReport | null> {
  const outcome = orchestrator.trigger()
  if (outcome !== 'started') {
    log.info('SYNC_WORKER_CYCLE_DEFERRED', { event_name: 'SYNC_WORKER_CYCLE_DEFERRED', outcome })
  }
  return orchestrator.whenIdle()
}

/**
 * Start the sync worker
 */
export function startSyncWorker(deps: SyncWorkerDeps): Worker<CatalogSyncJobData> {
  log.info('SYNC_WORKER_START', {
    event_name: 'SYNC_WORKER_START',
    concurrency: 1,
    queueName: QUEUE_NAMES.CATALOG_SYNC,
  })

  syncWorker = new Worker<CatalogSyncJobData>(
    QUEUE_NAMES.CATALOG_SYNC,
    async (job: Job<CatalogSyncJobData>) => {
      await processSyncJob(job, deps)
    },
    {
      connection: getSharedBullMQConnection(),
      concurrency: 1,
    }
  )

  syncWorker.on('completed', () => {
    processedCount++
    lastProcessedAt = new Date()
  })

  syncWorker.on('failed', (job: Job<CatalogSyncJobData> | undefined, error: Error) => {
    errorCount++
    log.error(
      'SYNC_WORKER_JOB_FAILED',
      {
        event_name: 'SYNC_WORKER_JOB_FAILED',
        jobId: job?.id,
        jobName: job?.name,
        errorMessage: error.message,
        errorCount,
      },
      error
    )
  })

  syncWorker.on('error', (error: Error) => {
    log.warn('SYNC_WORKER_ERROR', {
      event_name: 'SYNC_WORKER_ERROR',
      errorMessage: error.message,
    })
  })

  return syncWorker
}

/**
 * Stop the sync worker gracefully
 */
export async function stopSyncWorker(): Promise<void> {
  if (syncWorker) {
    log.info('SYNC_WORKER_STOPPING', {
      event_name: 'SYNC_WORKER_STOPPING',
      processedCount,
      errorCount,
    })
    await syncWorker.close()
    syncWorker = null
  }
}

export function getSyncWorkerMetrics(): { processedCount: number; errorCount: number; lastProcessedAt: Date | null } {
  return {
    processedCount,
    errorCount,
    lastProcessedAt,
  }
}

import { Queue } from 'bullmq'
import { redisConnection } from '@brewlink/redis'
import type { SyncStage } from '../lib/errors'

// Queue names
export const QUEUE_NAMES = {
  CATALOG_SYNC: 'catalog-sync',
} as const

export const JOB_NAMES = {
  RUN_SYNC_CYCLE: 'RUN_SYNC_CYCLE',
  RESUME_SYNC_CYCLE: 'RESUME_SYNC_CYCLE',
} as const

export type SyncJobName = (typeof JOB_NAMES)[keyof typeof JOB_NAMES]

// Job data interfaces
export interface RunSyncCycleJobData {
  type: 'run'
  trigger: 'SCHEDULED' | 'MANUAL'
  triggeredBy: string
  correlationId: string
}

export interface ResumeSyncCycleJobData {
  type: 'resume'
  cycleId: string
  stage: SyncStage
}

export type CatalogSyncJobData = RunSyncCycleJobData | ResumeSyncCycleJobData

export const SCHEDULED_SYNC_JOB_ID = 'catalog-sync-scheduled'

let catalogSyncQueue: Queue<CatalogSyncJobData> | null = null

/**
 * Created on first use so importing this module opens no connection.
 */
export function getCatalogSyncQueue(): Queue<CatalogSyncJobData> {
  if (!catalogSyncQueue) {
    catalogSyncQueue = new Queue<CatalogSyncJobData>(QUEUE_NAMES.CATALOG_SYNC, {
      connection: redisConnection,
      defaultJobOptions: {
        removeOnComplete: { count: 100 },
        removeOnFail: { count: 500 },
      },
    })
  }
  return catalogSyncQueue
}

export async function enqueueSyncCycle(trigger: RunSyncCycleJobData['trigger'], triggeredBy: string): Promise<string> {
  const correlationId = `${trigger.toLowerCase()}-${Date.now()}`
  const job = await getCatalogSyncQueue().add(JOB_NAMES.RUN_SYNC_CYCLE, {
    type: 'run',
    trigger,
    triggeredBy,
    correlationId,
  })
  return job.id ?? correlationId
}

/**
 * One resume job per failed cycle; the job id dedupes repeated requests.
 */
export async function enqueueResumeCycle(cycleId: string, stage: SyncStage, delayMs: number): Promise<string> {
  const jobId = `resume-${cycleId}`
  await getCatalogSyncQueue().add(
    JOB_NAMES.RESUME_SYNC_CYCLE,
    { type: 'resume', cycleId, stage },
    { jobId, delay: delayMs, attempts: 1 }
  )
  return jobId
}

export async function closeQueues(): Promise<void> {
  if (catalogSyncQueue) {
    await catalogSyncQueue.close()
    catalogSyncQueue = null
  }
}

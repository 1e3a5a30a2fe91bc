#!/usr/bin/env node

/**
 * Syncer Worker
 * Starts the catalog-sync scheduler and worker.
 */

// Load environment variables first, before any other imports
import './env'

import {
  closeSharedBullMQConnection,
  disconnectRedis,
  getRedisConnectionInfo,
  warmupRedis,
} from '@brewlink/redis'
import { loadSettings } from './config/settings'
import { closeQueues } from './config/queues'
import { rootLogger } from './config/logger'
import { errorMessage } from './lib/errors'
import { createSyncEngine } from './container'
import { scheduleResume, startSyncScheduler, stopSyncScheduler } from './sync/scheduler'
import { startSyncWorker, stopSyncWorker } from './sync/worker'
import type { SyncOrchestrator } from './sync/orchestrator'

const log = rootLogger

async function main(): Promise<SyncOrchestrator> {
  const settings = loadSettings()

  log.info('SYNCER_STARTING', {
    event_name: 'SYNCER_STARTING',
    storeBackend: settings.STORE_BACKEND,
    categories: settings.RETAILER_CATEGORIES,
    cron: settings.SYNC_CRON,
    redis: getRedisConnectionInfo(),
  })

  const connected = await warmupRedis()
  if (!connected) {
    throw new Error('Redis unavailable after warmup')
  }

  const engine = createSyncEngine(settings, {
    onFailure: async (failure) => {
      await scheduleResume(failure, settings.FAILED_CYCLE_RETRY_DELAY_MS)
    },
  })

  startSyncWorker({ orchestrator: engine.orchestrator, cycleLock: engine.cycleLock ?? undefined })
  await startSyncScheduler(settings.SYNC_CRON)

  log.info('SYNCER_STARTED', { event_name: 'SYNCER_STARTED' })
  return engine.orchestrator
}

// Track if shutdown is in progress to prevent double-shutdown
let isShuttingDown = false
let orchestrator: SyncOrchestrator | null = null

// Graceful shutdown
const shutdown = async (signal: string): Promise<void> => {
  if (isShuttingDown) {
    log.warn('SYNCER_SHUTDOWN_IN_PROGRESS', { event_name: 'SYNCER_SHUTDOWN_IN_PROGRESS', signal })
    return
  }
  isShuttingDown = true

  const shutdownStart = Date.now()
  log.info('SYNCER_SHUTDOWN_START', { event_name: 'SYNCER_SHUTDOWN_START', signal })

  try {
    // Stop taking new jobs, then let the running cycle reach a stage boundary
    await stopSyncScheduler()
    orchestrator?.cancel()
    await stopSyncWorker()
    await orchestrator?.whenIdle()

    await closeQueues()
    await closeSharedBullMQConnection()
    await disconnectRedis()

    log.info('SYNCER_SHUTDOWN_COMPLETE', {
      event_name: 'SYNCER_SHUTDOWN_COMPLETE',
      durationMs: Date.now() - shutdownStart,
    })
    process.exit(0)
  } catch (error) {
    log.error('SYNCER_SHUTDOWN_FAILED', { event_name: 'SYNCER_SHUTDOWN_FAILED', errorMessage: errorMessage(error) }, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})
process.on('SIGINT', () => {
  void shutdown('SIGINT')
})

main().then(
  (started) => {
    orchestrator = started
  },
  (error: unknown) => {
    log.fatal('SYNCER_START_FAILED', { event_name: 'SYNCER_START_FAILED', errorMessage: errorMessage(error) }, error)
    process.exit(1)
  }
)

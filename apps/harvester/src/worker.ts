/**
 * Harvest Run Worker
 *
 * Consumes HARVEST_RUN jobs. Each job gets its own run context, which is
 * closed when the run ends whatever the outcome.
 */

import { Worker, type ConnectionOptions, type Job } from 'bullmq'
import type { ILogger } from '@carlistings/logger'
import { loggers } from './config/logger.js'
import {
  QUEUE_NAMES,
  harvestRunJobSchema,
  type HarvestRunJobData,
  type HarvestRunJobResult,
} from './config/queues.js'
import type { Settings } from './config/settings.js'
import { createRunContext, type OwnedRunContext } from './workflow/context.js'
import { WorkflowOrchestrator } from './workflow/orchestrator.js'

const log = loggers.queue

export interface HarvestJobDeps {
  settings: Settings
  createContext?: (settings: Settings, log: ILogger) => Promise<OwnedRunContext>
  signal?: AbortSignal
}

/**
 * Process a single harvest run job.
 */
export async function processHarvestRunJob(
  job: Pick<Job<HarvestRunJobData>, 'id' | 'data'>,
  deps: HarvestJobDeps
): Promise<HarvestRunJobResult> {
  const data = harvestRunJobSchema.parse(job.data)
  const jobLogger = log.child({ jobId: job.id, trigger: data.trigger })
  jobLogger.info('Processing harvest run', { pageUrl: data.pageUrl, maxPages: data.maxPages, maxItems: data.maxItems })

  const makeContext = deps.createContext ?? createRunContext
  const context = await makeContext(deps.settings, jobLogger)
  try {
    const orchestrator = new WorkflowOrchestrator(context)
    const result = await orchestrator.run({
      pageUrl: data.pageUrl,
      maxPages: data.maxPages,
      maxItems: data.maxItems,
      migrateAssets: data.migrateAssets,
      runId: job.id,
      signal: deps.signal,
    })
    return {
      success: result.success,
      persisted: result.stats.persisted,
      errors: result.errors.length,
      cancelled: result.cancelled,
    }
  } finally {
    await context.close()
  }
}

export interface HarvestWorkerHandle {
  worker: Worker<HarvestRunJobData, HarvestRunJobResult>
  /** Cancel in-flight runs between items, then close the worker. */
  stop(): Promise<void>
}

export function startHarvestWorker(
  settings: Settings,
  connection: ConnectionOptions,
  concurrency = 1
): HarvestWorkerHandle {
  const controller = new AbortController()

  const worker = new Worker<HarvestRunJobData, HarvestRunJobResult>(
    QUEUE_NAMES.HARVEST_RUN,
    async job => processHarvestRunJob(job, { settings, signal: controller.signal }),
    { connection, concurrency }
  )

  worker.on('completed', (job, result) => {
    log.info('Job completed', { jobId: job.id, ...result })
  })

  worker.on('failed', (job, error) => {
    log.error('Job failed', { jobId: job?.id }, error)
  })

  worker.on('error', error => {
    log.error('Worker error', {}, error)
  })

  log.info('Harvest worker started', { queue: QUEUE_NAMES.HARVEST_RUN, concurrency })

  return {
    worker,
    async stop() {
      controller.abort()
      await worker.close()
      log.info('Harvest worker stopped')
    },
  }
}

import { Queue, type ConnectionOptions, type JobsOptions } from 'bullmq'
import { z } from 'zod'
import { MAX_ITEMS_CEILING } from '../workflow/orchestrator.js'
import { loggers } from './logger.js'

const log = loggers.queue

export const QUEUE_NAMES = {
  HARVEST_RUN: 'harvest-run',
} as const

export const harvestRunJobSchema = z.object({
  pageUrl: z.string().url(),
  maxPages: z.number().int().positive(),
  maxItems: z.number().int().positive().max(MAX_ITEMS_CEILING),
  migrateAssets: z.boolean().default(true),
  trigger: z.enum(['cli', 'schedule', 'manual']).default('manual'),
})

export type HarvestRunJobData = z.output<typeof harvestRunJobSchema>

export interface HarvestRunJobResult {
  success: boolean
  persisted: number
  errors: number
  cancelled: boolean
}

/** The slice of a BullMQ queue the producers use. */
export interface HarvestRunQueue {
  add(name: string, data: HarvestRunJobData, opts?: JobsOptions): Promise<{ id?: string }>
  close(): Promise<void>
}

export function createHarvestRunQueue(connection: ConnectionOptions): Queue<HarvestRunJobData, HarvestRunJobResult> {
  return new Queue<HarvestRunJobData, HarvestRunJobResult>(QUEUE_NAMES.HARVEST_RUN, { connection })
}

/**
 * Validate and enqueue a harvest run. Returns the job id.
 */
export async function enqueueHarvestRun(
  queue: Pick<HarvestRunQueue, 'add'>,
  data: z.input<typeof harvestRunJobSchema>
): Promise<string> {
  const jobData = harvestRunJobSchema.parse(data)
  const job = await queue.add('harvest', jobData, {
    attempts: 1,
    removeOnComplete: { count: 100 },
    removeOnFail: { count: 500 },
  })
  const jobId = job.id ?? 'unknown'
  log.info('HARVEST_RUN_ENQUEUED', {
    event_name: 'HARVEST_RUN_ENQUEUED',
    jobId,
    pageUrl: jobData.pageUrl,
    maxPages: jobData.maxPages,
    maxItems: jobData.maxItems,
    trigger: jobData.trigger,
  })
  return jobId
}

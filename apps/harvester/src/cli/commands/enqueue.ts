import { createRedisClient } from '../../config/redis.js'
import {
  createHarvestRunQueue,
  enqueueHarvestRun,
  type HarvestRunQueue,
} from '../../config/queues.js'
import { loggers } from '../../config/logger.js'
import type { Settings } from '../../config/settings.js'

const log = loggers.cli

export interface EnqueueCommandArgs {
  /** Defaults to the configured cars listing page */
  url?: string
  maxPages?: number
  maxItems?: number
  noImages: boolean
}

export interface EnqueueCommandDeps {
  settings: Settings
  createQueue?: (settings: Settings) => HarvestRunQueue
  print?: (line: string) => void
}

function defaultQueue(settings: Settings): HarvestRunQueue {
  return createHarvestRunQueue(createRedisClient(settings.redis))
}

export async function runEnqueueCommand(args: EnqueueCommandArgs, deps: EnqueueCommandDeps): Promise<number> {
  const print = deps.print ?? console.log
  if (Number.isNaN(args.maxPages) || Number.isNaN(args.maxItems)) {
    log.error('--max-pages and --max-items must be positive integers')
    return 2
  }

  const queue = (deps.createQueue ?? defaultQueue)(deps.settings)
  try {
    const jobId = await enqueueHarvestRun(queue, {
      pageUrl: args.url || deps.settings.urls.carsMain,
      maxPages: args.maxPages ?? deps.settings.harvest.maxPages,
      maxItems: args.maxItems ?? deps.settings.harvest.maxItems,
      migrateAssets: !args.noImages,
      trigger: 'cli',
    })
    print(`Enqueued harvest run ${jobId}`)
    return 0
  } finally {
    await queue.close()
  }
}

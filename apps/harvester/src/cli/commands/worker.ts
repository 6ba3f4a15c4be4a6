import { createRedisClient, warmupRedis } from '../../config/redis.js'
import { loggers } from '../../config/logger.js'
import type { Settings } from '../../config/settings.js'
import { startHarvestWorker } from '../../worker.js'

const log = loggers.cli

/**
 * Start the queue worker and keep it running until SIGTERM or SIGINT.
 */
export async function runWorkerCommand(settings: Settings, concurrency = 1): Promise<number> {
  if (Number.isNaN(concurrency)) {
    log.error('--concurrency must be a positive integer')
    return 2
  }

  const redisReady = await warmupRedis(settings.redis)
  if (!redisReady) {
    log.fatal('Redis unavailable, worker not started')
    return 1
  }

  const handle = startHarvestWorker(settings, createRedisClient(settings.redis), concurrency)

  return new Promise<number>(resolve => {
    let shuttingDown = false
    const shutdown = (signal: string) => {
      if (shuttingDown) return
      shuttingDown = true
      log.info('Shutting down worker', { signal })
      handle.stop().then(
        () => resolve(0),
        error => {
          log.error('Error during shutdown', {}, error)
          resolve(1)
        }
      )
    }
    process.on('SIGTERM', () => shutdown('SIGTERM'))
    process.on('SIGINT', () => shutdown('SIGINT'))
  })
}

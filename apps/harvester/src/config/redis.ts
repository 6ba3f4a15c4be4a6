import { Redis, type RedisOptions } from 'ioredis'
import type { Settings } from './settings.js'
import { loggers } from './logger.js'

const log = loggers.redis

export type RedisSettings = Settings['redis']

// Circuit breaker state for reducing log spam during prolonged outages
let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

/**
 * Connection string safe to log.
 */
export function describeRedis(settings: RedisSettings): string {
  return settings.url ? settings.url.replace(/\/\/([^:@]*):[^@]+@/, '//$1:***@') : `${settings.host}:${settings.port}`
}

export function redisOptions(settings: RedisSettings): RedisOptions {
  const connection = describeRedis(settings)
  const base: RedisOptions = {
    // BullMQ workers require this to be null
    maxRetriesPerRequest: null,
    keepAlive: 10000,
    connectTimeout: 10000,
    enableOfflineQueue: true,
    retryStrategy(times: number) {
      consecutiveFailures = times

      // Circuit breaker: after 20 attempts, log once per minute
      if (times > 20) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Redis circuit breaker: prolonged outage', { attempts: times, connection })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
    reconnectOnError(err: Error) {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENOTFOUND']
      if (targetErrors.some(code => err.message.includes(code))) {
        if (consecutiveFailures <= 20) {
          log.warn('Reconnecting due to error', { error: err.message })
        }
        return true
      }
      return false
    },
  }

  return settings.url ? base : { ...base, host: settings.host, port: settings.port, password: settings.password }
}

export function createRedisClient(settings: RedisSettings): Redis {
  const options = redisOptions(settings)
  return settings.url ? new Redis(settings.url, options) : new Redis(options)
}

/**
 * Ping Redis with retries before starting a worker.
 */
export async function warmupRedis(settings: RedisSettings, maxAttempts = 5): Promise<boolean> {
  const connection = describeRedis(settings)
  const warmupOptions: RedisOptions = {
    maxRetriesPerRequest: 1,
    retryStrategy: () => null,
    connectTimeout: 5000,
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = settings.url
      ? new Redis(settings.url, warmupOptions)
      : new Redis({ ...warmupOptions, host: settings.host, port: settings.port, password: settings.password })
    try {
      log.info('Connection attempt', { attempt, maxAttempts, connection })
      await client.ping()
      log.info('Connection established')
      return true
    } catch (error) {
      log.error('Connection failed', { attempt }, error)
      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        await new Promise(resolve => setTimeout(resolve, delayMs))
      }
    } finally {
      client.disconnect()
    }
  }

  log.error('Failed to establish connection after all attempts', { maxAttempts, connection })
  return false
}

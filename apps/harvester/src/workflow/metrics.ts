/**
 * Harvest run metrics
 *
 * Structured log events only; there is no metrics backend.
 */

import type { ILogger } from '@carlistings/logger'
import { loggers } from '../config/logger.js'
import type { RunStatistics } from '../types.js'

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_ITEMS_FOR_ALERT = 10

export interface RunCompletedPayload {
  runId: string
  pageUrl: string
  success: boolean
  cancelled: boolean
  itemsAttempted: number
  stats: Readonly<RunStatistics>
}

export function rate(numerator: number, denominator: number): number {
  if (denominator === 0) return 0
  return Math.round((numerator / denominator) * 1000) / 1000
}

export function recordRunCompleted(payload: RunCompletedPayload, log: ILogger = loggers.metrics): void {
  const { stats } = payload
  const failureRate = rate(stats.errors, payload.itemsAttempted)

  log.info('HARVEST_RUN_COMPLETED', {
    event_name: 'HARVEST_RUN_COMPLETED',
    runId: payload.runId,
    pageUrl: payload.pageUrl,
    success: payload.success,
    cancelled: payload.cancelled,
    itemsAttempted: payload.itemsAttempted,
    discovered: stats.discovered,
    scraped: stats.scraped,
    persisted: stats.persisted,
    duplicates: stats.duplicates,
    usersCreated: stats.usersCreated,
    linked: stats.linked,
    assetsMigrated: stats.assetsMigrated,
    errors: stats.errors,
    failureRate,
    yieldRate: rate(stats.persisted, payload.itemsAttempted),
    durationMs: stats.durationMs,
  })

  if (payload.itemsAttempted >= MIN_ITEMS_FOR_ALERT && failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('HARVEST_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'HARVEST_ALERT_HIGH_FAILURE_RATE',
      runId: payload.runId,
      failureRate,
      itemsAttempted: payload.itemsAttempted,
    })
  }
}

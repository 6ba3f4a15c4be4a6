/**
 * Run context factory
 *
 * Acquires the production resources for one run: HTTP fetcher, Postgres
 * pool and stores, S3 asset store, image encoder and delay policy. Any
 * failure here is fatal and surfaces before an item is processed.
 */

import { createPool, PgIdentityStore, PgListingStore, warmupDb } from '@carlistings/db'
import type { ILogger } from '@carlistings/logger'
import { SharpImageEncoder } from '../assets/image-processor.js'
import { S3AssetStore } from '../assets/s3-store.js'
import { loggers } from '../config/logger.js'
import type { Settings } from '../config/settings.js'
import { HarvestError, toErrorMessage } from '../errors.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { RandomDelayPolicy } from '../fetch/politeness.js'
import type { RunContext } from './orchestrator.js'

export interface OwnedRunContext extends RunContext {
  /** Release the pool and S3 client. Safe to call twice. */
  close(): Promise<void>
}

export async function createRunContext(settings: Settings, log: ILogger = loggers.workflow): Promise<OwnedRunContext> {
  const pool = createPool(settings.database.url, {
    min: settings.database.poolMin,
    max: settings.database.poolMax,
  })
  pool.on('error', error => {
    loggers.db.error('Idle client error', {}, error)
  })

  try {
    await warmupDb(pool)
  } catch (cause) {
    await pool.end()
    throw new HarvestError(`Database unavailable: ${toErrorMessage(cause)}`, 'run', { cause })
  }

  const fetcher = new HttpFetcher()
  const listings = new PgListingStore(pool)
  const identity = settings.harvest.userManagement ? new PgIdentityStore(pool) : undefined

  let s3: S3AssetStore | undefined
  if (settings.s3.uploadEnabled) {
    if (settings.s3.bucket) {
      s3 = new S3AssetStore({
        bucket: settings.s3.bucket,
        region: settings.s3.region,
        publicBaseUrl: settings.s3.publicBaseUrl,
      })
    } else {
      log.warn('S3 upload enabled without AWS_S3_BUCKET; asset migration disabled')
    }
  }

  const delay = new RandomDelayPolicy({
    minMs: settings.harvest.delayMinMs,
    maxMs: settings.harvest.delayMaxMs,
    onWait: (reason, ms) => loggers.fetch.debug('Politeness delay', { reason, ms }),
  })

  let closed = false
  return {
    fetcher,
    listings,
    identity,
    assets: s3
      ? {
          store: s3,
          downloader: fetcher,
          encoder: new SharpImageEncoder({ maxDimension: settings.images.maxSize, quality: settings.images.quality }),
          maxImagesPerRecord: settings.images.maxPerRecord,
        }
      : undefined,
    delay,
    baseUrl: settings.urls.baseUrl,
    log,
    async close() {
      if (closed) return
      closed = true
      s3?.destroy()
      await pool.end()
    },
  }
}

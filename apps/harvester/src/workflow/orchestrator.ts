/**
 * Workflow Orchestrator
 *
 * Drives one harvest run: discover result pages, then take each listing
 * through detail → normalize → persist → link → assets, strictly one at
 * a time. A failing item is recorded and skipped; only resource
 * acquisition (done by the caller, see context.ts) can abort a run.
 */

import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { ListingStore, IdentityStore } from '@carlistings/db'
import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { AssetMigrator } from '../assets/migrator.js'
import type { ImageEncoder } from '../assets/image-processor.js'
import type { AssetStore } from '../assets/s3-store.js'
import { DetailScraper, isFailedRecord } from '../detail/scraper.js'
import { ListingDiscoverer, prioritizeByPreview } from '../discovery/discoverer.js'
import { errorName, PersistenceError, toErrorMessage, TransportError, ValidationError } from '../errors.js'
import { IdentityLinker } from '../identity/linker.js'
import { normalizeRecord, toListingRow } from '../normalizer/index.js'
import { getRegistrableDomain, isOnSiteDomain, SITE_BASE_URL, SITE_DOMAIN } from '../utils/url.js'
import type {
  BinaryFetcher,
  DelayPolicy,
  ItemResult,
  ItemStage,
  ListingReference,
  MarkupFetcher,
  RunResult,
} from '../types.js'
import { recordRunCompleted } from './metrics.js'
import { RunStateMachine, type RunState } from './state.js'
import { RunStatsTracker } from './stats.js'

export const MAX_ITEMS_CEILING = 100

export interface AssetResources {
  store: AssetStore
  downloader: BinaryFetcher
  encoder?: ImageEncoder
  maxImagesPerRecord?: number
}

/**
 * Everything a run touches. Built per run; nothing in the pipeline reads
 * module state.
 */
export interface RunContext {
  fetcher: MarkupFetcher
  listings: ListingStore
  /** Omit to disable user management */
  identity?: IdentityStore
  /** Omit to disable asset migration */
  assets?: AssetResources
  delay: DelayPolicy
  /** Marketplace root; its registrable domain bounds discovery URLs */
  baseUrl?: string
  log?: ILogger
  now?: () => Date
}

export const runOptionsSchema = z.object({
  pageUrl: z.string().url(),
  maxPages: z.number().int().positive(),
  maxItems: z.number().int().positive(),
  migrateAssets: z.boolean().default(true),
  runId: z.string().min(1).optional(),
})

export type RunOptions = z.input<typeof runOptionsSchema> & { signal?: AbortSignal }

export type ValidatedRunOptions = z.output<typeof runOptionsSchema>

/**
 * Validate run input and clamp maxItems to the ceiling. The page URL must
 * belong to `siteDomain`.
 */
export function validateRunOptions(
  options: z.input<typeof runOptionsSchema>,
  siteDomain: string = SITE_DOMAIN
): ValidatedRunOptions {
  const parsed = runOptionsSchema.safeParse(options)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.') || undefined
    throw new ValidationError(`Invalid run options: ${field ?? 'input'}: ${issue?.message ?? 'invalid'}`, field, {
      stage: 'input',
    })
  }
  if (!isOnSiteDomain(parsed.data.pageUrl, siteDomain)) {
    throw new ValidationError(`Invalid run options: pageUrl: must be on ${siteDomain}`, 'pageUrl', {
      stage: 'input',
    })
  }
  return { ...parsed.data, maxItems: Math.min(parsed.data.maxItems, MAX_ITEMS_CEILING) }
}

export function formatItemError(position: number, url: string, error: unknown): string {
  return `Item ${position} (${url}): [${errorName(error)}] ${toErrorMessage(error)}`
}

export class WorkflowOrchestrator {
  private readonly ctx: RunContext
  private readonly machine = new RunStateMachine()
  private readonly log: ILogger
  private readonly now: () => Date
  private readonly siteDomain: string
  private readonly stats: RunStatsTracker
  private readonly discoverer: ListingDiscoverer
  private readonly scraper: DetailScraper
  private readonly linker?: IdentityLinker
  private readonly migrator?: AssetMigrator

  constructor(ctx: RunContext) {
    this.ctx = ctx
    this.log = ctx.log ?? silentLogger
    this.now = ctx.now ?? (() => new Date())
    this.stats = new RunStatsTracker(this.now)

    const baseUrl = ctx.baseUrl ?? SITE_BASE_URL
    this.siteDomain = ctx.baseUrl ? getRegistrableDomain(ctx.baseUrl) : SITE_DOMAIN

    this.discoverer = new ListingDiscoverer({
      fetcher: ctx.fetcher,
      delay: ctx.delay,
      log: this.log.child('discovery'),
      siteDomain: this.siteDomain,
      baseUrl,
    })
    this.scraper = new DetailScraper({
      fetcher: ctx.fetcher,
      log: this.log.child('detail'),
      now: this.now,
      baseUrl,
    })

    if (ctx.identity) {
      this.linker = new IdentityLinker(ctx.identity, this.log.child('identity'))
    }
    if (ctx.assets) {
      this.migrator = new AssetMigrator({
        downloader: ctx.assets.downloader,
        store: ctx.assets.store,
        listings: ctx.listings,
        encoder: ctx.assets.encoder,
        maxImagesPerRecord: ctx.assets.maxImagesPerRecord,
        log: this.log.child('assets'),
        now: this.now,
      })
    }
  }

  get state(): RunState {
    return this.machine.state
  }

  /**
   * Execute the run. An orchestrator runs once; build a new one per run.
   */
  async run(options: RunOptions): Promise<RunResult> {
    const input = validateRunOptions(options, this.siteDomain)
    const { signal } = options
    const runId = input.runId ?? randomUUID()
    const log = this.log.child({ runId })

    this.machine.transition('discovering')
    log.info('Harvest run started', {
      pageUrl: input.pageUrl,
      maxPages: input.maxPages,
      maxItems: input.maxItems,
      migrateAssets: input.migrateAssets,
      userManagement: this.linker !== undefined,
    })

    const errors: string[] = []
    const items: ItemResult[] = []
    let cancelled = false

    const discovery = await this.discoverer.discover(input.pageUrl, input.maxPages)
    this.stats.increment('discovered', discovery.references.length)
    for (const pageError of discovery.pageErrors) {
      this.stats.increment('errors')
      errors.push(`Page ${pageError.pageNumber} (${pageError.url}): [TransportError] ${pageError.error}`)
    }

    const selected = prioritizeByPreview(discovery.references).slice(0, input.maxItems)

    if (signal?.aborted) {
      cancelled = true
    } else {
      this.machine.transition('processing')
      for (let index = 0; index < selected.length; index++) {
        if (signal?.aborted) {
          cancelled = true
          break
        }
        if (index > 0) {
          await this.ctx.delay.wait('item')
        }

        const reference = selected[index]
        const result = await this.processItem(reference, input.migrateAssets, log)
        items.push(result.item)
        if (result.error !== undefined) {
          this.stats.increment('errors')
          errors.push(formatItemError(index + 1, reference.url, result.error))
        }
      }
    }

    if (cancelled) {
      log.warn('Harvest run cancelled', { processed: items.length, selected: selected.length })
    }

    this.machine.transition('finalized')
    const stats = this.stats.finalize()
    const success = stats.persisted > 0

    recordRunCompleted(
      { runId, pageUrl: input.pageUrl, success, cancelled, itemsAttempted: items.length, stats },
      log.child('metrics')
    )

    return { success, stats, errors, items, cancelled }
  }

  private async processItem(
    reference: ListingReference,
    migrateAssets: boolean,
    runLog: ILogger
  ): Promise<{ item: ItemResult; error?: unknown }> {
    const log = runLog.child({ url: reference.url, sourceId: reference.sourceId })
    const item: ItemResult = {
      url: reference.url,
      success: false,
      userCreated: false,
      linked: false,
      imagesMigrated: 0,
      warnings: [],
    }
    let stage: ItemStage = 'detail'

    try {
      const raw = await this.scraper.scrapeDetail(reference.url)
      if (isFailedRecord(raw)) {
        throw new TransportError(raw.error, { url: reference.url, stage: 'detail' })
      }
      this.stats.increment('scraped')

      stage = 'normalize'
      const record = normalizeRecord(raw, {
        preview: reference.preview,
        discovery: {
          strategy: reference.strategy,
          mobileMode: reference.mobileMode,
          pageNumber: reference.pageNumber,
        },
        now: this.now(),
      })

      stage = 'persist'
      let inserted: { id: number; created: boolean }
      try {
        inserted = await this.ctx.listings.insertOrGetId(toListingRow(record))
      } catch (cause) {
        throw new PersistenceError(`Saving listing failed: ${toErrorMessage(cause)}`, { cause })
      }
      this.stats.increment('persisted')
      item.recordId = inserted.id
      item.created = inserted.created
      item.success = true
      stage = 'link'

      if (!inserted.created) {
        // Already stored on an earlier run; nothing left to do
        this.stats.increment('duplicates')
        log.info('Listing already stored', { recordId: inserted.id })
        return { item }
      }

      if (this.linker && record.phoneNumber) {
        const linked = await this.linker.link(inserted.id, record.phoneNumber, {
          sellerName: record.sellerName,
          city: record.city,
          location: record.location,
        })
        if (linked.ok) {
          this.stats.increment('linked')
          if (linked.created) this.stats.increment('usersCreated')
          item.userId = linked.userId
          item.userCreated = linked.created
          item.linked = true
        } else if (linked.error) {
          item.warnings.push(`[${linked.error.name}] ${linked.error.message}`)
        }
      }

      stage = 'assets'
      const imageUrls = record.images?.originalUrls ?? []
      if (migrateAssets && this.migrator && imageUrls.length > 0) {
        const migration = await this.migrator.migrate(inserted.id, imageUrls)
        this.stats.increment('assetsMigrated', migration.migrated.length)
        item.imagesMigrated = migration.migrated.length
        for (const failure of migration.failures) {
          item.warnings.push(`[${failure.error.name}] ${failure.error.message}`)
        }
      }

      log.info('Item processed', {
        recordId: inserted.id,
        linked: item.linked,
        imagesMigrated: item.imagesMigrated,
        warnings: item.warnings.length,
      })
      return { item }
    } catch (error) {
      if (item.success) {
        // The listing is stored; a late link or asset failure only degrades it
        item.warnings.push(`[${errorName(error)}] ${toErrorMessage(error)}`)
        log.warn('Post-persist step failed', { stage, recordId: item.recordId }, error)
        return { item }
      }
      item.success = false
      item.stage = stage
      item.error = toErrorMessage(error)
      log.error('Item failed', { stage }, error)
      return { item, error }
    }
  }
}

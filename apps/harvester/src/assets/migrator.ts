/**
 * Asset Migrator
 *
 * Copies a listing's photos into the asset store and writes the result
 * back onto the listing's image set. Each image succeeds or fails on its
 * own; nothing here throws.
 */

import type { ImageSet, ListingStore, MigratedImage } from '@carlistings/db'
import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { AssetError, toErrorMessage } from '../errors.js'
import type { BinaryFetcher } from '../types.js'
import type { ImageEncoder } from './image-processor.js'
import type { AssetStore } from './s3-store.js'

export const DEFAULT_MAX_IMAGES_PER_RECORD = 5

export type AssetFailureStage = 'download' | 'upload' | 'write_back'

export interface AssetFailure {
  /** Position in the capped list; null for write-back failures */
  index: number | null
  original: string | null
  stage: AssetFailureStage
  error: AssetError
}

export interface MigrationResult {
  migrated: MigratedImage[]
  failures: AssetFailure[]
  /** The image set written back, when anything migrated */
  imageSet?: ImageSet
}

export interface AssetMigratorDeps {
  downloader: BinaryFetcher
  store: AssetStore
  listings: Pick<ListingStore, 'updateImages'>
  /** Omit to upload photos as downloaded */
  encoder?: ImageEncoder
  maxImagesPerRecord?: number
  log?: ILogger
  now?: () => Date
}

const EXTENSIONS: Record<string, string> = {
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
}

/**
 * Destination key for the image at `index` (zero-based) of a listing.
 * The extension follows the uploaded content type, jpg when unknown.
 */
export function assetKey(recordId: number, index: number, contentType = 'image/jpeg'): string {
  const mime = contentType.split(';')[0].trim().toLowerCase()
  return `cars/${recordId}/image_${index + 1}.${EXTENSIONS[mime] ?? 'jpg'}`
}

export class AssetMigrator {
  private readonly deps: AssetMigratorDeps
  private readonly maxImages: number
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(deps: AssetMigratorDeps) {
    this.deps = deps
    this.maxImages = deps.maxImagesPerRecord ?? DEFAULT_MAX_IMAGES_PER_RECORD
    this.log = deps.log ?? silentLogger
    this.now = deps.now ?? (() => new Date())
  }

  async migrate(recordId: number, imageUrls: readonly string[]): Promise<MigrationResult> {
    const migrated: MigratedImage[] = []
    const failures: AssetFailure[] = []
    const selected = imageUrls.slice(0, this.maxImages)

    for (let index = 0; index < selected.length; index++) {
      const original = selected[index]

      let payload: { bytes: Buffer; contentType: string }
      try {
        const downloaded = await this.deps.downloader.fetchBinary(original)
        payload = await this.encodeOrOriginal(downloaded.bytes, downloaded.contentType, original)
      } catch (cause) {
        failures.push(this.failure('download', index, original, cause))
        continue
      }

      const key = assetKey(recordId, index, payload.contentType)
      try {
        const newUrl = await this.deps.store.put(key, payload.bytes, payload.contentType)
        migrated.push({ original, newUrl, key, index })
      } catch (cause) {
        failures.push(this.failure('upload', index, original, cause))
      }
    }

    if (migrated.length === 0) {
      this.log.info('No images migrated', { recordId, attempted: selected.length, failed: failures.length })
      return { migrated, failures }
    }

    const imageSet: ImageSet = {
      originalUrls: [...imageUrls],
      migratedUrls: migrated,
      processedAt: this.now().toISOString(),
    }

    try {
      await this.deps.listings.updateImages(recordId, imageSet)
    } catch (cause) {
      failures.push(this.failure('write_back', null, null, cause))
    }

    this.log.info('Images migrated', {
      recordId,
      migrated: migrated.length,
      failed: failures.length,
    })
    return { migrated, failures, imageSet }
  }

  /**
   * Re-encode when an encoder is configured; a failed encode uploads
   * the original bytes instead.
   */
  private async encodeOrOriginal(
    bytes: Buffer,
    contentType: string | undefined,
    original: string
  ): Promise<{ bytes: Buffer; contentType: string }> {
    const passthrough = { bytes, contentType: contentType ?? 'image/jpeg' }
    if (!this.deps.encoder) return passthrough

    try {
      return await this.deps.encoder.encode(bytes)
    } catch (error) {
      this.log.warn('Re-encode failed, uploading original', { original, error: toErrorMessage(error) })
      return passthrough
    }
  }

  private failure(
    stage: AssetFailureStage,
    index: number | null,
    original: string | null,
    cause: unknown
  ): AssetFailure {
    const error = new AssetError(`${stage} failed: ${toErrorMessage(cause)}`, original ?? undefined, { cause })
    this.log.warn('Image migration step failed', { stage, index, original }, error)
    return { index, original, stage, error }
  }
}

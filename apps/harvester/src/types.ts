/**
 * Harvester Core Types
 *
 * Shapes passed between pipeline stages: discovery references, raw and
 * normalized records, transport contracts, and run bookkeeping.
 */

import type { ImageSet } from '@carlistings/db'

// ═══════════════════════════════════════════════════════════════════════════════
// Discovery
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Which discovery strategy produced a reference, in priority order.
 */
export type DiscoveryStrategyTag = 'detail_link' | 'alternate_link' | 'mobile_card' | 'fallback'

/**
 * Best-effort summary fields read from the result-list card.
 * Every field is optional; absence means "not found", never "invalid".
 */
export interface PreviewFields {
  title?: string
  brand?: string
  model?: string
  image?: string
  /** The matched price text, e.g. "14.500 €" */
  priceText?: string
  price?: number
  year?: number
}

/**
 * A listing found on a result page. Frozen once created.
 */
export interface ListingReference {
  readonly url: string
  /** Site-assigned id: the alphanumeric run after "ID" in the url, or unknown_<index> */
  readonly sourceId: string
  readonly pageNumber: number
  readonly index: number
  readonly strategy: DiscoveryStrategyTag
  readonly mobileMode: boolean
  readonly preview?: Readonly<PreviewFields>
}

export interface DiscoveryResult {
  references: ListingReference[]
  pagesFetched: number
  /** Pages whose fetch failed; discovery stops at the first one */
  pageErrors: Array<{ pageNumber: number; url: string; error: string }>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Unstructured field bag produced by the detail scraper.
 * Field presence and types are unreliable by construction.
 */
export type RawRecord = Record<string, unknown>

/** Discovery metadata carried onto the normalized record. */
export interface EnhancementMetadata {
  strategy: DiscoveryStrategyTag
  mobileMode: boolean
  pageNumber: number
  preview?: PreviewFields
  enhancedAt: string
}

/**
 * Canonical listing record. Optional fields are absent, never null.
 * `images` is the only field that changes after persistence.
 */
export interface NormalizedRecord {
  url: string
  scrapedAt: Date
  website: string
  title: string
  priceNegotiable: boolean
  phoneAvailable: boolean
  phoneExtracted: boolean
  messagingAvailable: boolean

  listingId?: string
  brand?: string
  model?: string
  year?: number
  /** Whole euros */
  price?: number
  priceRaw?: string

  mileage?: number
  mileageRaw?: string
  fuelType?: string
  transmission?: string
  power?: number
  powerRaw?: string
  engineSize?: number
  doors?: number
  seats?: number
  color?: string
  bodyType?: string
  condition?: string
  segment?: string

  location?: string
  locationRaw?: string
  city?: string
  district?: string

  description?: string
  descriptionLength?: number
  features?: string[]
  featuresCount?: number
  equipmentList?: string[]

  images?: ImageSet
  mainImage?: string
  imageCount?: number

  publicationDate?: Date
  publicationDateRaw?: string
  viewCount?: number

  sellerName?: string
  sellerType?: string
  sellerJoinDate?: Date
  sellerJoinDateRaw?: string
  sellerLastOnline?: Date
  sellerLastOnlineRaw?: string

  phoneNumber?: string
  phoneExtractionTime?: Date
  phoneExtractionError?: string

  firstRegistration?: string
  registrationMonth?: string
  inspection?: string
  co2Emissions?: string
  fuelConsumption?: string
  drivetrain?: string
  origin?: string
  category?: string

  enhancement?: EnhancementMetadata
}

// ═══════════════════════════════════════════════════════════════════════════════
// Transport
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchedPage {
  html: string
  /** URL after redirects; used to detect the mobile site */
  finalUrl: string
  statusCode?: number
}

/**
 * Returns page markup or throws a TransportError.
 */
export interface MarkupFetcher {
  fetchPage(url: string): Promise<FetchedPage>
}

export interface FetchedBinary {
  bytes: Buffer
  contentType?: string
}

export interface BinaryFetcher {
  fetchBinary(url: string): Promise<FetchedBinary>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

/**
 * Browser-like headers. The marketplace serves a reduced page to
 * obvious bots.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'pt-PT,pt;q=0.9,en;q=0.8',
} as const

export const DEFAULT_FETCH_TIMEOUT_MS = 30000
export const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

export type FetchResultStatus = 'ok' | 'error' | 'blocked' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  finalUrl?: string
  error?: string
  durationMs: number
}

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Politeness
// ═══════════════════════════════════════════════════════════════════════════════

export type DelayReason = 'page' | 'item'

/**
 * Waits between requests. Injected per run; tests use a no-op policy.
 */
export interface DelayPolicy {
  wait(reason: DelayReason): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run bookkeeping
// ═══════════════════════════════════════════════════════════════════════════════

export interface RunStatistics {
  discovered: number
  scraped: number
  persisted: number
  /** Items whose url was already stored; counted in persisted too */
  duplicates: number
  usersCreated: number
  linked: number
  assetsMigrated: number
  errors: number
  startedAt: Date
  completedAt?: Date
  durationMs?: number
}

export type ItemStage = 'detail' | 'normalize' | 'persist' | 'link' | 'assets'

export interface ItemResult {
  url: string
  success: boolean
  recordId?: number
  /** false when the url was already stored */
  created?: boolean
  userId?: number
  userCreated: boolean
  linked: boolean
  imagesMigrated: number
  /** Stage that failed, for failed items */
  stage?: ItemStage
  error?: string
  /** Soft failures (link, assets) on an otherwise successful item */
  warnings: string[]
}

export interface RunResult {
  success: boolean
  stats: Readonly<RunStatistics>
  errors: string[]
  items: ItemResult[]
  cancelled: boolean
}

/**
 * Record Normalizer
 *
 * Reconciles the detail-page RawRecord and the discovery-time preview
 * into one NormalizedRecord. Per logical field the detail value wins,
 * then the preview, then a derived fallback.
 */

import type { ImageSet } from '@carlistings/db'
import { ValidationError } from '../errors.js'
import { NO_PRICE, NO_TITLE } from '../detail/scraper.js'
import { brandFromTitle } from './brands.js'
import {
  cleanString,
  dropAbsent,
  parseTimestamp,
  safeBool,
  safeFloat,
  safeInt,
  safeJsonList,
} from './coerce.js'
import type {
  DiscoveryStrategyTag,
  EnhancementMetadata,
  NormalizedRecord,
  PreviewFields,
  RawRecord,
} from '../types.js'

export const PLACEHOLDER_TITLE = 'Carro Usado'
export const DEFAULT_WEBSITE = 'olx.pt'

export interface NormalizeContext {
  preview?: Readonly<PreviewFields>
  /** Where the listing was found; stored as enhancement metadata */
  discovery?: { strategy: DiscoveryStrategyTag; mobileMode: boolean; pageNumber: number }
  now?: Date
}

// Detail scraper placeholders carry no information
function detailTitle(raw: RawRecord): string | undefined {
  const title = cleanString(raw.title)
  return title === NO_TITLE ? undefined : title
}

function detailPriceRaw(raw: RawRecord): string | undefined {
  const priceRaw = cleanString(raw.price_raw)
  return priceRaw === NO_PRICE ? undefined : priceRaw
}

export function synthesizeTitle(parts: {
  brand?: string
  model?: string
  year?: number
  fuelType?: string
}): string {
  const words = [parts.brand, parts.model, parts.year?.toString(), parts.fuelType].filter(
    (word): word is string => Boolean(word)
  )
  return words.length > 0 ? words.join(' ') : PLACEHOLDER_TITLE
}

export function buildImageSet(raw: RawRecord, preview?: Readonly<PreviewFields>): ImageSet | undefined {
  const fromDetail = safeJsonList(raw.images)
  const originalUrls = fromDetail ?? (preview?.image ? [preview.image] : [])
  if (originalUrls.length === 0) return undefined
  return { originalUrls, migratedUrls: [], processedAt: null }
}

function transform(raw: RawRecord, context: NormalizeContext): NormalizedRecord {
  const url = cleanString(raw.url)
  if (!url) {
    throw new ValidationError('Record has no url', 'url')
  }

  const now = context.now ?? new Date()
  const preview = context.preview

  const rawTitle = detailTitle(raw)
  const brand =
    cleanString(raw.brand) ??
    cleanString(preview?.brand) ??
    brandFromTitle(rawTitle ?? preview?.title ?? '')
  const model = cleanString(raw.model) ?? cleanString(preview?.model)
  const year = safeInt(raw.year) ?? safeInt(preview?.year) ?? safeInt(raw.extracted_year)
  const fuelType = cleanString(raw.fuel_type)
  const title =
    rawTitle ?? cleanString(preview?.title) ?? synthesizeTitle({ brand, model, year, fuelType })

  const priceRaw = detailPriceRaw(raw) ?? cleanString(preview?.priceText)
  const price = safeInt(raw.price) ?? safeInt(preview?.price)

  const features = safeJsonList(raw.features)
  const equipmentList = safeJsonList(raw.equipment_list)
  const description = cleanString(raw.description)

  let enhancement: EnhancementMetadata | undefined
  if (context.discovery) {
    enhancement = {
      strategy: context.discovery.strategy,
      mobileMode: context.discovery.mobileMode,
      pageNumber: context.discovery.pageNumber,
      preview: preview && Object.keys(preview).length > 0 ? { ...preview } : undefined,
      enhancedAt: now.toISOString(),
    }
    dropAbsent(enhancement)
  }

  const record: NormalizedRecord = {
    url,
    scrapedAt: parseTimestamp(raw.scraped_at) ?? now,
    website: cleanString(raw.website) ?? DEFAULT_WEBSITE,
    listingId: cleanString(raw.listing_id),
    title,
    brand,
    model,
    year,

    price,
    priceRaw,
    priceNegotiable: safeBool(raw.price_negotiable),

    mileage: safeInt(raw.mileage),
    mileageRaw: cleanString(raw.mileage_raw),
    fuelType,
    transmission: cleanString(raw.transmission),
    power: safeInt(raw.power),
    powerRaw: cleanString(raw.power_raw),
    engineSize: safeFloat(raw.engine_size),
    doors: safeInt(raw.doors),
    seats: safeInt(raw.seats),
    color: cleanString(raw.color),
    bodyType: cleanString(raw.body_type),
    condition: cleanString(raw.condition),
    segment: cleanString(raw.segment),

    location: cleanString(raw.location),
    locationRaw: cleanString(raw.location_raw),
    city: cleanString(raw.city),
    district: cleanString(raw.district),

    description,
    descriptionLength: safeInt(raw.description_length) ?? description?.length,
    features,
    featuresCount: safeInt(raw.features_count) ?? features?.length,
    equipmentList,

    images: buildImageSet(raw, preview),
    mainImage: cleanString(raw.main_image),
    imageCount: safeInt(raw.image_count),

    publicationDate: parseTimestamp(raw.publication_date),
    publicationDateRaw: cleanString(raw.publication_date_raw),
    viewCount: safeInt(raw.view_count),

    sellerName: cleanString(raw.seller_name),
    sellerType: cleanString(raw.seller_type),
    sellerJoinDate: parseTimestamp(raw.seller_join_date),
    sellerJoinDateRaw: cleanString(raw.seller_join_date_raw),
    sellerLastOnline: parseTimestamp(raw.seller_last_online),
    sellerLastOnlineRaw: cleanString(raw.seller_last_online_raw),

    phoneAvailable: safeBool(raw.phone_available),
    phoneExtracted: safeBool(raw.phone_extracted),
    phoneNumber: cleanString(raw.phone_number),
    phoneExtractionTime: parseTimestamp(raw.phone_extraction_time),
    phoneExtractionError: cleanString(raw.phone_extraction_error),
    messagingAvailable: safeBool(raw.messaging_available),

    firstRegistration: cleanString(raw.first_registration),
    registrationMonth: cleanString(raw.registration_month),
    inspection: cleanString(raw.inspection),
    co2Emissions: cleanString(raw.co2_emissions),
    fuelConsumption: cleanString(raw.fuel_consumption),
    drivetrain: cleanString(raw.drivetrain),
    origin: cleanString(raw.origin),
    category: cleanString(raw.category),

    enhancement,
  }

  return dropAbsent(record)
}

/**
 * Normalize one listing.
 *
 * @throws ValidationError when the record has no url, or wrapping any
 *   unexpected failure inside the transform
 */
export function normalizeRecord(raw: RawRecord, context: NormalizeContext = {}): NormalizedRecord {
  try {
    return transform(raw, context)
  } catch (error) {
    if (error instanceof ValidationError) throw error
    throw new ValidationError(
      `Normalization failed: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    )
  }
}

import type { Queryable } from './client.js'
import { readId } from './rows.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface MigratedImage {
  original: string
  newUrl: string
  key: string
  index: number
}

/** Stored in `cars.images` as JSON. */
export interface ImageSet {
  originalUrls: string[]
  migratedUrls: MigratedImage[]
  processedAt: string | null
}

/**
 * Column-keyed listing row. Keys outside LISTING_COLUMNS are ignored on
 * insert; arrays and plain objects are stored as JSON.
 */
export interface ListingRow {
  url: string
  [column: string]: unknown
}

export interface InsertResult {
  id: number
  /** false when a row with the same url already existed */
  created: boolean
}

export interface ListingStore {
  insertOrGetId(row: ListingRow): Promise<InsertResult>
  updateImages(id: number, images: ImageSet): Promise<void>
}

/** Writable columns of `cars` (see schema.sql). */
export const LISTING_COLUMNS: ReadonlySet<string> = new Set([
  'url',
  'scraped_at',
  'website',
  'listing_id',
  'title',
  'brand',
  'model',
  'year',
  'price',
  'price_raw',
  'price_negotiable',
  'mileage',
  'mileage_raw',
  'fuel_type',
  'transmission',
  'power',
  'power_raw',
  'engine_size',
  'doors',
  'seats',
  'color',
  'body_type',
  'condition',
  'segment',
  'location',
  'location_raw',
  'city',
  'district',
  'description',
  'description_length',
  'features',
  'features_count',
  'equipment_list',
  'images',
  'main_image',
  'image_count',
  'publication_date',
  'publication_date_raw',
  'view_count',
  'seller_name',
  'seller_type',
  'seller_join_date',
  'seller_join_date_raw',
  'seller_last_online',
  'seller_last_online_raw',
  'phone_available',
  'phone_extracted',
  'phone_number',
  'phone_extraction_time',
  'phone_extraction_error',
  'messaging_available',
  'first_registration',
  'registration_month',
  'inspection',
  'co2_emissions',
  'fuel_consumption',
  'drivetrain',
  'origin',
  'category',
  'enhancement',
])

// ═══════════════════════════════════════════════════════════════════════════════
// Postgres implementation
// ═══════════════════════════════════════════════════════════════════════════════

export function toColumnValue(value: unknown): unknown {
  if (value === undefined) return null
  if (value === null || value instanceof Date) return value
  if (typeof value === 'object') return JSON.stringify(value)
  return value
}

/**
 * Builds the insert for a row. Column order follows the row's own key
 * order so the statement text is stable for identical shapes.
 */
export function buildInsert(row: ListingRow): { text: string; values: unknown[] } {
  const columns: string[] = []
  const values: unknown[] = []

  for (const [column, value] of Object.entries(row)) {
    if (!LISTING_COLUMNS.has(column) || value === undefined) continue
    columns.push(column)
    values.push(toColumnValue(value))
  }

  const placeholders = columns.map((_, i) => `$${i + 1}`)
  return {
    text:
      `INSERT INTO cars (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) ` +
      'ON CONFLICT (url) DO NOTHING RETURNING id',
    values,
  }
}

export class PgListingStore implements ListingStore {
  constructor(private readonly db: Queryable) {}

  async insertOrGetId(row: ListingRow): Promise<InsertResult> {
    const insert = buildInsert(row)
    const inserted = await this.db.query(insert.text, insert.values)
    if (inserted.rows.length > 0) {
      return { id: readId(inserted.rows[0]), created: true }
    }

    // Conflict on url: the listing was persisted by an earlier run
    const existing = await this.db.query('SELECT id FROM cars WHERE url = $1', [row.url])
    if (existing.rows.length === 0) {
      throw new Error(`Insert for ${row.url} returned no row and no existing row was found`)
    }
    return { id: readId(existing.rows[0]), created: false }
  }

  async updateImages(id: number, images: ImageSet): Promise<void> {
    const result = await this.db.query(
      'UPDATE cars SET images = $1, updated_at = NOW() WHERE id = $2',
      [JSON.stringify(images), id]
    )
    if (result.rowCount === 0) {
      throw new Error(`Listing ${id} not found`)
    }
  }
}

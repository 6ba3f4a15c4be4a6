import type { ListingRow } from '@carlistings/db'
import type { NormalizedRecord } from '../types.js'

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, letter => `_${letter.toLowerCase()}`)
}

/**
 * Column-keyed row for the listing store. Field names map one-to-one
 * onto snake_case columns.
 */
export function toListingRow(record: NormalizedRecord): ListingRow {
  const row: ListingRow = { url: record.url }
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue
    row[toSnakeCase(key)] = value
  }
  return row
}

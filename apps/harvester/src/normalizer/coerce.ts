/**
 * Coercion helpers
 *
 * Each takes an untrusted value from a RawRecord and returns the typed
 * value or undefined. None of them throw.
 */

const TRUTHY_TOKENS = new Set(['true', '1', 'yes', 'sim', 'verdadeiro'])
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/

/**
 * Trimmed string; empty becomes undefined. Numbers and booleans are
 * stringified, anything else is dropped.
 */
export function cleanString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const cleaned = value.trim()
    return cleaned || undefined
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  if (typeof value === 'boolean') return String(value)
  return undefined
}

/**
 * Integer from a number (truncated) or a string with ',', '.' or spaces
 * as thousands separators ("150.000" -> 150000).
 */
export function safeInt(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/[,.\s]/g, '')
    return /^\d+$/.test(cleaned) ? Number.parseInt(cleaned, 10) : undefined
  }
  return undefined
}

/**
 * Float with ',' accepted as the decimal separator ("1,6" -> 1.6).
 */
export function safeFloat(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '.').replace(/\s/g, '')
    if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return undefined
    return Number.parseFloat(cleaned)
  }
  return undefined
}

/**
 * Boolean with Portuguese truthy tokens. Absent means false.
 */
export function safeBool(value: unknown): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') return TRUTHY_TOKENS.has(value.trim().toLowerCase())
  if (typeof value === 'number') return value !== 0
  return false
}

/**
 * String list from an array, a JSON array string, or a comma list.
 * Empty lists become undefined.
 */
export function safeJsonList(value: unknown): string[] | undefined {
  let items: unknown[] = []

  if (Array.isArray(value)) {
    items = value
  } else if (typeof value === 'string') {
    const trimmed = value.trim()
    if (!trimmed) return undefined

    let parsed: unknown = undefined
    if (trimmed.startsWith('[')) {
      try {
        parsed = JSON.parse(trimmed)
      } catch {
        parsed = undefined
      }
    }
    items = Array.isArray(parsed) ? parsed : trimmed.split(',')
  } else {
    return undefined
  }

  const list = items.map(cleanString).filter((item): item is string => item !== undefined)
  return list.length > 0 ? list : undefined
}

/**
 * Trailing 'Z' becomes an explicit '+00:00' offset.
 */
export function normalizeIsoOffset(text: string): string {
  return text.endsWith('Z') ? `${text.slice(0, -1)}+00:00` : text
}

/**
 * Date from a Date or ISO-8601 text; anything else is undefined.
 */
export function parseTimestamp(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value
  }
  if (typeof value !== 'string') return undefined

  const text = value.trim()
  if (!ISO_DATE_PREFIX.test(text)) return undefined

  const parsed = new Date(normalizeIsoOffset(text))
  return Number.isNaN(parsed.getTime()) ? undefined : parsed
}

/**
 * Remove keys whose value is undefined or null, in place.
 */
export function dropAbsent<T extends object>(record: T): T {
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined || value === null) {
      Reflect.deleteProperty(record, key)
    }
  }
  return record
}

/**
 * Contact Phone Normalization
 *
 * Canonical form for seller phone numbers. User entities are keyed on the
 * value returned here, so every lookup and insert must go through it.
 *
 * Rules (Portuguese numbering plan):
 *   - keep digits and '+', drop everything else
 *   - 9 digits starting with 9 (national mobile)  → '+351' prefix
 *   - 12 digits starting with 351 (missing plus) → '+' prefix
 *   - anything else is kept as cleaned
 */

/** Bump when normalization logic changes (user rows are keyed on the output) */
export const PHONE_NORMALIZATION_VERSION = '1.0.0'

export const PT_COUNTRY_CODE = '351'

/**
 * Normalize a raw phone string.
 *
 * @returns Canonical identifier, or null when nothing usable remains
 */
export function normalizePhone(raw: string | null | undefined): string | null {
  if (!raw) return null

  const cleaned = raw.replace(/[^\d+]/g, '')
  if (!/\d/.test(cleaned)) return null

  if (cleaned.length === 9 && cleaned.startsWith('9')) {
    return `+${PT_COUNTRY_CODE}${cleaned}`
  }

  if (cleaned.length === 12 && cleaned.startsWith(PT_COUNTRY_CODE)) {
    return `+${cleaned}`
  }

  return cleaned
}

/**
 * True when the normalized form carries an explicit country code.
 */
export function isInternational(normalized: string): boolean {
  return normalized.startsWith('+')
}

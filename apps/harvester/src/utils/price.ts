/**
 * Euro price text parsing.
 *
 * Portuguese listings write thousands with '.' or a space and decimals
 * with ',': "14.000 €", "14 000,50 €", "Negociável 9.500€".
 */

export interface ParsedPrice {
  price: number | null
  negotiable: boolean
}

const NEGOTIABLE_MARKER = /negociável/gi

// A match never starts in the middle of a digit run
const DETAIL_PRICE_PATTERNS = [
  /(?<!\d)(\d{1,3}(?:\.\d{3})*(?:,\d{2})?)\s*€/g,
  /(?<!\d)(\d{1,3}(?:\s\d{3})*(?:,\d{2})?)\s*€/g,
  /(?<!\d)(\d+(?:,\d{2})?)\s*€/g,
]

const PREVIEW_PRICE_PATTERNS = [
  /€\s*(\d{1,3}(?:[.\s]\d{3})*(?:,\d{2})?)/,
  /(?<!\d)(\d{1,3}(?:[.\s]\d{3})*)\s*€/,
  /(?<!\d)(\d{1,3}(?:\.\d{3})+)\s*€/,
]

/**
 * "14.000,50" -> 14000.5. Thousands separators are dropped, the decimal
 * comma becomes a point.
 */
export function parseEuroAmount(numberText: string): number | null {
  const normalized = numberText.replace(/[.\s]/g, '').replace(',', '.')
  if (!/^\d+(\.\d+)?$/.test(normalized)) return null
  const value = Number.parseFloat(normalized)
  return Number.isFinite(value) ? value : null
}

export function isNegotiable(text: string): boolean {
  return text.toLowerCase().includes('negociável')
}

/**
 * Parse a detail-page price label.
 *
 * Every pattern is tried; the match covering the most characters wins,
 * earlier patterns winning ties. This keeps "14 000,50 €" from being read
 * as its "000,50 €" tail by the dot-separated pattern.
 */
export function parsePriceText(text: string | null | undefined): ParsedPrice {
  if (!text) return { price: null, negotiable: false }

  const negotiable = isNegotiable(text)
  const stripped = text.replace(NEGOTIABLE_MARKER, ' ')

  let best: { length: number; amount: string } | null = null
  for (const pattern of DETAIL_PRICE_PATTERNS) {
    for (const match of stripped.matchAll(pattern)) {
      if (!best || match[0].length > best.length) {
        best = { length: match[0].length, amount: match[1] }
      }
    }
  }

  return {
    price: best ? parseEuroAmount(best.amount) : null,
    negotiable,
  }
}

/**
 * Find a price in free card text. First pattern that matches wins.
 */
export function findPreviewPrice(text: string): { priceText: string; price: number | null } | null {
  for (const pattern of PREVIEW_PRICE_PATTERNS) {
    const match = pattern.exec(text)
    if (match) {
      return { priceText: match[0].trim(), price: parseEuroAmount(match[1]) }
    }
  }
  return null
}

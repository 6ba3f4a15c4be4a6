/**
 * Known car brands, in match priority order. "Volkswagen" precedes "VW"
 * so the long form wins when a title carries both.
 */
export const KNOWN_BRANDS = [
  'BMW',
  'Mercedes',
  'Audi',
  'Volkswagen',
  'VW',
  'Ford',
  'Opel',
  'Renault',
  'Peugeot',
  'Citroën',
  'Honda',
  'Toyota',
  'Nissan',
  'Mazda',
  'Hyundai',
  'Kia',
  'Volvo',
  'Skoda',
  'SEAT',
  'Fiat',
] as const

/**
 * First known brand contained in the title (case-insensitive substring).
 */
export function findKnownBrand(title: string): string | undefined {
  const upper = title.toUpperCase()
  return KNOWN_BRANDS.find(brand => upper.includes(brand.toUpperCase()))
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}

/**
 * Brand guess from a title: a known brand, else the first word when it
 * is alphabetic and longer than two characters.
 */
export function brandFromTitle(title: string): string | undefined {
  const known = findKnownBrand(title)
  if (known) return known

  const firstWord = title.trim().split(/\s+/)[0]
  if (firstWord && firstWord.length > 2 && /^\p{L}+$/u.test(firstWord)) {
    return titleCase(firstWord)
  }
  return undefined
}

/**
 * Brand and the word that follows it, e.g. "BMW 320d Touring" ->
 * { brand: 'BMW', model: '320d' }.
 */
export function brandAndModelFromTitle(title: string): { brand?: string; model?: string } {
  const brand = findKnownBrand(title)
  if (!brand) return {}

  const words = title.trim().split(/\s+/)
  const at = words.findIndex(word => word.toUpperCase().includes(brand.toUpperCase()))
  const model = at >= 0 ? words[at + 1]?.replace(/[^\p{L}\p{N}-]/gu, '') : undefined
  return model ? { brand, model } : { brand }
}

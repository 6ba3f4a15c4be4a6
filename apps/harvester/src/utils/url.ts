/**
 * Marketplace URL helpers
 *
 * Listing links come in several shapes (relative, absolute, mobile host).
 * Everything the pipeline stores goes through toAbsoluteUrl first.
 */

import psl from 'psl'

export const SITE_BASE_URL = 'https://www.olx.pt'

/** Registrable domain every discovery URL must belong to */
export const SITE_DOMAIN = 'olx.pt'

/** Substring of the resolved URL that marks the mobile-rendered site */
export const MOBILE_HOST_MARKER = 'm.olx.pt'

const LISTING_ID_PATTERN = /ID([A-Za-z0-9]+)/

/**
 * Make a link absolute against the site root.
 * Returns null for anything that is neither absolute nor root-relative.
 */
export function toAbsoluteUrl(href: string, baseUrl: string = SITE_BASE_URL): string | null {
  const trimmed = href.trim()
  if (trimmed.startsWith('//')) return `https:${trimmed}`
  if (trimmed.startsWith('http')) return trimmed
  if (trimmed.startsWith('/')) return `${baseUrl}${trimmed}`
  return null
}

/**
 * A stored listing URL must point at an ad page carrying a site id.
 */
export function isListingUrl(url: string): boolean {
  return url.includes('/anuncio/') && url.includes('ID')
}

/**
 * Site-assigned listing id: the alphanumeric run after "ID".
 */
export function extractListingId(url: string): string | undefined {
  return LISTING_ID_PATTERN.exec(url)?.[1]
}

export function isMobileUrl(resolvedUrl: string): boolean {
  return resolvedUrl.includes(MOBILE_HOST_MARKER)
}

/**
 * URL of the Nth result page. Page 1 is the URL itself.
 */
export function pageUrl(baseUrl: string, pageNumber: number): string {
  if (pageNumber <= 1) return baseUrl
  const separator = baseUrl.includes('?') ? '&' : '?'
  return `${baseUrl}${separator}page=${pageNumber}`
}

/**
 * Validate that a URL is valid and has a supported protocol.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL using the Public
 * Suffix List. Falls back to the hostname when psl cannot parse it.
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  return psl.get(hostname) ?? hostname
}

export function isOnSiteDomain(url: string, domain: string = SITE_DOMAIN): boolean {
  return isValidUrl(url) && getRegistrableDomain(url) === domain
}

/**
 * Browse URL for one brand, e.g. brandUrl('BMW') ->
 * https://www.olx.pt/carros-motos-e-barcos/carros/bmw/
 */
export function brandUrl(brand: string, template = `${SITE_BASE_URL}/carros-motos-e-barcos/carros/{brand}/`): string {
  const slug = brand
    .trim()
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return template.replace('{brand}', slug)
}

/**
 * Detail Scraper
 *
 * Fetches one ad page and reads it into a RawRecord. Title and price
 * come from ordered selector lists; everything else is best effort.
 * Failures are returned as { url, error, scraped_at }, never thrown.
 */

import type { CheerioAPI } from 'cheerio'
import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { ParseError, toErrorMessage } from '../errors.js'
import { cleanText, firstMatchingText, firstText, loadHtml } from '../utils/html.js'
import { parsePriceText } from '../utils/price.js'
import { extractListingId, SITE_BASE_URL, toAbsoluteUrl } from '../utils/url.js'
import { parseParameters } from './parameters.js'
import { PRICE_SELECTORS, SELECTORS, TITLE_SELECTORS } from './selectors.js'
import type { MarkupFetcher, RawRecord } from '../types.js'

export const NO_TITLE = 'No title'
export const NO_PRICE = 'No price'

export interface DetailScraperDeps {
  fetcher: MarkupFetcher
  log?: ILogger
  now?: () => Date
  /** Root that relative image links resolve against */
  baseUrl?: string
}

export interface ParseDetailOptions {
  baseUrl?: string
  /** Receives selector misses at debug level */
  log?: ILogger
}

/** True for the { url, error, scraped_at } shape returned on failure. */
export function isFailedRecord(raw: RawRecord): raw is RawRecord & { error: string } {
  return typeof raw.error === 'string'
}

const looksLikePrice = (text: string): boolean => text.includes('€') || /\d/.test(text)

function collectImages($: CheerioAPI, baseUrl: string): string[] {
  const urls: string[] = []
  $(SELECTORS.images).each((_, element) => {
    const img = $(element)
    const srcset = img.attr('srcset')?.split(',')[0]?.trim().split(/\s+/)[0]
    const src = img.attr('src') || img.attr('data-src') || srcset
    const url = src ? toAbsoluteUrl(src, baseUrl) : null
    if (url && !urls.includes(url)) {
      urls.push(url)
    }
  })
  return urls
}

/**
 * "Lisboa, Benfica - Hoje às 10:00" -> location "Lisboa, Benfica",
 * city "Lisboa", district "Benfica".
 */
export function splitLocation(raw: string): { location: string; city?: string; district?: string } {
  const location = raw.split(' - ')[0].trim()
  const [city, district] = location.split(',').map(part => part.trim())
  return {
    location,
    ...(city ? { city } : {}),
    ...(district ? { district } : {}),
  }
}

/**
 * Read an ad page. Pure: same markup and clock give the same record.
 */
export function parseDetailPage(html: string, url: string, now: Date, options: ParseDetailOptions = {}): RawRecord {
  const $ = loadHtml(html)
  const log = options.log ?? silentLogger

  const title = firstMatchingText($, TITLE_SELECTORS)
  if (!title) {
    log.debug('Title not found', { url }, new ParseError(`No title selector matched on ${url}`))
  }
  const price = firstMatchingText($, PRICE_SELECTORS, looksLikePrice)
  if (!price) {
    log.debug('Price not found', { url }, new ParseError(`No price selector matched on ${url}`))
  }
  const parsedPrice = parsePriceText(price?.text)

  const record: RawRecord = {
    url,
    title: title?.text ?? NO_TITLE,
    price_raw: price?.text ?? NO_PRICE,
    price: parsedPrice.price,
    price_negotiable: parsedPrice.negotiable,
    scraped_at: now.toISOString(),
    source: 'detail_page',
  }

  const listingId = extractListingId(url)
  if (listingId) record.listing_id = listingId

  const description = cleanText($(SELECTORS.description).first().text())
  if (description) {
    record.description = description
    record.description_length = description.length
  }

  const images = collectImages($, options.baseUrl ?? SITE_BASE_URL)
  if (images.length > 0) {
    record.images = images
    record.main_image = images[0]
    record.image_count = images.length
  }

  const locationRaw = firstText($, SELECTORS.location)
  if (locationRaw) {
    record.location_raw = locationRaw
    Object.assign(record, splitLocation(locationRaw))
  }

  const sellerName = firstText($, SELECTORS.sellerName)
  if (sellerName) record.seller_name = sellerName

  const joinDate = firstText($, SELECTORS.sellerJoinDate)
  if (joinDate) record.seller_join_date_raw = joinDate

  const lastOnline = firstText($, SELECTORS.sellerLastOnline)
  if (lastOnline) record.seller_last_online_raw = lastOnline

  const phoneHref = $(SELECTORS.phone).first().attr('href')
  const phone = phoneHref?.replace(/^tel:/, '').trim()
  if (phone) {
    record.phone_number = phone
    record.phone_extraction_time = now.toISOString()
  }
  record.phone_extracted = Boolean(phone)
  record.phone_available = Boolean(phone) || $(SELECTORS.phoneButton).length > 0
  record.messaging_available = $(SELECTORS.messageButton).length > 0

  const postedAt = firstText($, SELECTORS.postedAt)
  if (postedAt) record.publication_date_raw = postedAt

  const views = firstText($, SELECTORS.viewCount).replace(/\D/g, '')
  if (views) record.view_count = views

  const crumbs = $(SELECTORS.breadcrumbs)
    .map((_, element) => cleanText($(element).text()))
    .get()
    .filter(Boolean)
  if (crumbs.length > 0) record.category = crumbs[crumbs.length - 1]

  const parameterItems = $(SELECTORS.parameters)
    .map((_, element) => cleanText($(element).text()))
    .get()
  Object.assign(record, parseParameters(parameterItems))

  return record
}

export class DetailScraper {
  private readonly fetcher: MarkupFetcher
  private readonly log: ILogger
  private readonly now: () => Date
  private readonly baseUrl: string

  constructor(deps: DetailScraperDeps) {
    this.fetcher = deps.fetcher
    this.log = deps.log ?? silentLogger
    this.now = deps.now ?? (() => new Date())
    this.baseUrl = deps.baseUrl ?? SITE_BASE_URL
  }

  async scrapeDetail(url: string): Promise<RawRecord> {
    try {
      const page = await this.fetcher.fetchPage(url)
      const record = parseDetailPage(page.html, url, this.now(), { baseUrl: this.baseUrl, log: this.log })
      this.log.debug('Detail parsed', {
        url,
        title: record.title,
        priceRaw: record.price_raw,
        hasPhone: record.phone_extracted,
      })
      return record
    } catch (error) {
      this.log.warn('Detail scrape failed', { url }, error)
      return {
        url,
        error: toErrorMessage(error),
        scraped_at: this.now().toISOString(),
      }
    }
  }
}

/**
 * Listing Discoverer
 *
 * Walks result pages 1..maxPages, applying the strategy chain to each.
 * An empty page ends discovery (end of results); so does a page that
 * cannot be fetched, returning whatever was found before it.
 */

import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { ValidationError, toErrorMessage } from '../errors.js'
import { noDelay } from '../fetch/politeness.js'
import { loadHtml } from '../utils/html.js'
import { isMobileUrl, isOnSiteDomain, pageUrl, SITE_BASE_URL, SITE_DOMAIN } from '../utils/url.js'
import { previewRichness } from './preview.js'
import { applyStrategies, DEFAULT_STRATEGIES, type DiscoveryStrategy } from './strategies.js'
import type { DelayPolicy, DiscoveryResult, ListingReference, MarkupFetcher } from '../types.js'

export interface ListingDiscovererDeps {
  fetcher: MarkupFetcher
  delay?: DelayPolicy
  log?: ILogger
  strategies?: readonly DiscoveryStrategy[]
  /** Registrable domain discovery URLs must belong to */
  siteDomain?: string
  /** Root that relative listing links resolve against */
  baseUrl?: string
}

/**
 * Keep the first occurrence of each url, preserving order.
 */
export function dedupeByUrl(references: readonly ListingReference[]): ListingReference[] {
  const seen = new Set<string>()
  const unique: ListingReference[] = []
  for (const reference of references) {
    if (seen.has(reference.url)) continue
    seen.add(reference.url)
    unique.push(reference)
  }
  return unique
}

export class ListingDiscoverer {
  private readonly fetcher: MarkupFetcher
  private readonly delay: DelayPolicy
  private readonly log: ILogger
  private readonly strategies: readonly DiscoveryStrategy[]
  private readonly siteDomain: string
  private readonly baseUrl: string

  constructor(deps: ListingDiscovererDeps) {
    this.fetcher = deps.fetcher
    this.delay = deps.delay ?? noDelay
    this.log = deps.log ?? silentLogger
    this.strategies = deps.strategies ?? DEFAULT_STRATEGIES
    this.siteDomain = deps.siteDomain ?? SITE_DOMAIN
    this.baseUrl = deps.baseUrl ?? SITE_BASE_URL
  }

  async discover(startUrl: string, maxPages: number): Promise<DiscoveryResult> {
    if (!isOnSiteDomain(startUrl, this.siteDomain)) {
      throw new ValidationError(`Discovery URL must be on ${this.siteDomain}: ${startUrl}`, 'pageUrl', {
        stage: 'input',
      })
    }
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new ValidationError(`maxPages must be a positive integer, got ${maxPages}`, 'maxPages', {
        stage: 'input',
      })
    }

    const collected: ListingReference[] = []
    const pageErrors: DiscoveryResult['pageErrors'] = []
    let pagesFetched = 0

    for (let pageNumber = 1; pageNumber <= maxPages; pageNumber++) {
      const url = pageUrl(startUrl, pageNumber)

      let html: string
      let finalUrl: string
      try {
        const page = await this.fetcher.fetchPage(url)
        html = page.html
        finalUrl = page.finalUrl
      } catch (error) {
        this.log.error('Result page fetch failed', { pageNumber, url }, error)
        pageErrors.push({ pageNumber, url, error: toErrorMessage(error) })
        break
      }
      pagesFetched++

      const mobileMode = isMobileUrl(finalUrl)
      const found = applyStrategies(
        { $: loadHtml(html), pageNumber, mobileMode, baseUrl: this.baseUrl, log: this.log },
        this.strategies
      )

      if (!found) {
        this.log.warn('No listings on page, stopping', { pageNumber, url, mobileMode })
        break
      }

      this.log.info('Page discovered', {
        pageNumber,
        strategy: found.strategy,
        references: found.references.length,
        mobileMode,
      })
      collected.push(...found.references)

      if (pageNumber < maxPages) {
        await this.delay.wait('page')
      }
    }

    const references = dedupeByUrl(collected)
    this.log.info('Discovery finished', {
      pagesFetched,
      found: collected.length,
      unique: references.length,
    })

    return { references, pagesFetched, pageErrors }
  }
}

/**
 * Stable sort by number of populated preview fields, richest first.
 */
export function prioritizeByPreview(references: readonly ListingReference[]): ListingReference[] {
  return references
    .map((reference, position) => ({ reference, position, score: previewRichness(reference.preview) }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .map(entry => entry.reference)
}


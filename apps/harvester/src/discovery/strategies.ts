/**
 * Discovery strategies, most specific first.
 *
 * Each strategy is a pure function over a parsed result page returning
 * the references it recognises, or null when it recognises none. The
 * discoverer stops at the first non-null result for a page.
 */

import type { CheerioAPI } from 'cheerio'
import type { Element } from 'domhandler'
import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { extractListingId, isListingUrl, SITE_BASE_URL, toAbsoluteUrl } from '../utils/url.js'
import { extractPreview } from './preview.js'
import type { DiscoveryStrategyTag, ListingReference } from '../types.js'

export interface StrategyContext {
  $: CheerioAPI
  pageNumber: number
  mobileMode: boolean
  baseUrl?: string
  log?: ILogger
}

export interface DiscoveryStrategy {
  tag: DiscoveryStrategyTag
  find(ctx: StrategyContext): ListingReference[] | null
}

const DETAIL_LINK_PATTERN = /\/d\/anuncio\/.*ID[A-Za-z0-9]+\.html/
const ALTERNATE_LINK_PATTERN = /\/anuncio\/.*ID[A-Za-z0-9]+/
const LOOSE_ID_PATTERN = /ID[A-Za-z0-9]+/
const CARD_CLASS_PATTERN = /(^|\s)css-/

/** Pair of the element previews are read from and the href it links to. */
interface Candidate {
  element: Element
  href: string
}

/**
 * Turn candidates into frozen references. Candidates whose link cannot be
 * made absolute or does not point at an ad page are skipped.
 */
export function buildReferences(
  ctx: StrategyContext,
  tag: DiscoveryStrategyTag,
  candidates: Candidate[]
): ListingReference[] | null {
  const references: ListingReference[] = []

  for (const candidate of candidates) {
    const url = toAbsoluteUrl(candidate.href, ctx.baseUrl ?? SITE_BASE_URL)
    if (!url || !isListingUrl(url)) continue

    const index = references.length
    references.push(
      Object.freeze({
        url,
        sourceId: extractListingId(url) ?? `unknown_${index}`,
        pageNumber: ctx.pageNumber,
        index,
        strategy: tag,
        mobileMode: ctx.mobileMode,
        preview: Object.freeze(extractPreview(ctx.$, candidate.element, ctx.log ?? silentLogger)),
      })
    )
  }

  return references.length > 0 ? references : null
}

function anchorsMatching(ctx: StrategyContext, accept: (href: string) => boolean): Candidate[] {
  const candidates: Candidate[] = []
  ctx.$('a[href]').each((_, element) => {
    const href = ctx.$(element).attr('href')
    if (href && accept(href)) {
      candidates.push({ element, href })
    }
  })
  return candidates
}

export const detailLinkStrategy: DiscoveryStrategy = {
  tag: 'detail_link',
  find: ctx =>
    buildReferences(ctx, 'detail_link', anchorsMatching(ctx, href => DETAIL_LINK_PATTERN.test(href))),
}

export const alternateLinkStrategy: DiscoveryStrategy = {
  tag: 'alternate_link',
  find: ctx =>
    buildReferences(
      ctx,
      'alternate_link',
      anchorsMatching(ctx, href => ALTERNATE_LINK_PATTERN.test(href))
    ),
}

/**
 * Mobile pages hash their class names, so cards are any `css-*` element
 * that is, or wraps, an ad link.
 */
export const mobileCardStrategy: DiscoveryStrategy = {
  tag: 'mobile_card',
  find: ctx => {
    if (!ctx.mobileMode) return null

    const { $ } = ctx
    const candidates: Candidate[] = []
    $('a[class], div[class]').each((_, element) => {
      const node = $(element)
      if (!CARD_CLASS_PATTERN.test(node.attr('class') ?? '')) return

      const href = element.tagName === 'a' ? node.attr('href') : node.find('a[href]').first().attr('href')
      if (href && href.includes('/anuncio/')) {
        candidates.push({ element, href })
      }
    })
    return buildReferences(ctx, 'mobile_card', candidates)
  },
}

export const fallbackStrategy: DiscoveryStrategy = {
  tag: 'fallback',
  find: ctx =>
    buildReferences(
      ctx,
      'fallback',
      anchorsMatching(
        ctx,
        href => LOOSE_ID_PATTERN.test(href) && (href.includes('anuncio') || href.includes('carros'))
      )
    ),
}

export const DEFAULT_STRATEGIES: readonly DiscoveryStrategy[] = [
  detailLinkStrategy,
  alternateLinkStrategy,
  mobileCardStrategy,
  fallbackStrategy,
]

/**
 * Run strategies in order, stopping at the first that yields anything.
 */
export function applyStrategies(
  ctx: StrategyContext,
  strategies: readonly DiscoveryStrategy[] = DEFAULT_STRATEGIES
): { strategy: DiscoveryStrategyTag; references: ListingReference[] } | null {
  for (const strategy of strategies) {
    const references = strategy.find(ctx)
    if (references) {
      return { strategy: strategy.tag, references }
    }
  }
  return null
}

/**
 * Preview extraction from result-list cards.
 *
 * Best effort by contract: a card that breaks a selector yields fewer
 * fields, never an exception.
 */

import type { Cheerio, CheerioAPI } from 'cheerio'
import type { Element } from 'domhandler'
import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { ParseError, toErrorMessage } from '../errors.js'
import { brandAndModelFromTitle } from '../normalizer/brands.js'
import { cleanText } from '../utils/html.js'
import { findPreviewPrice } from '../utils/price.js'
import type { PreviewFields } from '../types.js'

const YEAR_PATTERN = /\b(19|20)\d{2}\b/

function resolveTitle(element: Cheerio<Element>, container: Cheerio<Element>): string | undefined {
  const titleAttr = element.attr('title')?.trim()
  if (titleAttr) return titleAttr

  const alt = container.find('img[alt]').first().attr('alt')?.trim()
  if (alt && alt.length > 10) return alt

  const text = cleanText(element.text())
  if (text.length > 5 && text.length < 200) return text

  return undefined
}

function resolveImage(container: Cheerio<Element>): string | undefined {
  const img = container.find('img').first()
  if (img.length === 0) return undefined

  const src = img.attr('src') || img.attr('data-src') || img.attr('data-original')
  if (!src) return undefined
  return src.startsWith('//') ? `https:${src}` : src
}

/**
 * Read summary fields around a listing link. The container is the
 * element's parent when it has one.
 */
export function extractPreview(
  $: CheerioAPI,
  element: Element,
  log: ILogger = silentLogger
): PreviewFields {
  const preview: PreviewFields = {}

  try {
    const node = $(element)
    const parent = node.parent()
    const container = parent.length > 0 ? parent : node

    const title = resolveTitle(node, container)
    if (title) {
      preview.title = title
      Object.assign(preview, brandAndModelFromTitle(title))
    }

    const image = resolveImage(container)
    if (image) preview.image = image

    const text = container.text()

    const price = findPreviewPrice(text)
    if (price) {
      preview.priceText = price.priceText
      if (price.price !== null) preview.price = price.price
    }

    const year = YEAR_PATTERN.exec(text)
    if (year) preview.year = Number(year[0])
  } catch (cause) {
    const error = new ParseError(`Preview extraction failed: ${toErrorMessage(cause)}`, { cause })
    log.debug('Preview extraction failed', {}, error)
  }

  return preview
}

/** Number of populated preview fields, used to rank references. */
export function previewRichness(preview: PreviewFields | undefined): number {
  if (!preview) return 0
  return Object.values(preview).filter(value => value !== undefined).length
}

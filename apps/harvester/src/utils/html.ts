import * as cheerio from 'cheerio'

export type { CheerioAPI } from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/** Collapse runs of whitespace (including &nbsp;) and trim. */
export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return cleanText($(selector).first().text())
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

/**
 * Try selectors in order against each selector's first element; the first
 * non-empty text passing `accept` wins.
 */
export function firstMatchingText(
  $: cheerio.CheerioAPI,
  selectors: readonly string[],
  accept: (text: string) => boolean = () => true
): { text: string; selector: string } | null {
  for (const selector of selectors) {
    const text = firstText($, selector)
    if (text && accept(text)) {
      return { text, selector }
    }
  }
  return null
}

import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../errors.js'
import { FixtureFetcher } from '../../testing/fakes.js'
import type { DelayReason, ListingReference } from '../../types.js'
import { ListingDiscoverer, dedupeByUrl, prioritizeByPreview } from '../discoverer.js'

const START = 'https://www.olx.pt/carros-motos-e-barcos/carros/'

function resultPage(ids: string[]): string {
  const cards = ids.map(id => `<li><a href="/d/anuncio/carro-${id}-ID${id}.html">Carro ${id}</a></li>`)
  return `<html><body><ul>${cards.join('')}</ul></body></html>`
}

function recordingDelay() {
  const waits: DelayReason[] = []
  return { waits, wait: async (reason: DelayReason) => void waits.push(reason) }
}

describe('ListingDiscoverer', () => {
  it('dedupes overlapping pages in first-seen order', async () => {
    const fetcher = new FixtureFetcher({
      [START]: resultPage(['a1', 'a2', 'a3']),
      [`${START}?page=2`]: resultPage(['a3', 'b1', 'a1', 'b2']),
    })
    const delay = recordingDelay()

    const result = await new ListingDiscoverer({ fetcher, delay }).discover(START, 2)

    expect(result.references.map(reference => reference.sourceId)).toEqual(['a1', 'a2', 'a3', 'b1', 'b2'])
    expect(result.pagesFetched).toBe(2)
    expect(result.pageErrors).toEqual([])
    expect(delay.waits).toEqual(['page'])
  })

  it('stops at the first failed page and reports it', async () => {
    const fetcher = new FixtureFetcher({ [START]: resultPage(['a1', 'a2']) })

    const result = await new ListingDiscoverer({ fetcher }).discover(START, 3)

    expect(result.references).toHaveLength(2)
    expect(result.pagesFetched).toBe(1)
    expect(result.pageErrors).toEqual([
      { pageNumber: 2, url: `${START}?page=2`, error: `HTTP 404 for ${START}?page=2` },
    ])
    expect(fetcher.requested).toEqual([START, `${START}?page=2`])
  })

  it('stops at a page without listings', async () => {
    const fetcher = new FixtureFetcher({
      [START]: resultPage(['a1']),
      [`${START}?page=2`]: '<html><body><p>Sem resultados</p></body></html>',
      [`${START}?page=3`]: resultPage(['c1']),
    })

    const result = await new ListingDiscoverer({ fetcher }).discover(START, 3)

    expect(result.references.map(reference => reference.sourceId)).toEqual(['a1'])
    expect(result.pagesFetched).toBe(2)
    expect(fetcher.requested).toHaveLength(2)
  })

  it('marks references from the mobile site', async () => {
    const fetcher = new FixtureFetcher({
      [START]: {
        html: '<div class="css-1x"><span>Kia Ceed</span><a href="/anuncio/kia-IDk1">ver</a></div>',
        finalUrl: 'https://m.olx.pt/carros-motos-e-barcos/carros/',
      },
    })

    const result = await new ListingDiscoverer({ fetcher }).discover(START, 1)

    expect(result.references).toHaveLength(1)
    expect(result.references[0]).toMatchObject({ sourceId: 'k1', mobileMode: true })
  })

  it('resolves relative listing links against the configured base url', async () => {
    const fetcher = new FixtureFetcher({ [START]: resultPage(['c1']) })

    const result = await new ListingDiscoverer({ fetcher, baseUrl: 'https://m.olx.pt' }).discover(START, 1)

    expect(result.references.map(reference => reference.url)).toEqual(['https://m.olx.pt/d/anuncio/carro-c1-IDc1.html'])
  })

  it('rejects urls outside the marketplace', async () => {
    const discoverer = new ListingDiscoverer({ fetcher: new FixtureFetcher() })

    await expect(discoverer.discover('https://example.com/carros/', 1)).rejects.toBeInstanceOf(ValidationError)
  })

  it('rejects a non-positive page count', async () => {
    const discoverer = new ListingDiscoverer({ fetcher: new FixtureFetcher() })

    await expect(discoverer.discover(START, 0)).rejects.toMatchObject({ name: 'ValidationError', field: 'maxPages' })
  })
})

function reference(sourceId: string, preview: ListingReference['preview']): ListingReference {
  return {
    url: `https://www.olx.pt/d/anuncio/x-ID${sourceId}.html`,
    sourceId,
    pageNumber: 1,
    index: 0,
    strategy: 'detail_link',
    mobileMode: false,
    preview,
  }
}

describe('prioritizeByPreview', () => {
  it('orders by populated preview fields and keeps ties stable', () => {
    const ordered = prioritizeByPreview([
      reference('p1', { title: 'Carro' }),
      reference('p2', { title: 'BMW 320d', brand: 'BMW', price: 9000 }),
      reference('p3', undefined),
      reference('p4', { title: 'Fiat Punto' }),
      reference('p5', { title: 'Audi A3', year: 2019 }),
    ])

    expect(ordered.map(item => item.sourceId)).toEqual(['p2', 'p5', 'p1', 'p4', 'p3'])
  })
})

describe('dedupeByUrl', () => {
  it('keeps the first occurrence', () => {
    const first = reference('d1', { title: 'first' })
    const second = reference('d1', { title: 'second' })

    expect(dedupeByUrl([first, second])).toEqual([first])
  })
})

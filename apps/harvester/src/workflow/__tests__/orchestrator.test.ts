import { describe, expect, it, vi } from 'vitest'
import { AssetMigrator } from '../../assets/migrator.js'
import { TransportError, ValidationError } from '../../errors.js'
import {
  FakeBinaryFetcher,
  FixtureFetcher,
  InMemoryAssetStore,
  InMemoryIdentityStore,
  InMemoryListingStore,
} from '../../testing/fakes.js'
import type { DelayReason } from '../../types.js'
import { IllegalTransitionError } from '../state.js'
import {
  MAX_ITEMS_CEILING,
  WorkflowOrchestrator,
  formatItemError,
  validateRunOptions,
  type RunContext,
} from '../orchestrator.js'

const START = 'https://www.olx.pt/carros-motos-e-barcos/carros/'
const NOW = new Date('2024-03-15T09:30:00.000Z')

const PAGE_ONE = ['a1', 'a2', 'a3', 'a4', 'a5', 'a6', 'a7', 'a8']
// a8 is listed again on page 2
const PAGE_TWO = ['a8', 'b1', 'b2', 'b3', 'b4', 'b5', 'b6', 'b7']

function adUrl(id: string): string {
  return `https://www.olx.pt/d/anuncio/carro-${id}-ID${id}.html`
}

function resultPage(ids: string[]): string {
  const cards = ids.map(id => `<li><a href="/d/anuncio/carro-${id}-ID${id}.html">Carro ${id}</a></li>`)
  return `<html><body><ul>${cards.join('')}</ul></body></html>`
}

function detailPage(id: string, extra: { phone?: string; images?: string[] } = {}): string {
  const phone = extra.phone ? `<a href="tel:${extra.phone}">Ligar</a>` : ''
  const images = (extra.images ?? []).map(src => `<img data-testid="swiper-image" src="${src}">`).join('')
  return `<html><body>
    <h1 data-testid="listing-title">Carro ${id}</h1>
    <h3 data-testid="ad-price-container">10.000 €</h3>
    ${images}
    ${phone}
  </body></html>`
}

function harness() {
  const fetcher = new FixtureFetcher({
    [START]: resultPage(PAGE_ONE),
    [`${START}?page=2`]: resultPage(PAGE_TWO),
  })
  for (const id of [...PAGE_ONE, ...PAGE_TWO]) {
    fetcher.set(adUrl(id), detailPage(id))
  }
  fetcher.set(adUrl('a1'), detailPage('a1', { phone: '929816076', images: ['https://img.test/a1-1.jpg', 'https://img.test/a1-2.jpg'] }))
  fetcher.set(adUrl('a2'), detailPage('a2', { phone: '+351 929 816 076' }))
  fetcher.set(adUrl('a3'), detailPage('a3', { phone: '912 345 678' }))
  fetcher.set(
    adUrl('b1'),
    new TransportError('HTTP 503: Service Unavailable', { url: adUrl('b1'), status: 'error', statusCode: 503 })
  )

  const waits: DelayReason[] = []
  const listings = new InMemoryListingStore()
  const identity = new InMemoryIdentityStore()
  const assetStore = new InMemoryAssetStore()
  const context: RunContext = {
    fetcher,
    listings,
    identity,
    assets: { store: assetStore, downloader: new FakeBinaryFetcher() },
    delay: { wait: async reason => void waits.push(reason) },
    now: () => NOW,
  }
  return { fetcher, listings, identity, assetStore, waits, context }
}

describe('WorkflowOrchestrator', () => {
  it('harvests two pages, isolating one failed item', async () => {
    const { listings, identity, assetStore, waits, context } = harness()
    const orchestrator = new WorkflowOrchestrator(context)

    const result = await orchestrator.run({ pageUrl: START, maxPages: 2, maxItems: 10 })

    expect(result.success).toBe(true)
    expect(result.cancelled).toBe(false)
    expect(result.stats).toMatchObject({
      discovered: 15,
      scraped: 9,
      persisted: 9,
      duplicates: 0,
      usersCreated: 2,
      linked: 3,
      assetsMigrated: 2,
      errors: 1,
      startedAt: NOW,
      completedAt: NOW,
      durationMs: 0,
    })
    expect(result.errors).toEqual([`Item 9 (${adUrl('b1')}): [TransportError] HTTP 503: Service Unavailable`])
    expect(result.items).toHaveLength(10)
    expect(result.items[8]).toEqual({
      url: adUrl('b1'),
      success: false,
      userCreated: false,
      linked: false,
      imagesMigrated: 0,
      warnings: [],
      stage: 'detail',
      error: 'HTTP 503: Service Unavailable',
    })

    expect(listings.rows.size).toBe(9)
    expect(listings.idFor(adUrl('b1'))).toBeUndefined()
    expect(listings.idFor(adUrl('b3'))).toBeUndefined()
    expect(identity.users.size).toBe(2)
    expect(identity.links.get(1)).toBe(identity.links.get(2))
    expect([...assetStore.objects.keys()]).toEqual(['cars/1/image_1.jpg', 'cars/1/image_2.jpg'])
    expect(listings.images.get(1)?.migratedUrls).toHaveLength(2)

    expect(waits.filter(reason => reason === 'page')).toHaveLength(1)
    expect(waits.filter(reason => reason === 'item')).toHaveLength(9)
    expect(orchestrator.state).toBe('finalized')
    expect(Object.isFrozen(result.stats)).toBe(true)
  })

  it('persists the normalized record', async () => {
    const { listings, context } = harness()

    await new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 1, maxItems: 1 })

    expect(listings.rows.get(1)).toEqual({
      url: adUrl('a1'),
      scraped_at: NOW,
      website: 'olx.pt',
      listing_id: 'a1',
      title: 'Carro a1',
      brand: 'Carro',
      price: 10000,
      price_raw: '10.000 €',
      price_negotiable: false,
      images: {
        originalUrls: ['https://img.test/a1-1.jpg', 'https://img.test/a1-2.jpg'],
        migratedUrls: [],
        processedAt: null,
      },
      main_image: 'https://img.test/a1-1.jpg',
      image_count: 2,
      phone_available: true,
      phone_extracted: true,
      phone_number: '929816076',
      phone_extraction_time: NOW,
      messaging_available: false,
      enhancement: {
        strategy: 'detail_link',
        mobileMode: false,
        pageNumber: 1,
        preview: { title: 'Carro a1' },
        enhancedAt: '2024-03-15T09:30:00.000Z',
      },
    })
  })

  it('skips linking and images when those resources are absent or disabled', async () => {
    const { listings, assetStore, context } = harness()

    const result = await new WorkflowOrchestrator({ ...context, identity: undefined }).run({
      pageUrl: START,
      maxPages: 1,
      maxItems: 3,
      migrateAssets: false,
    })

    expect(result.stats).toMatchObject({ persisted: 3, linked: 0, usersCreated: 0, assetsMigrated: 0 })
    expect(assetStore.objects.size).toBe(0)
    expect(listings.images.size).toBe(0)
  })

  it('treats an already stored url as a no-op', async () => {
    const { listings, identity, context } = harness()
    await listings.insertOrGetId({ url: adUrl('a1') })

    const result = await new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 1, maxItems: 1 })

    expect(result.success).toBe(true)
    expect(result.stats).toMatchObject({ persisted: 1, duplicates: 1, linked: 0 })
    expect(result.items[0]).toMatchObject({ recordId: 1, created: false, success: true })
    expect(identity.users.size).toBe(0)
  })

  it('records persistence failures and carries on', async () => {
    const { listings, context } = harness()
    listings.failingUrls.add(adUrl('a2'))

    const result = await new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 1, maxItems: 3 })

    expect(result.stats).toMatchObject({ scraped: 3, persisted: 2, errors: 1 })
    expect(result.errors).toEqual([
      `Item 2 (${adUrl('a2')}): [PersistenceError] Saving listing failed: insert failed for ${adUrl('a2')}`,
    ])
    expect(result.items[1]).toMatchObject({ success: false, stage: 'persist' })
  })

  it('keeps link failures soft', async () => {
    const { identity, context } = harness()
    vi.spyOn(identity, 'findOrCreate').mockRejectedValue(new Error('deadlock detected'))

    const result = await new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 1, maxItems: 1 })

    expect(result.success).toBe(true)
    expect(result.errors).toEqual([])
    expect(result.items[0].warnings).toEqual(['[LinkError] Linking listing 1 failed: deadlock detected'])
  })

  it('keeps an unexpected asset stage failure soft once the listing is stored', async () => {
    const { listings, context } = harness()
    const migrate = vi.spyOn(AssetMigrator.prototype, 'migrate').mockRejectedValueOnce(new Error('bucket vanished'))

    const result = await new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 1, maxItems: 1 })
    migrate.mockRestore()

    expect(result.success).toBe(true)
    expect(result.errors).toEqual([])
    expect(result.stats.errors).toBe(0)
    expect(result.stats.persisted).toBe(1)
    expect(result.items[0]).toMatchObject({ success: true, recordId: 1, warnings: ['[Error] bucket vanished'] })
    expect(result.items[0].stage).toBeUndefined()
    expect(listings.rows.size).toBe(1)
  })

  it('reports a failed discovery page', async () => {
    const { fetcher, context } = harness()
    fetcher.set(`${START}?page=2`, new TransportError('HTTP 500: Internal Server Error', { url: `${START}?page=2` }))

    const result = await new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 2, maxItems: 2 })

    expect(result.stats.discovered).toBe(8)
    expect(result.errors).toEqual([`Page 2 (${START}?page=2): [TransportError] HTTP 500: Internal Server Error`])
    expect(result.stats.persisted).toBe(2)
  })

  it('fails the run when nothing persists', async () => {
    const { context } = harness()

    const result = await new WorkflowOrchestrator({ ...context, fetcher: new FixtureFetcher({ [START]: '<p>vazio</p>' }) }).run({
      pageUrl: START,
      maxPages: 1,
      maxItems: 5,
    })

    expect(result.success).toBe(false)
    expect(result.items).toEqual([])
    expect(result.stats.discovered).toBe(0)
  })

  it('stops between items once cancelled', async () => {
    const { context } = harness()
    const controller = new AbortController()
    let itemWaits = 0
    const delay = {
      wait: async (reason: DelayReason) => {
        if (reason === 'item' && ++itemWaits === 2) controller.abort()
      },
    }

    const result = await new WorkflowOrchestrator({ ...context, delay }).run({
      pageUrl: START,
      maxPages: 1,
      maxItems: 8,
      signal: controller.signal,
    })

    expect(result.cancelled).toBe(true)
    expect(result.items).toHaveLength(3)
    expect(result.stats.persisted).toBe(3)
  })

  it('does not process anything when cancelled before the first item', async () => {
    const { context } = harness()
    const controller = new AbortController()
    controller.abort()

    const orchestrator = new WorkflowOrchestrator(context)
    const result = await orchestrator.run({ pageUrl: START, maxPages: 1, maxItems: 5, signal: controller.signal })

    expect(result).toMatchObject({ cancelled: true, success: false, items: [] })
    expect(orchestrator.state).toBe('finalized')
  })

  it('runs only once', async () => {
    const { context } = harness()
    const orchestrator = new WorkflowOrchestrator(context)
    await orchestrator.run({ pageUrl: START, maxPages: 1, maxItems: 1 })

    await expect(orchestrator.run({ pageUrl: START, maxPages: 1, maxItems: 1 })).rejects.toBeInstanceOf(
      IllegalTransitionError
    )
  })

  it('rejects invalid input before discovery', async () => {
    const { fetcher, context } = harness()

    await expect(new WorkflowOrchestrator(context).run({ pageUrl: START, maxPages: 1, maxItems: 0 })).rejects.toBeInstanceOf(
      ValidationError
    )
    await expect(
      new WorkflowOrchestrator(context).run({ pageUrl: 'https://example.com/carros/', maxPages: 1, maxItems: 1 })
    ).rejects.toMatchObject({ name: 'ValidationError', stage: 'input' })
    expect(fetcher.requested).toEqual([])
  })

  it('leaves the run idle when the page url is off the marketplace', async () => {
    const { fetcher, context } = harness()
    const orchestrator = new WorkflowOrchestrator(context)

    await expect(
      orchestrator.run({ pageUrl: 'https://example.com/carros/', maxPages: 1, maxItems: 1 })
    ).rejects.toMatchObject({ name: 'ValidationError', field: 'pageUrl' })

    expect(orchestrator.state).toBe('idle')
    expect(fetcher.requested).toEqual([])
  })

  it('bounds discovery by the domain of the configured base url', async () => {
    const { context } = harness()
    const orchestrator = new WorkflowOrchestrator({ ...context, baseUrl: 'https://www.standvirtual.com' })

    await expect(orchestrator.run({ pageUrl: START, maxPages: 1, maxItems: 1 })).rejects.toMatchObject({
      message: 'Invalid run options: pageUrl: must be on standvirtual.com',
    })
    expect(orchestrator.state).toBe('idle')
  })
})

describe('validateRunOptions', () => {
  it('clamps maxItems to the ceiling', () => {
    expect(validateRunOptions({ pageUrl: START, maxPages: 1, maxItems: 500 })).toEqual({
      pageUrl: START,
      maxPages: 1,
      maxItems: MAX_ITEMS_CEILING,
      migrateAssets: true,
    })
  })

  it('rejects a page url outside the site domain', () => {
    expect(() => validateRunOptions({ pageUrl: 'https://www.olx.com.br/autos/', maxPages: 1, maxItems: 1 })).toThrow(
      'Invalid run options: pageUrl: must be on olx.pt'
    )
    expect(() =>
      validateRunOptions({ pageUrl: 'https://www.olx.com.br/autos/', maxPages: 1, maxItems: 1 }, 'olx.com.br')
    ).not.toThrow()
  })

  it('names the offending field', () => {
    let caught: unknown
    try {
      validateRunOptions({ pageUrl: START, maxPages: 1.5, maxItems: 1 })
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught).toMatchObject({ field: 'maxPages', stage: 'input' })
  })
})

describe('formatItemError', () => {
  it('formats position, url, error name and message', () => {
    expect(formatItemError(3, 'https://www.olx.pt/d/anuncio/x-IDa1.html', new ValidationError('Record has no url'))).toBe(
      'Item 3 (https://www.olx.pt/d/anuncio/x-IDa1.html): [ValidationError] Record has no url'
    )
    expect(formatItemError(1, 'u', 'plain')).toBe('Item 1 (u): [UnknownError] plain')
  })
})

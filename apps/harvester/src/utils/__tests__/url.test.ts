import { describe, expect, it } from 'vitest'
import {
  brandUrl,
  extractListingId,
  isListingUrl,
  isMobileUrl,
  isOnSiteDomain,
  pageUrl,
  toAbsoluteUrl,
} from '../url.js'

describe('toAbsoluteUrl', () => {
  it('prefixes protocol-relative links with https', () => {
    expect(toAbsoluteUrl('//www.olx.pt/d/anuncio/x-IDab1.html')).toBe('https://www.olx.pt/d/anuncio/x-IDab1.html')
  })

  it('joins root-relative links to the site root', () => {
    expect(toAbsoluteUrl('/d/anuncio/x-IDab1.html')).toBe('https://www.olx.pt/d/anuncio/x-IDab1.html')
  })

  it('keeps absolute links', () => {
    expect(toAbsoluteUrl('https://m.olx.pt/d/anuncio/x-IDab1.html')).toBe('https://m.olx.pt/d/anuncio/x-IDab1.html')
  })

  it('rejects page-relative links', () => {
    expect(toAbsoluteUrl('anuncio/x-IDab1.html')).toBeNull()
  })
})

describe('listing urls', () => {
  it('requires an ad path and a site id', () => {
    expect(isListingUrl('https://www.olx.pt/d/anuncio/x-IDab1.html')).toBe(true)
    expect(isListingUrl('https://www.olx.pt/carros-motos-e-barcos/carros/')).toBe(false)
    expect(isListingUrl('https://www.olx.pt/d/anuncio/sem-id.html')).toBe(false)
  })

  it('extracts the alphanumeric id after ID', () => {
    expect(extractListingId('https://www.olx.pt/d/anuncio/bmw-320d-IDHx7Ab.html')).toBe('Hx7Ab')
    expect(extractListingId('https://www.olx.pt/d/anuncio/sem-id.html')).toBeUndefined()
  })

  it('detects the mobile host', () => {
    expect(isMobileUrl('https://m.olx.pt/carros/')).toBe(true)
    expect(isMobileUrl('https://www.olx.pt/carros/')).toBe(false)
  })
})

describe('pageUrl', () => {
  it('returns the base url for page 1', () => {
    expect(pageUrl('https://www.olx.pt/carros/', 1)).toBe('https://www.olx.pt/carros/')
  })

  it('appends the page parameter', () => {
    expect(pageUrl('https://www.olx.pt/carros/', 3)).toBe('https://www.olx.pt/carros/?page=3')
    expect(pageUrl('https://www.olx.pt/carros/?search=bmw', 2)).toBe('https://www.olx.pt/carros/?search=bmw&page=2')
  })
})

describe('isOnSiteDomain', () => {
  it('accepts any host under the registrable domain', () => {
    expect(isOnSiteDomain('https://www.olx.pt/carros/')).toBe(true)
    expect(isOnSiteDomain('https://m.olx.pt/carros/')).toBe(true)
  })

  it('rejects other domains and non-http urls', () => {
    expect(isOnSiteDomain('https://www.olx.com.br/carros/')).toBe(false)
    expect(isOnSiteDomain('ftp://www.olx.pt/carros/')).toBe(false)
    expect(isOnSiteDomain('not a url')).toBe(false)
  })
})

describe('brandUrl', () => {
  it('slugs the brand into the browse template', () => {
    expect(brandUrl('BMW')).toBe('https://www.olx.pt/carros-motos-e-barcos/carros/bmw/')
    expect(brandUrl('Citroën')).toBe('https://www.olx.pt/carros-motos-e-barcos/carros/citroen/')
    expect(brandUrl(' Land Rover ')).toBe('https://www.olx.pt/carros-motos-e-barcos/carros/land-rover/')
  })

  it('uses a custom template', () => {
    expect(brandUrl('Audi', 'https://m.olx.pt/carros/{brand}')).toBe('https://m.olx.pt/carros/audi')
  })
})

import { describe, expect, it, vi } from 'vitest'
import { LinkError } from '../../errors.js'
import { InMemoryIdentityStore } from '../../testing/fakes.js'
import { IdentityLinker } from '../linker.js'

describe('IdentityLinker', () => {
  it('creates the user on first sight and reuses it afterwards', async () => {
    const store = new InMemoryIdentityStore()
    const linker = new IdentityLinker(store)

    const first = await linker.link(1, '929816076', { sellerName: 'João', city: 'Lisboa' })
    const second = await linker.link(2, '+351 929 816 076')

    expect(first).toEqual({ ok: true, userId: 1, created: true, listingCount: 1 })
    expect(second).toEqual({ ok: true, userId: 1, created: false, listingCount: 2 })
    expect(store.users.get('+351929816076')).toMatchObject({
      name: 'João',
      city: 'Lisboa',
      totalCars: 2,
      activeListings: 2,
    })
    expect(store.touched).toEqual([1])
  })

  it('falls back to the location when no city is known', async () => {
    const store = new InMemoryIdentityStore()

    await new IdentityLinker(store).link(7, '912345678', { location: 'Porto' })

    expect(store.users.get('+351912345678')?.city).toBe('Porto')
  })

  it('rejects identifiers without digits', async () => {
    const store = new InMemoryIdentityStore()
    const findOrCreate = vi.spyOn(store, 'findOrCreate')

    await expect(new IdentityLinker(store).link(1, '')).resolves.toEqual({ ok: false, reason: 'INVALID_IDENTIFIER' })
    await expect(new IdentityLinker(store).link(1, undefined)).resolves.toEqual({
      ok: false,
      reason: 'INVALID_IDENTIFIER',
    })
    expect(findOrCreate).not.toHaveBeenCalled()
  })

  it('returns store failures as a LinkError', async () => {
    const store = new InMemoryIdentityStore()
    vi.spyOn(store, 'linkListing').mockRejectedValue(new Error('connection reset'))

    const result = await new IdentityLinker(store).link(3, '929816076')

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.reason).toBe('STORE_ERROR')
    expect(result.error).toBeInstanceOf(LinkError)
    expect(result.error?.message).toBe('Linking listing 3 failed: connection reset')
  })
})

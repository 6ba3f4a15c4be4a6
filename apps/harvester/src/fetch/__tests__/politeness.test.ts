import { describe, expect, it, vi } from 'vitest'
import { RandomDelayPolicy, noDelay } from '../politeness.js'

describe('RandomDelayPolicy', () => {
  it('waits a uniform delay inside the range', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined)
    const onWait = vi.fn()
    const policy = new RandomDelayPolicy({ minMs: 2000, maxMs: 4000, random: () => 0.25, sleep, onWait })

    await policy.wait('item')

    expect(sleep).toHaveBeenCalledWith(2500)
    expect(onWait).toHaveBeenCalledWith('item', 2500)
  })

  it('covers both ends of the range', () => {
    expect(new RandomDelayPolicy({ minMs: 100, maxMs: 300, random: () => 0 }).nextDelayMs()).toBe(100)
    expect(new RandomDelayPolicy({ minMs: 100, maxMs: 300, random: () => 0.999999 }).nextDelayMs()).toBe(300)
  })

  it('rejects an inverted range', () => {
    expect(() => new RandomDelayPolicy({ minMs: 500, maxMs: 100 })).toThrow(RangeError)
  })
})

describe('noDelay', () => {
  it('resolves immediately', async () => {
    await expect(noDelay.wait('page')).resolves.toBeUndefined()
  })
})

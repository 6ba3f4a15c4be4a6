import type { DelayPolicy, DelayReason } from '../types.js'

export interface RandomDelayOptions {
  minMs: number
  maxMs: number
  /** Defaults to Math.random */
  random?: () => number
  /** Defaults to a setTimeout-backed sleep */
  sleep?: (ms: number) => Promise<void>
  onWait?: (reason: DelayReason, ms: number) => void
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Uniformly random pause between requests.
 */
export class RandomDelayPolicy implements DelayPolicy {
  private readonly minMs: number
  private readonly maxMs: number
  private readonly random: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly onWait?: (reason: DelayReason, ms: number) => void

  constructor(options: RandomDelayOptions) {
    if (options.minMs < 0 || options.maxMs < options.minMs) {
      throw new RangeError(`Invalid delay range ${options.minMs}..${options.maxMs}ms`)
    }
    this.minMs = options.minMs
    this.maxMs = options.maxMs
    this.random = options.random ?? Math.random
    this.sleep = options.sleep ?? sleep
    this.onWait = options.onWait
  }

  nextDelayMs(): number {
    return Math.round(this.minMs + this.random() * (this.maxMs - this.minMs))
  }

  async wait(reason: DelayReason): Promise<void> {
    const ms = this.nextDelayMs()
    this.onWait?.(reason, ms)
    await this.sleep(ms)
  }
}

/** Policy that never waits. */
export const noDelay: DelayPolicy = {
  wait: async () => {},
}

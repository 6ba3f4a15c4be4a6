import type { RunStatistics } from '../types.js'

export type RunCounter =
  | 'discovered'
  | 'scraped'
  | 'persisted'
  | 'duplicates'
  | 'usersCreated'
  | 'linked'
  | 'assetsMigrated'
  | 'errors'

/**
 * Run counters. Mutated only by the orchestrator loop; frozen by
 * finalize(), after which increments throw.
 */
export class RunStatsTracker {
  private readonly counters: Record<RunCounter, number> = {
    discovered: 0,
    scraped: 0,
    persisted: 0,
    duplicates: 0,
    usersCreated: 0,
    linked: 0,
    assetsMigrated: 0,
    errors: 0,
  }
  private readonly startedAt: Date
  private final?: Readonly<RunStatistics>

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now()
  }

  get isFinalized(): boolean {
    return this.final !== undefined
  }

  get(counter: RunCounter): number {
    return this.counters[counter]
  }

  increment(counter: RunCounter, by = 1): void {
    if (this.final) {
      throw new Error(`Run statistics are final; cannot increment ${counter}`)
    }
    this.counters[counter] += by
  }

  /** Frozen copy of the current values. */
  snapshot(): Readonly<RunStatistics> {
    if (this.final) return this.final
    return Object.freeze({ ...this.counters, startedAt: this.startedAt })
  }

  /** Stamp completion once; later calls return the same object. */
  finalize(): Readonly<RunStatistics> {
    if (this.final) return this.final
    const completedAt = this.now()
    this.final = Object.freeze({
      ...this.counters,
      startedAt: this.startedAt,
      completedAt,
      durationMs: completedAt.getTime() - this.startedAt.getTime(),
    })
    return this.final
  }
}

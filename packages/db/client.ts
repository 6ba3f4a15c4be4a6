import pg from 'pg'
import type { PoolConfig } from 'pg'

/**
 * Minimal query surface the stores depend on. `pg.Pool` satisfies it;
 * tests pass an in-process fake.
 */
export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>>; rowCount?: number | null }>
}

export interface PoolSettings {
  max?: number
  min?: number
  applicationName?: string
}

/**
 * Connection pool configuration
 *
 * Environment variables (read by the caller's settings layer):
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 1)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: listing-harvester)
 */
export function getPoolConfig(connectionString: string, settings: PoolSettings = {}): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    max: settings.max ?? 10,
    min: settings.min ?? 1,

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: settings.applicationName ?? 'listing-harvester',
  }
}

/**
 * Creates the pool shared by every item of a run. Queries acquire and
 * release a client per statement via `pool.query`.
 */
export function createPool(connectionString: string | undefined, settings: PoolSettings = {}): pg.Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }
  return new pg.Pool(getPoolConfig(connectionString, settings))
}

/**
 * Round-trips a trivial query so a misconfigured database fails the run
 * before any item is processed.
 */
export async function warmupDb(db: Queryable): Promise<void> {
  await db.query('SELECT 1')
}

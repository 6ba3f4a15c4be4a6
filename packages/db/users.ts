import type { Queryable } from './client.js'
import { readDate, readId, readInt, readOptionalString } from './rows.js'

export interface UserEntity {
  id: number
  phoneNumber: string
  name?: string
  city?: string
  totalCars: number
  activeListings: number
  createdAt: Date
  updatedAt: Date
  lastSeen: Date
  isActive: boolean
}

/** Values used only when the user is created. */
export interface UserSeed {
  name?: string
  city?: string
}

export interface FindOrCreateResult {
  user: UserEntity
  created: boolean
}

/**
 * Identity persistence. Every method takes the already-normalized phone
 * number; normalization is the caller's job.
 */
export interface IdentityStore {
  findOrCreate(phoneNumber: string, seed: UserSeed): Promise<FindOrCreateResult>
  touch(userId: number): Promise<void>
  linkListing(listingId: number, userId: number): Promise<void>
  countListings(userId: number): Promise<number>
  updateStats(userId: number, listingCount: number): Promise<void>
}

export function rowToUser(row: Record<string, unknown>): UserEntity {
  const phoneNumber = readOptionalString(row, 'phone_number')
  if (!phoneNumber) {
    throw new Error('users row without phone_number')
  }
  return {
    id: readId(row),
    phoneNumber,
    name: readOptionalString(row, 'name'),
    city: readOptionalString(row, 'city'),
    totalCars: readInt(row, 'total_cars'),
    activeListings: readInt(row, 'active_listings'),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
    lastSeen: readDate(row, 'last_seen'),
    isActive: row.is_active !== false,
  }
}

export class PgIdentityStore implements IdentityStore {
  constructor(private readonly db: Queryable) {}

  async findByPhone(phoneNumber: string): Promise<UserEntity | null> {
    const result = await this.db.query('SELECT * FROM users WHERE phone_number = $1', [phoneNumber])
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null
  }

  async findOrCreate(phoneNumber: string, seed: UserSeed): Promise<FindOrCreateResult> {
    const existing = await this.findByPhone(phoneNumber)
    if (existing) {
      return { user: existing, created: false }
    }

    const inserted = await this.db.query(
      `INSERT INTO users (phone_number, name, city)
       VALUES ($1, $2, $3)
       ON CONFLICT (phone_number) DO NOTHING
       RETURNING *`,
      [phoneNumber, seed.name ?? null, seed.city ?? null]
    )
    if (inserted.rows.length > 0) {
      return { user: rowToUser(inserted.rows[0]), created: true }
    }

    // Lost an insert race with a concurrent run; the row exists now
    const raced = await this.findByPhone(phoneNumber)
    if (!raced) {
      throw new Error(`User for ${phoneNumber} vanished after conflict`)
    }
    return { user: raced, created: false }
  }

  async touch(userId: number): Promise<void> {
    await this.db.query('UPDATE users SET last_seen = NOW(), updated_at = NOW() WHERE id = $1', [
      userId,
    ])
  }

  async linkListing(listingId: number, userId: number): Promise<void> {
    await this.db.query('UPDATE cars SET user_id = $1, updated_at = NOW() WHERE id = $2', [
      userId,
      listingId,
    ])
  }

  async countListings(userId: number): Promise<number> {
    const result = await this.db.query(
      'SELECT COUNT(*)::int AS total FROM cars WHERE user_id = $1',
      [userId]
    )
    return result.rows.length > 0 ? readInt(result.rows[0], 'total') : 0
  }

  async updateStats(userId: number, listingCount: number): Promise<void> {
    // Every harvested listing is treated as active
    await this.db.query(
      `UPDATE users
       SET total_cars = $1, active_listings = $1, updated_at = NOW()
       WHERE id = $2`,
      [listingCount, userId]
    )
  }
}

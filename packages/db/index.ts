export { createPool, getPoolConfig, warmupDb } from './client.js'
export type { Queryable, PoolSettings } from './client.js'
export { PgListingStore, LISTING_COLUMNS, buildInsert } from './listings.js'
export type { ListingStore, ListingRow, InsertResult, ImageSet, MigratedImage } from './listings.js'
export { PgIdentityStore, rowToUser } from './users.js'
export type {
  IdentityStore,
  UserEntity,
  UserSeed,
  FindOrCreateResult,
} from './users.js'

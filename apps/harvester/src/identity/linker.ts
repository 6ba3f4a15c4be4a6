/**
 * Identity Linker
 *
 * Resolves a seller phone number to a user entity, links the listing to
 * it and refreshes the user's listing counters. Failures are returned,
 * never thrown: a listing without a user is still a saved listing.
 */

import type { IdentityStore } from '@carlistings/db'
import type { ILogger } from '@carlistings/logger'
import { silentLogger } from '@carlistings/logger'
import { normalizePhone } from '@carlistings/phone'
import { LinkError } from '../errors.js'

export interface LinkContext {
  sellerName?: string
  city?: string
  location?: string
}

export type LinkFailureReason = 'INVALID_IDENTIFIER' | 'STORE_ERROR'

export type LinkResult =
  | { ok: true; userId: number; created: boolean; listingCount: number }
  | { ok: false; reason: LinkFailureReason; error?: LinkError }

export class IdentityLinker {
  constructor(
    private readonly store: IdentityStore,
    private readonly log: ILogger = silentLogger
  ) {}

  async link(recordId: number, contactIdentifier: string | undefined, context: LinkContext = {}): Promise<LinkResult> {
    const phoneNumber = normalizePhone(contactIdentifier)
    if (!phoneNumber) {
      this.log.debug('No usable phone number, skipping link', { recordId })
      return { ok: false, reason: 'INVALID_IDENTIFIER' }
    }

    try {
      const { user, created } = await this.store.findOrCreate(phoneNumber, {
        name: context.sellerName,
        city: context.city ?? context.location,
      })

      if (!created) {
        await this.store.touch(user.id)
      }

      await this.store.linkListing(recordId, user.id)
      const listingCount = await this.store.countListings(user.id)
      await this.store.updateStats(user.id, listingCount)

      this.log.info(created ? 'User created' : 'User linked', {
        recordId,
        userId: user.id,
        listingCount,
      })
      return { ok: true, userId: user.id, created, listingCount }
    } catch (cause) {
      const error = new LinkError(
        `Linking listing ${recordId} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
        { cause }
      )
      this.log.warn('Identity link failed', { recordId }, error)
      return { ok: false, reason: 'STORE_ERROR', error }
    }
  }
}

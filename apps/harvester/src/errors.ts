/**
 * Harvester error taxonomy.
 *
 * Every error crossing a stage boundary is a HarvestError subclass so the
 * orchestrator can label per-item failures without string matching.
 */

import type { FetchResultStatus } from './types.js'

export type HarvestStage =
  | 'input'
  | 'discovery'
  | 'fetch'
  | 'detail'
  | 'normalize'
  | 'persist'
  | 'link'
  | 'assets'
  | 'run'

export class HarvestError extends Error {
  readonly stage: HarvestStage

  constructor(message: string, stage: HarvestStage, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HarvestError'
    this.stage = stage
  }
}

/** Network or HTTP failure. Fatal for the item or page it happened on. */
export class TransportError extends HarvestError {
  readonly url: string
  readonly status?: FetchResultStatus
  readonly statusCode?: number

  constructor(
    message: string,
    details: { url: string; status?: FetchResultStatus; statusCode?: number; stage?: HarvestStage },
    options?: { cause?: unknown }
  ) {
    super(message, details.stage ?? 'fetch', options)
    this.name = 'TransportError'
    this.url = details.url
    this.status = details.status
    this.statusCode = details.statusCode
  }
}

/** Markup did not have the expected shape. Never crosses a component boundary. */
export class ParseError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'detail', options)
    this.name = 'ParseError'
  }
}

/** Input or record failed validation. */
export class ValidationError extends HarvestError {
  readonly field?: string

  constructor(message: string, field?: string, options?: { cause?: unknown; stage?: HarvestStage }) {
    super(message, options?.stage ?? 'normalize', options)
    this.name = 'ValidationError'
    this.field = field
  }
}

/** Store write failed. Fatal for the item. */
export class PersistenceError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'persist', options)
    this.name = 'PersistenceError'
  }
}

/** Identity linking failed. Logged, never fatal. */
export class LinkError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'link', options)
    this.name = 'LinkError'
  }
}

/** One image failed to migrate. Logged, never fatal. */
export class AssetError extends HarvestError {
  readonly imageUrl?: string

  constructor(message: string, imageUrl?: string, options?: { cause?: unknown }) {
    super(message, 'assets', options)
    this.name = 'AssetError'
    this.imageUrl = imageUrl
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'UnknownError'
}

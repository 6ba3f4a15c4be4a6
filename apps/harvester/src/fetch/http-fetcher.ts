/**
 * HTTP Fetcher
 *
 * Native fetch with timeout, size limit, retries with exponential backoff,
 * and a blocked-page heuristic. Serves both result pages (markup) and
 * listing photos (bytes).
 */

import { TransportError } from '../errors.js'
import type {
  BinaryFetcher,
  FetchedBinary,
  FetchedPage,
  FetchOptions,
  FetchResult,
  MarkupFetcher,
  RetryPolicy,
} from '../types.js'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_SIZE_BYTES,
  DEFAULT_RETRY_POLICY,
} from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy
  timeoutMs?: number
  maxSizeBytes?: number
  headers?: Record<string, string>
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
]

export class HttpFetcher implements MarkupFetcher, BinaryFetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly defaults: Required<FetchOptions>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.defaults = {
      timeoutMs: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      maxSizeBytes: options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES,
      headers: options.headers ?? {},
    }
  }

  /**
   * Fetch a URL and return the HTML content. Never throws.
   */
  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const opts: Required<FetchOptions> = { ...this.defaults, ...options }
    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...opts.headers,
    }

    let lastError: unknown = null

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      try {
        const result = await this.fetchOnce(url, headers, opts, startTime)

        if (
          result.status === 'error' &&
          result.statusCode &&
          this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
          attempt < this.retryPolicy.maxAttempts
        ) {
          await this.sleep(this.backoffDelay(attempt))
          continue
        }

        return result
      } catch (error) {
        lastError = error

        // Network errors are retried
        if (attempt < this.retryPolicy.maxAttempts) {
          await this.sleep(this.backoffDelay(attempt))
          continue
        }
      }
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError instanceof Error ? lastError.message : 'Unknown error after retries',
    }
  }

  /**
   * MarkupFetcher contract: markup and resolved URL, or a TransportError.
   */
  async fetchPage(url: string): Promise<FetchedPage> {
    const result = await this.fetch(url)
    if (result.status !== 'ok' || result.html === undefined) {
      throw new TransportError(result.error ?? `Fetch failed with status ${result.status}`, {
        url,
        status: result.status,
        statusCode: result.statusCode,
      })
    }
    return {
      html: result.html,
      finalUrl: result.finalUrl ?? url,
      statusCode: result.statusCode,
    }
  }

  /**
   * Download raw bytes (listing photos). One attempt; photo failures are
   * isolated per image by the caller.
   */
  async fetchBinary(url: string): Promise<FetchedBinary> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.defaults.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': DEFAULT_FETCH_HEADERS['User-Agent'], ...this.defaults.headers },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status}: ${response.statusText}`, {
          url,
          status: 'error',
          statusCode: response.status,
          stage: 'assets',
        })
      }

      const bytes = await this.readBodyWithLimit(response, this.defaults.maxSizeBytes)
      if (bytes === null) {
        throw new TransportError('Response exceeded size limit', {
          url,
          status: 'too_large',
          statusCode: response.status,
          stage: 'assets',
        })
      }

      return {
        bytes,
        contentType: response.headers.get('content-type') ?? undefined,
      }
    } catch (error) {
      if (error instanceof TransportError) throw error
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timed out after ${this.defaults.timeoutMs}ms`, {
          url,
          status: 'timeout',
          stage: 'assets',
        })
      }
      throw new TransportError(error instanceof Error ? error.message : String(error), {
        url,
        status: 'error',
        stage: 'assets',
      }, { cause: error })
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    opts: Required<FetchOptions>,
    startTime: number
  ): Promise<FetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      // Blocked responses (403, 503 with captcha indicators)
      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > opts.maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await this.readBodyWithLimit(response, opts.maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      const html = new TextDecoder('utf-8').decode(body)

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        // Response.url is empty for synthetic responses
        finalUrl: response.url || url,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${opts.timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<Buffer | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return Buffer.alloc(0)
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return Buffer.concat(chunks)
    } finally {
      reader.releaseLock()
    }
  }

  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}

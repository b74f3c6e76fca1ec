/**
 * Origin fetcher for cache misses
 *
 * The origin is fixed; requests are never retried. Any failure surfaces as an
 * UpstreamError carrying the attempted URL.
 */

import { toError, UpstreamError } from '@pkgshelf/api'
import { createLogger, type Logger } from '@pkgshelf/shared'
import type { Bytes, RemoteAsset } from './types'

export const ORIGIN_URL = 'https://unpkg.com'

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

export interface OriginFetcherOptions {
  timeoutMs?: number
  /** Replaces the global fetch, mainly for tests */
  fetch?: FetchFn
  logger?: Logger
}

export function buildOriginUrl(asset: RemoteAsset): string {
  return `${ORIGIN_URL}/${asset.package}@${asset.version}/${asset.file}`
}

export class OriginFetcher {
  private timeoutMs: number
  private fetchFn: FetchFn
  private log: Logger

  constructor(options: OriginFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.log = options.logger ?? createLogger('origin-fetcher')
  }

  async fetch(asset: RemoteAsset): Promise<Bytes> {
    const url = buildOriginUrl(asset)
    this.log.info('Downloading from origin', { url })

    let response: Response
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      const cause = toError(error)
      const message =
        cause.name === 'TimeoutError'
          ? `Origin timed out after ${this.timeoutMs}ms`
          : `Failed to reach origin: ${cause.message}`
      this.log.error(message, { url })
      throw new UpstreamError(message, url, { cause: cause.message })
    }

    if (!response.ok) {
      const message = `Origin returned ${response.status}`
      this.log.error(message, { url, status: response.status })
      throw new UpstreamError(message, url, { status: response.status })
    }

    try {
      const body = await response.arrayBuffer()
      return new Uint8Array(body)
    } catch (error) {
      const cause = toError(error)
      const message =
        cause.name === 'TimeoutError'
          ? `Origin timed out after ${this.timeoutMs}ms`
          : `Failed to read origin response: ${cause.message}`
      this.log.error(message, { url })
      throw new UpstreamError(message, url, { cause: cause.message })
    }
  }
}

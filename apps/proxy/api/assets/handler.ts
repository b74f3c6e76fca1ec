/**
 * Static asset request handler
 *
 * classify -> local file | cached remote asset | origin fill -> response.
 * Every failure is converted to a JSON error result here; nothing is retried.
 */

import { readFile, realpath } from 'node:fs/promises'
import { resolve } from 'node:path'
import {
  ForbiddenError,
  getStatusCode,
  NotFoundError,
  StorageError,
  toError,
  toErrorResponse,
} from '@pkgshelf/api'
import { createLogger, type Logger } from '@pkgshelf/shared'
import type { CacheStore } from './cache-store'
import { classifyPath } from './classifier'
import { contentTypeFor } from './content-type'
import { isMissingFileError, isWithin } from './fs'
import { InflightTasks } from './inflight'
import type { OriginFetcher } from './origin-fetcher'
import {
  type AssetResult,
  type AssetSource,
  assetKey,
  type Bytes,
  type LocalAsset,
  type RemoteAsset,
} from './types'

export interface StaticAssetHandlerOptions {
  staticDir: string
  proxyEnabled: boolean
  cache: CacheStore
  origin: OriginFetcher
  logger?: Logger
  /** Include raw messages and stacks in error bodies */
  isDevelopment?: boolean
}

const encoder = new TextEncoder()

function success(body: Bytes, filename: string, source: AssetSource): AssetResult {
  return {
    status: 200,
    body,
    contentType: contentTypeFor(filename),
    source,
  }
}

export class StaticAssetHandler {
  private staticRoot: string
  private proxyEnabled: boolean
  private cache: CacheStore
  private origin: OriginFetcher
  private log: Logger
  private isDevelopment: boolean
  private fills = new InflightTasks<Bytes>()

  constructor(options: StaticAssetHandlerOptions) {
    this.staticRoot = resolve(options.staticDir)
    this.proxyEnabled = options.proxyEnabled
    this.cache = options.cache
    this.origin = options.origin
    this.log = options.logger ?? createLogger('static-handler')
    this.isDevelopment = options.isDevelopment ?? false
  }

  async handle(path: string): Promise<AssetResult> {
    try {
      return await this.resolveAsset(path)
    } catch (error) {
      const err = toError(error)
      const status = getStatusCode(err)
      if (status >= 500) {
        this.log.error('Request failed', { path, status, error: err.message })
      } else {
        this.log.warn('Request rejected', { path, status, error: err.message })
      }
      const body = toErrorResponse(err, this.isDevelopment)
      return {
        status,
        body: Uint8Array.from(encoder.encode(JSON.stringify(body))),
        contentType: 'application/json',
      }
    }
  }

  private async resolveAsset(path: string): Promise<AssetResult> {
    const asset = classifyPath(path)
    return asset.kind === 'local'
      ? this.serveLocal(asset)
      : this.serveRemote(asset)
  }

  private async serveLocal(asset: LocalAsset): Promise<AssetResult> {
    const filePath = resolve(this.staticRoot, asset.name)
    if (!isWithin(this.staticRoot, filePath)) {
      throw new ForbiddenError('Outside allowed directory range', {
        path: asset.name,
      })
    }

    // symlinks may point anywhere, compare canonical paths
    const [realRoot, realFile] = await Promise.all([
      this.canonical(this.staticRoot, asset.name),
      this.canonical(filePath, asset.name),
    ])
    if (!isWithin(realRoot, realFile)) {
      this.log.warn('Detected directory traversal', { path: asset.name })
      throw new ForbiddenError('Outside allowed directory range', {
        path: asset.name,
      })
    }

    let content: Buffer
    try {
      content = await readFile(realFile)
    } catch (error) {
      if (isMissingFileError(error)) throw new NotFoundError('File', asset.name)
      throw new StorageError(`Failed to read ${realFile}`, realFile, {
        cause: error,
      })
    }

    this.log.debug('Serving local file', { name: asset.name })
    return success(new Uint8Array(content), asset.name, 'local')
  }

  private async canonical(path: string, requested: string): Promise<string> {
    try {
      return await realpath(path)
    } catch (error) {
      if (isMissingFileError(error)) throw new NotFoundError('File', requested)
      throw new StorageError(`Failed to resolve ${path}`, path, {
        cause: error,
      })
    }
  }

  private async serveRemote(asset: RemoteAsset): Promise<AssetResult> {
    const key = assetKey(asset)
    if (!this.proxyEnabled) {
      this.log.debug('Proxy disabled, rejecting remote asset', { asset: key })
      throw new NotFoundError('Asset', key)
    }

    if (await this.cache.exists(asset)) {
      const cached = await this.cache.read(asset)
      if (cached) {
        this.log.debug('Using cached file', { asset: key })
        return success(cached, asset.file, 'cache')
      }
    }

    const bytes = await this.fills.run(key, () => this.fill(asset))
    return success(bytes, asset.file, 'origin')
  }

  /** Fetch from origin and persist; a failed write still serves the bytes */
  private async fill(asset: RemoteAsset): Promise<Bytes> {
    const bytes = await this.origin.fetch(asset)
    try {
      await this.cache.write(asset, bytes)
    } catch (error) {
      this.log.warn('Failed to save cache file', {
        asset: assetKey(asset),
        error: toError(error).message,
      })
    }
    return bytes
  }
}

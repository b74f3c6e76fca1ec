/**
 * On-disk cache of remote assets
 *
 * Layout mirrors the request: `<root>/<package>/<version>/<file>`, with scoped
 * packages nesting one level deeper (`<root>/@scope/pkg/...`). An entry is
 * only the presence of the file; entries never expire.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import { ForbiddenError, StorageError, toError } from '@pkgshelf/api'
import { createLogger, type Logger } from '@pkgshelf/shared'
import { isMissingFileError, isWithin } from './fs'
import { assetKey, type Bytes, type RemoteAsset } from './types'

export class CacheStore {
  readonly root: string
  private log: Logger

  constructor(cacheDir: string, logger?: Logger) {
    this.root = resolve(cacheDir)
    this.log = logger ?? createLogger('cache-store')
  }

  pathFor(asset: RemoteAsset): string {
    const target = join(this.root, asset.package, asset.version, asset.file)
    if (!isWithin(this.root, target)) {
      throw new ForbiddenError('Cache path escapes cache root', {
        asset: assetKey(asset),
      })
    }
    return target
  }

  async exists(asset: RemoteAsset): Promise<boolean> {
    const fileStat = await stat(this.pathFor(asset)).catch(() => null)
    return fileStat?.isFile() ?? false
  }

  /** Cached bytes, or null when there is no entry */
  async read(asset: RemoteAsset): Promise<Bytes | null> {
    const target = this.pathFor(asset)
    try {
      const content = await readFile(target)
      return new Uint8Array(content)
    } catch (error) {
      if (isMissingFileError(error)) return null
      throw new StorageError(`Failed to read cache entry ${target}`, target, {
        cause: error,
      })
    }
  }

  /**
   * Write to a sibling temp file, then rename over the target so a reader
   * sees either no entry or the complete file.
   */
  async write(asset: RemoteAsset, bytes: Bytes): Promise<string> {
    const target = this.pathFor(asset)
    const temp = `${target}.${randomUUID()}.tmp`

    try {
      await mkdir(dirname(target), { recursive: true })
      await writeFile(temp, bytes)
      await rename(temp, target)
    } catch (error) {
      await rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn('Failed to remove temp cache file', {
          temp,
          error: toError(cleanupError).message,
        })
      })
      throw new StorageError(`Failed to write cache entry ${target}`, target, {
        cause: error,
      })
    }

    this.log.debug('Cache entry written', {
      asset: assetKey(asset),
      bytes: bytes.byteLength,
    })
    return target
  }
}

import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { StorageError } from '@pkgshelf/api'
import { createLogger, type Logger } from '@pkgshelf/shared'
import { isMissingFileError } from './assets/fs'

export const INDEX_CONTENT_TYPE = 'text/html; charset=utf-8'

/**
 * Landing page read from `<uiDir>/index.html` and kept in memory after the
 * first successful read. A missing file is not remembered.
 */
export class IndexPage {
  readonly path: string
  private cached: string | null = null
  private log: Logger

  constructor(uiDir: string, logger?: Logger) {
    this.path = join(resolve(uiDir), 'index.html')
    this.log = logger ?? createLogger('index-page')
  }

  /** Page content, or null when the file does not exist */
  async load(): Promise<string | null> {
    if (this.cached !== null) {
      this.log.debug('Using cached index.html')
      return this.cached
    }

    let content: string
    try {
      content = await readFile(this.path, 'utf-8')
    } catch (error) {
      if (isMissingFileError(error)) {
        this.log.warn('index.html not found', { path: this.path })
        return null
      }
      throw new StorageError(`Failed to read ${this.path}`, this.path, {
        cause: error,
      })
    }

    this.cached = content
    this.log.info('Read and cached index.html', { path: this.path })
    return content
  }

  get isCached(): boolean {
    return this.cached !== null
  }
}

/**
 * Runtime JSON loader for config files
 *
 * Uses fs rather than import attributes so the same file can be swapped at
 * deploy time without a rebuild.
 */

import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'

export class JsonFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'JsonFileError'
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Load a JSON file. A missing file yields undefined; unreadable or
 * unparseable content throws JsonFileError.
 */
export async function loadOptionalJson(
  path: string,
  baseDir: string = process.cwd(),
): Promise<unknown> {
  const fullPath = isAbsolute(path) ? path : resolve(baseDir, path)

  let content: string
  try {
    content = await readFile(fullPath, 'utf-8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined
    }
    throw new JsonFileError(`Cannot read ${fullPath}`, fullPath, {
      cause: error,
    })
  }

  try {
    const parsed: unknown = JSON.parse(content)
    return parsed
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new JsonFileError(`Invalid JSON in ${fullPath}: ${reason}`, fullPath, {
      cause: error,
    })
  }
}

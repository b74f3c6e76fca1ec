/**
 * Request path classification
 *
 * `vue@3.2.0/dist/vue.global.min.js`      -> remote vue / 3.2.0 / dist/vue.global.min.js
 * `@scope/pkg@1.0.0/index.js`             -> remote @scope/pkg / 1.0.0 / index.js
 * `github.css`, `css/github.css`          -> local
 *
 * The leading segment is the first `/`-separated part, or the first two when
 * the path starts with a scope. Package and version are split on the last `@`
 * of that segment.
 */

import { ForbiddenError, MalformedRequestError } from '@pkgshelf/api'
import { isAbsolute, win32 } from 'node:path'
import type { Asset } from './types'

const FORBIDDEN_SEQUENCES = ['//', '\\', '\0']

// `.` and `..` would collapse into another entry once joined under the cache root
function isDotName(name: string): boolean {
  return name === '.' || name === '..'
}

export function isSafePath(path: string): boolean {
  if (isAbsolute(path) || win32.isAbsolute(path)) return false
  if (FORBIDDEN_SEQUENCES.some((sequence) => path.includes(sequence))) {
    return false
  }
  return path.split('/').every((segment) => segment !== '..' && segment !== '.')
}

export function classifyPath(path: string): Asset {
  if (!isSafePath(path)) {
    throw new ForbiddenError('Unsafe path', { path })
  }
  if (path === '') {
    throw new MalformedRequestError('Empty asset path')
  }

  const segments = path.split('/')
  const scoped = path.startsWith('@')
  const headLength = scoped ? 2 : 1
  const head = segments.slice(0, headLength).join('/')
  const separator = head.lastIndexOf('@')

  if (!scoped && separator === -1) {
    return { kind: 'local', name: path }
  }

  // for a scoped head the `@` at index 0 belongs to the scope
  if (separator <= 0) {
    throw new MalformedRequestError('Missing version in package path', {
      path,
    })
  }

  const packageName = head.slice(0, separator)
  const version = head.slice(separator + 1)
  const file = segments.slice(headLength).join('/')

  if (scoped) {
    const [scope, name] = packageName.split('/')
    if (
      !scope ||
      scope === '@' ||
      !name ||
      isDotName(scope.slice(1)) ||
      isDotName(name)
    ) {
      throw new MalformedRequestError('Invalid scoped package name', { path })
    }
  } else if (isDotName(packageName)) {
    throw new MalformedRequestError('Invalid package name', { path })
  }
  if (version === '') {
    throw new MalformedRequestError('Empty package version', { path })
  }
  if (isDotName(version)) {
    throw new MalformedRequestError('Invalid package version', { path })
  }
  if (file === '') {
    throw new MalformedRequestError('Missing file path after version', {
      path,
    })
  }

  return { kind: 'remote', package: packageName, version, file }
}

import { isAbsolute, relative, sep } from 'node:path'

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/** Errors that mean "nothing readable at this path" rather than an I/O fault */
export function isMissingFileError(error: unknown): boolean {
  if (!isErrnoException(error)) return false
  return (
    error.code === 'ENOENT' ||
    error.code === 'ENOTDIR' ||
    error.code === 'EISDIR'
  )
}

/** True when `target` lies strictly inside `root` */
export function isWithin(root: string, target: string): boolean {
  const rel = relative(root, target)
  if (rel === '' || isAbsolute(rel)) return false
  return rel.split(sep)[0] !== '..'
}

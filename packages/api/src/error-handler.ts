import type { JsonValue } from '@pkgshelf/shared'
import { z } from 'zod'

export class APIError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, JsonValue>,
  ) {
    super(message)
    this.name = 'APIError'
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      statusCode: this.statusCode,
      ...(this.details && { details: this.details }),
    }
  }
}

export class ValidationError extends APIError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super(message, 400, 'VALIDATION_ERROR', details)
    this.name = 'ValidationError'
  }
}

/** Request path does not describe a local or a versioned asset */
export class MalformedRequestError extends APIError {
  constructor(message: string, details?: Record<string, JsonValue>) {
    super(message, 400, 'MALFORMED_REQUEST', details)
    this.name = 'MalformedRequestError'
  }
}

export class ForbiddenError extends APIError {
  constructor(message: string = 'Forbidden', details?: Record<string, JsonValue>) {
    super(message, 403, 'FORBIDDEN', details)
    this.name = 'ForbiddenError'
  }
}

export class NotFoundError extends APIError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} not found: ${id}`
      : `${resource} not found`
    super(message, 404, 'NOT_FOUND', id ? { resource, id } : { resource })
    this.name = 'NotFoundError'
  }
}

/** Origin answered with a non-success status or could not be reached */
export class UpstreamError extends APIError {
  constructor(
    message: string,
    public readonly url: string,
    details?: Record<string, JsonValue>,
  ) {
    super(message, 502, 'UPSTREAM_FAILURE', { url, ...details })
    this.name = 'UpstreamError'
  }
}

/** Local filesystem read or write failed */
export class StorageError extends APIError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, 500, 'STORAGE_FAILURE')
    this.name = 'StorageError'
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

export interface ErrorResponse {
  error: string
  code: string
  statusCode: number
  details?: Record<string, JsonValue>
  stack?: string
}

export function sanitizeErrorMessage(
  error: Error,
  isDevelopment: boolean,
): string {
  if (isDevelopment) {
    return error.message
  }

  if (error instanceof APIError && error.statusCode < 500) {
    return error.message
  }

  if (error instanceof UpstreamError) {
    return error.message
  }

  return 'An unexpected error occurred'
}

export function toErrorResponse(
  error: Error,
  isDevelopment: boolean = false,
): ErrorResponse {
  if (error instanceof APIError) {
    return {
      error: sanitizeErrorMessage(error, isDevelopment),
      code: error.code,
      statusCode: error.statusCode,
      ...(error.details && { details: error.details }),
      ...(isDevelopment && { stack: error.stack }),
    }
  }

  if (error instanceof z.ZodError) {
    const issueStrings = error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    )
    const serializedIssues = error.issues.map((i) => ({
      path: i.path.map(String),
      message: i.message,
      code: i.code,
    }))
    return {
      error: `Validation failed: ${issueStrings.join(', ')}`,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      details: { issues: serializedIssues },
      ...(isDevelopment && { stack: error.stack }),
    }
  }

  return {
    error: sanitizeErrorMessage(error, isDevelopment),
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    ...(isDevelopment && { stack: error.stack }),
  }
}

export function getStatusCode(error: Error): number {
  if (error instanceof APIError) {
    return error.statusCode
  }
  if (error instanceof z.ZodError) {
    return 400
  }
  return 500
}

/**
 * Validate unknown external data against a Zod schema.
 * The unknown type is intentional - this function exists to validate data
 * from external sources (config files, environment) where the type is not known.
 */
export function expectValid<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  context: string = 'data',
): z.output<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join(', ')
    const serializedIssues = result.error.issues.map((i) => ({
      path: i.path.map(String),
      message: i.message,
      code: i.code,
    }))
    throw new ValidationError(`Invalid ${context}: ${errors}`, {
      issues: serializedIssues,
    })
  }
  return result.data
}

/**
 * Normalise anything caught in a `catch` into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  expectValid,
  ForbiddenError,
  getStatusCode,
  MalformedRequestError,
  NotFoundError,
  StorageError,
  toError,
  toErrorResponse,
  UpstreamError,
  ValidationError,
} from './error-handler'

describe('error taxonomy', () => {
  it('assigns status codes and codes', () => {
    expect(getStatusCode(new MalformedRequestError('bad'))).toBe(400)
    expect(getStatusCode(new ForbiddenError())).toBe(403)
    expect(getStatusCode(new NotFoundError('File', 'a.css'))).toBe(404)
    expect(getStatusCode(new UpstreamError('down', 'https://x.test/a'))).toBe(502)
    expect(getStatusCode(new StorageError('disk', '/tmp/a'))).toBe(500)
    expect(getStatusCode(new Error('boom'))).toBe(500)
  })

  it('serialises a not-found error with its resource', () => {
    expect(toErrorResponse(new NotFoundError('File', 'a.css'))).toEqual({
      error: 'File not found: a.css',
      code: 'NOT_FOUND',
      statusCode: 404,
      details: { resource: 'File', id: 'a.css' },
    })
  })

  it('keeps the upstream url in details', () => {
    const response = toErrorResponse(
      new UpstreamError('Origin returned 404', 'https://unpkg.com/a@1/b.js', {
        status: 404,
      }),
    )
    expect(response.statusCode).toBe(502)
    expect(response.code).toBe('UPSTREAM_FAILURE')
    expect(response.error).toBe('Origin returned 404')
    expect(response.details).toEqual({
      url: 'https://unpkg.com/a@1/b.js',
      status: 404,
    })
  })

  it('hides storage failure messages outside development', () => {
    const error = new StorageError('EACCES: /srv/cache/a', '/srv/cache/a')
    expect(toErrorResponse(error).error).toBe('An unexpected error occurred')
    expect(toErrorResponse(error, true).error).toBe('EACCES: /srv/cache/a')
  })

  it('hides unknown errors outside development', () => {
    const response = toErrorResponse(new Error('secret detail'))
    expect(response).toEqual({
      error: 'An unexpected error occurred',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    })
  })

  it('maps zod errors to 400', () => {
    const result = z.object({ port: z.number() }).safeParse({ port: 'x' })
    expect(result.success).toBe(false)
    if (result.success) return

    const response = toErrorResponse(result.error)
    expect(response.statusCode).toBe(400)
    expect(response.code).toBe('VALIDATION_ERROR')
    expect(getStatusCode(result.error)).toBe(400)
  })
})

describe('expectValid', () => {
  const schema = z.object({ port: z.number().int().default(8080) })

  it('returns parsed data with defaults', () => {
    expect(expectValid(schema, {})).toEqual({ port: 8080 })
  })

  it('throws ValidationError naming the context', () => {
    expect(() => expectValid(schema, { port: 'x' }, 'config')).toThrow(
      ValidationError,
    )
    expect(() => expectValid(schema, { port: 'x' }, 'config')).toThrow(
      /^Invalid config: port: /,
    )
  })
})

describe('toError', () => {
  it('wraps non-errors', () => {
    const error = toError('plain')
    expect(error).toBeInstanceOf(Error)
    expect(error.message).toBe('plain')
  })
})

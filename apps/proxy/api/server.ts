/**
 * Proxy HTTP app
 *
 * GET /            landing page from the ui dir
 * GET /health      liveness and proxy status
 * GET /static/*    local files, or package assets through the disk cache
 */

import {
  getStatusCode,
  NotFoundError,
  toErrorResponse,
} from '@pkgshelf/api'
import { isProductionEnv } from '@pkgshelf/config'
import { createLogger, type Logger } from '@pkgshelf/shared'
import { Hono } from 'hono'
import {
  type AssetResult,
  CacheStore,
  type FetchFn,
  OriginFetcher,
  StaticAssetHandler,
} from './assets'
import type { ProxyConfig } from './config'
import { INDEX_CONTENT_TYPE, IndexPage } from './index-page'

export const STATIC_PREFIX = '/static/'

export interface ProxyAppDeps {
  /** Replaces the global fetch used for origin downloads */
  fetch?: FetchFn
  logger?: Logger
}

function jsonResponse(body: object, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

function assetResponse(result: AssetResult): Response {
  const headers: Record<string, string> = {
    'Content-Type': result.contentType,
    'Content-Length': String(result.body.byteLength),
  }
  if (result.source) {
    headers['X-Asset-Source'] = result.source
    if (result.source !== 'local') {
      headers['X-Cache'] = result.source === 'cache' ? 'HIT' : 'MISS'
    }
  }
  return new Response(result.body, { status: result.status, headers })
}

export function createProxyApp(
  config: ProxyConfig,
  deps: ProxyAppDeps = {},
): Hono {
  const log = deps.logger ?? createLogger('proxy-server')
  const isDevelopment = !isProductionEnv()
  const startedAt = Date.now()

  const handler = new StaticAssetHandler({
    staticDir: config.proxy.staticDir,
    proxyEnabled: config.proxy.enabled,
    cache: new CacheStore(config.proxy.cacheDir),
    origin: new OriginFetcher({
      timeoutMs: config.proxy.fetchTimeoutMs,
      fetch: deps.fetch,
    }),
    isDevelopment,
  })
  const indexPage = new IndexPage(config.server.uiDir)

  const app = new Hono()

  app.use('*', async (c, next) => {
    const start = performance.now()
    await next()
    log.info('Request handled', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    })
  })

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      service: 'pkgshelf-proxy',
      proxyEnabled: config.proxy.enabled,
      uptime: Date.now() - startedAt,
    })
  })

  app.get('/', async () => {
    const content = await indexPage.load()
    if (content === null) {
      return jsonResponse(new NotFoundError('File', 'index.html').toJSON(), 404)
    }
    return new Response(content, {
      headers: { 'Content-Type': INDEX_CONTENT_TYPE },
    })
  })

  app.get(`${STATIC_PREFIX}*`, async (c) => {
    const assetPath = c.req.path.slice(STATIC_PREFIX.length)
    const result = await handler.handle(assetPath)
    return assetResponse(result)
  })

  app.notFound((c) => {
    return jsonResponse(new NotFoundError('Route', c.req.path).toJSON(), 404)
  })

  app.onError((error, c) => {
    log.error('Unhandled error', { path: c.req.path, error: error.message })
    return jsonResponse(
      toErrorResponse(error, isDevelopment),
      getStatusCode(error),
    )
  })

  return app
}

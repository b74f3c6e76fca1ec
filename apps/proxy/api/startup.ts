import { mkdir } from 'node:fs/promises'
import { type ServerType, serve } from '@hono/node-server'
import { createLogger, setRootLogLevel } from '@pkgshelf/shared'
import { type LoadConfigOptions, loadProxyConfig, type ProxyConfig } from './config'
import { createProxyApp } from './server'

export async function ensureDirectories(config: ProxyConfig): Promise<void> {
  for (const dir of [config.proxy.staticDir, config.proxy.cacheDir]) {
    await mkdir(dir, { recursive: true })
  }
}

export function applyLogConfig(config: ProxyConfig): void {
  setRootLogLevel(config.log.enabled ? config.log.level : 'silent')
}

export async function startServer(
  options: LoadConfigOptions = {},
): Promise<ServerType> {
  const config = await loadProxyConfig(options)
  applyLogConfig(config)

  const log = createLogger('pkgshelf')
  log.info('Configuration loaded', {
    proxy: config.proxy,
    server: config.server,
  })

  await ensureDirectories(config)

  const app = createProxyApp(config)
  const { host, port } = config.server

  log.info('Starting server')
  const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    log.info(`Server started at http://${host}:${info.port}`)
    log.info(`Proxy feature status: ${config.proxy.enabled}`)
  })

  const shutdown = (signal: string): void => {
    log.info('Shutting down', { signal })
    server.close((error) => {
      if (error) {
        log.error('Error while closing server', { error: error.message })
        process.exitCode = 1
      }
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))

  return server
}

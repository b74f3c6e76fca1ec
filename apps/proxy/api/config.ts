/**
 * Proxy configuration
 *
 * Read once at startup: defaults, then the JSON config file, then environment
 * overrides. The result is frozen and passed to the server explicitly.
 *
 * config.json:
 * {
 *   "proxy": { "enabled": true, "static_dir": "./static", "cache_dir": "./cache" },
 *   "server": { "host": "localhost", "port": 8080 },
 *   "log": { "enabled": true, "level": "info" }
 * }
 */

import { expectValid, ValidationError } from '@pkgshelf/api'
import {
  getEnvBool,
  getEnvNumber,
  getEnvVar,
  JsonFileError,
  loadOptionalJson,
} from '@pkgshelf/config'
import { z } from 'zod'

export const DEFAULT_CONFIG_PATH = 'config.json'

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent'])

export type ProxyLogLevel = z.infer<typeof LogLevelSchema>

const ConfigFileSchema = z.object({
  proxy: z
    .object({
      enabled: z.boolean().default(false),
      static_dir: z.string().min(1).default('./static'),
      cache_dir: z.string().min(1).default('./cache'),
      fetch_timeout_ms: z.number().int().positive().default(30_000),
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).default('localhost'),
      port: z.number().int().min(0).max(65_535).default(8080),
      ui_dir: z.string().min(1).default('./ui'),
    })
    .default({}),
  log: z
    .object({
      enabled: z.boolean().default(true),
      level: LogLevelSchema.default('info'),
    })
    .default({}),
})

type ConfigFile = z.infer<typeof ConfigFileSchema>

export interface ProxyConfig {
  readonly proxy: {
    readonly enabled: boolean
    readonly staticDir: string
    readonly cacheDir: string
    readonly fetchTimeoutMs: number
  }
  readonly server: {
    readonly host: string
    readonly port: number
    readonly uiDir: string
  }
  readonly log: {
    readonly enabled: boolean
    readonly level: ProxyLogLevel
  }
}

export interface LoadConfigOptions {
  path?: string
  baseDir?: string
}

function withOverrides(
  base: object,
  overrides: Record<string, string | number | boolean | undefined>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) result[key] = value
  }
  return result
}

/** Result is re-validated, so string env values such as LOG_LEVEL are checked too */
function applyEnvOverrides(file: ConfigFile): Record<string, unknown> {
  return {
    proxy: withOverrides(file.proxy, {
      enabled: getEnvBool('PROXY_ENABLED'),
      static_dir: getEnvVar('STATIC_DIR'),
      cache_dir: getEnvVar('CACHE_DIR'),
      fetch_timeout_ms: getEnvNumber('FETCH_TIMEOUT_MS'),
    }),
    server: withOverrides(file.server, {
      host: getEnvVar('HOST'),
      port: getEnvNumber('PORT'),
      ui_dir: getEnvVar('UI_DIR'),
    }),
    log: withOverrides(file.log, {
      level: getEnvVar('LOG_LEVEL'),
    }),
  }
}

export function toProxyConfig(file: ConfigFile): ProxyConfig {
  return Object.freeze({
    proxy: Object.freeze({
      enabled: file.proxy.enabled,
      staticDir: file.proxy.static_dir,
      cacheDir: file.proxy.cache_dir,
      fetchTimeoutMs: file.proxy.fetch_timeout_ms,
    }),
    server: Object.freeze({
      host: file.server.host,
      port: file.server.port,
      uiDir: file.server.ui_dir,
    }),
    log: Object.freeze({
      enabled: file.log.enabled,
      level: file.log.level,
    }),
  })
}

/**
 * Parse an already-loaded config object. Environment overrides are applied
 * and validated together with the file values.
 */
export function parseProxyConfig(raw: unknown, source = 'configuration'): ProxyConfig {
  const file = expectValid(ConfigFileSchema, raw ?? {}, source)
  const merged = expectValid(ConfigFileSchema, applyEnvOverrides(file), source)
  return toProxyConfig(merged)
}

/**
 * Load the config file (missing file means defaults) and apply overrides.
 */
export async function loadProxyConfig(
  options: LoadConfigOptions = {},
): Promise<ProxyConfig> {
  const path = options.path ?? DEFAULT_CONFIG_PATH
  const raw = await loadOptionalJson(path, options.baseDir).catch(
    (error: unknown) => {
      if (error instanceof JsonFileError) {
        throw new ValidationError(`Invalid config file ${path}: ${error.message}`, {
          path: error.path,
        })
      }
      throw error
    },
  )
  return parseProxyConfig(raw, `config file ${path}`)
}

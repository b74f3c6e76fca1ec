/**
 * Environment helpers for app configuration.
 *
 * Apps build their config from defaults, then a config file, then these
 * environment overrides. A helper returns undefined when the variable is
 * unset or unparseable so callers can fall through with `??`.
 */

/**
 * Helper to safely read process.env with fallback
 */
export function getEnvVar(
  key: string,
  defaultValue?: string,
): string | undefined {
  if (typeof process === 'undefined' || !process.env) {
    return defaultValue
  }
  const value = process.env[key]
  return value === undefined || value === '' ? defaultValue : value
}

/**
 * Helper to safely read process.env as boolean
 */
export function getEnvBool(
  key: string,
  defaultValue?: boolean,
): boolean | undefined {
  const value = getEnvVar(key)
  if (value === undefined) return defaultValue
  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') return true
  if (normalized === 'false' || normalized === '0') return false
  return defaultValue
}

/**
 * Helper to safely read process.env as number
 */
export function getEnvNumber(
  key: string,
  defaultValue?: number,
): number | undefined {
  const value = getEnvVar(key)
  if (value === undefined) return defaultValue
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return defaultValue
  return parsed
}

export function getNodeEnv(): string | undefined {
  return getEnvVar('NODE_ENV')
}

export function isProductionEnv(): boolean {
  return getNodeEnv() === 'production'
}

/**
 * Configuration
 *
 * Resolves the effective configuration from explicit overrides, then
 * environment variables, then schema defaults. Invalid values are rejected
 * rather than clamped.
 */

import { ConfigError } from '../errors'
import { type LogLevel, isLogLevel } from '../logging/logger'
import {
  type ConfigKey,
  type NumberConfigKey,
  type PkarrConfig,
  configSchema,
  getConfigDefaults,
} from './config-schema'

export { configSchema, getConfigDef, getConfigDefaults } from './config-schema'
export type { ConfigKey, ConfigSchema, NumberConfigKey, PkarrConfig } from './config-schema'

export type ConfigEnv = Record<string, string | undefined>

/**
 * Validate a numeric config value: an integer within the key's bounds.
 *
 * @throws ConfigError
 */
export function validateNumber(key: NumberConfigKey, value: unknown): number {
  const def = configSchema[key]
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new ConfigError(`${key} must be an integer, got ${String(value)}`)
  }
  if (value < def.min) {
    throw new ConfigError(`${key} must be at least ${def.min}, got ${value}`)
  }
  if ('max' in def && value > def.max) {
    throw new ConfigError(`${key} must be at most ${def.max}, got ${value}`)
  }
  return value
}

export function validateLogLevel(value: unknown): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigError(
      `logLevel must be one of ${configSchema.logLevel.values.join(', ')}, got ${String(value)}`,
    )
  }
  return value
}

export function validateList(key: 'bootstrapNodes', value: unknown): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${key} must be a list`)
  }
  const list: unknown[] = value
  return list.map((item) => {
    if (typeof item !== 'string' || item.trim() === '') {
      throw new ConfigError(`${key} entries must be non-empty strings`)
    }
    return item.trim()
  })
}

/**
 * Validate a value for any config key.
 *
 * @throws ConfigError
 */
export function validateConfigValue(key: ConfigKey, value: unknown): PkarrConfig[ConfigKey] {
  switch (key) {
    case 'bootstrapNodes':
      return validateList(key, value)
    case 'logLevel':
      return validateLogLevel(value)
    default:
      return validateNumber(key, value)
  }
}

function envValue(env: ConfigEnv, name: string): string | undefined {
  const raw = env[name]?.trim()
  return raw === undefined || raw === '' ? undefined : raw
}

function resolveNumber(
  key: NumberConfigKey,
  override: number | undefined,
  env: ConfigEnv,
  fallback: number,
): number {
  if (override !== undefined) {
    return validateNumber(key, override)
  }
  const name = configSchema[key].env
  const raw = envValue(env, name)
  if (raw === undefined) {
    return fallback
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got ${JSON.stringify(raw)}`)
  }
  return validateNumber(key, Number(raw))
}

/**
 * Build the effective configuration.
 *
 * @param overrides - explicit values; win over the environment
 * @param env - environment variables, defaults to process.env
 * @throws ConfigError on an ill-typed or out-of-range value, or minTtl > maxTtl
 */
export function resolveConfig(
  overrides: Partial<PkarrConfig> = {},
  env: ConfigEnv = process.env,
): PkarrConfig {
  const defaults = getConfigDefaults()

  const rawBootstrap = envValue(env, configSchema.bootstrapNodes.env)
  const bootstrapNodes =
    overrides.bootstrapNodes !== undefined
      ? validateList('bootstrapNodes', overrides.bootstrapNodes)
      : rawBootstrap !== undefined
        ? validateList(
            'bootstrapNodes',
            rawBootstrap
              .split(',')
              .map((s) => s.trim())
              .filter((s) => s !== ''),
          )
        : defaults.bootstrapNodes

  const rawLevel = envValue(env, configSchema.logLevel.env)
  const logLevel =
    overrides.logLevel !== undefined
      ? validateLogLevel(overrides.logLevel)
      : rawLevel !== undefined
        ? validateLogLevel(rawLevel.toLowerCase())
        : defaults.logLevel

  const config: PkarrConfig = {
    minTtl: resolveNumber('minTtl', overrides.minTtl, env, defaults.minTtl),
    maxTtl: resolveNumber('maxTtl', overrides.maxTtl, env, defaults.maxTtl),
    maxAttempts: resolveNumber('maxAttempts', overrides.maxAttempts, env, defaults.maxAttempts),
    lookupTimeoutMs: resolveNumber(
      'lookupTimeoutMs',
      overrides.lookupTimeoutMs,
      env,
      defaults.lookupTimeoutMs,
    ),
    queryTimeoutMs: resolveNumber(
      'queryTimeoutMs',
      overrides.queryTimeoutMs,
      env,
      defaults.queryTimeoutMs,
    ),
    maintenanceIntervalMs: resolveNumber(
      'maintenanceIntervalMs',
      overrides.maintenanceIntervalMs,
      env,
      defaults.maintenanceIntervalMs,
    ),
    maintenanceMaxPings: resolveNumber(
      'maintenanceMaxPings',
      overrides.maintenanceMaxPings,
      env,
      defaults.maintenanceMaxPings,
    ),
    maxKnownNodes: resolveNumber(
      'maxKnownNodes',
      overrides.maxKnownNodes,
      env,
      defaults.maxKnownNodes,
    ),
    bootstrapNodes,
    logLevel,
  }

  if (config.minTtl > config.maxTtl) {
    throw new ConfigError(`minTtl (${config.minTtl}) must not exceed maxTtl (${config.maxTtl})`)
  }

  return config
}

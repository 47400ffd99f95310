/**
 * Config Schema
 *
 * Single source of truth for all configuration keys, their environment
 * variables, types, bounds and defaults.
 */

import {
  BOOTSTRAP_NODES,
  LOOKUP_TIMEOUT_MS,
  MAINTENANCE_INTERVAL_MS,
  MAINTENANCE_MAX_PINGS,
  MAX_KNOWN_NODES,
  MAX_LOOKUP_ATTEMPTS,
  QUERY_TIMEOUT_MS,
} from '../dht/constants'
import { LOG_LEVELS } from '../logging/logger'
import { DEFAULT_MAXIMUM_TTL, DEFAULT_MINIMUM_TTL } from '../signed-packet/constants'

// ============================================================================
// Schema Definition Types
// ============================================================================

interface NumberConfigDef {
  type: 'number'
  env: string
  default: number
  min: number
  max?: number
}

interface EnumConfigDef<T extends readonly string[]> {
  type: 'enum'
  env: string
  values: T
  default: T[number]
}

interface ListConfigDef {
  type: 'list'
  env: string
  itemType: string // For documentation
  default: readonly string[]
}

type ConfigDef = NumberConfigDef | EnumConfigDef<readonly string[]> | ListConfigDef

// ============================================================================
// The Schema
// ============================================================================

export const configSchema = {
  // ===========================================================================
  // Signed packet freshness
  // ===========================================================================

  /** Lower clamp for a cached packet's TTL, in seconds. */
  minTtl: {
    type: 'number',
    env: 'PKARR_MIN_TTL',
    default: DEFAULT_MINIMUM_TTL,
    min: 0,
    max: 0xffffffff,
  },

  /** Upper clamp for a cached packet's TTL, in seconds. */
  maxTtl: {
    type: 'number',
    env: 'PKARR_MAX_TTL',
    default: DEFAULT_MAXIMUM_TTL,
    min: 0,
    max: 0xffffffff,
  },

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /** Nodes queried per lookup before giving up. */
  maxAttempts: {
    type: 'number',
    env: 'PKARR_MAX_ATTEMPTS',
    default: MAX_LOOKUP_ATTEMPTS,
    min: 1,
  },

  /** Wall-clock budget for one lookup. */
  lookupTimeoutMs: {
    type: 'number',
    env: 'PKARR_LOOKUP_TIMEOUT_MS',
    default: LOOKUP_TIMEOUT_MS,
    min: 1,
  },

  /** Time to wait for a single KRPC reply. */
  queryTimeoutMs: {
    type: 'number',
    env: 'PKARR_QUERY_TIMEOUT_MS',
    default: QUERY_TIMEOUT_MS,
    min: 1,
  },

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  maintenanceIntervalMs: {
    type: 'number',
    env: 'PKARR_MAINTENANCE_INTERVAL_MS',
    default: MAINTENANCE_INTERVAL_MS,
    min: 1,
  },

  /** Known nodes pinged per maintenance round. */
  maintenanceMaxPings: {
    type: 'number',
    env: 'PKARR_MAINTENANCE_MAX_PINGS',
    default: MAINTENANCE_MAX_PINGS,
    min: 0,
  },

  maxKnownNodes: {
    type: 'number',
    env: 'PKARR_MAX_KNOWN_NODES',
    default: MAX_KNOWN_NODES,
    min: 1,
  },

  /** Entry points into the Mainline DHT, as host:port. */
  bootstrapNodes: {
    type: 'list',
    env: 'PKARR_BOOTSTRAP',
    itemType: 'host:port',
    default: BOOTSTRAP_NODES,
  },

  // ===========================================================================
  // Logging
  // ===========================================================================

  logLevel: {
    type: 'enum',
    env: 'PKARR_LOG_LEVEL',
    values: LOG_LEVELS,
    default: 'info',
  },
} as const satisfies Record<string, ConfigDef>

export type ConfigSchema = typeof configSchema

// ============================================================================
// Derived Types
// ============================================================================

/** All config keys */
export type ConfigKey = keyof ConfigSchema

/** Infer the value type from a config definition */
type InferConfigType<S extends ConfigDef> = S extends { type: 'number' }
  ? number
  : S extends { type: 'enum'; values: infer V }
    ? V extends readonly (infer U)[]
      ? U
      : never
    : S extends { type: 'list' }
      ? string[]
      : never

/** Map of config key to value type */
export type PkarrConfig = {
  [K in ConfigKey]: InferConfigType<ConfigSchema[K]>
}

/** Keys holding numbers */
export type NumberConfigKey = {
  [K in ConfigKey]: ConfigSchema[K]['type'] extends 'number' ? K : never
}[ConfigKey]

// ============================================================================
// Schema Utilities
// ============================================================================

/** Get the schema definition for a config key */
export function getConfigDef<K extends ConfigKey>(key: K): ConfigSchema[K] {
  return configSchema[key]
}

/** Get all defaults as an object */
export function getConfigDefaults(): PkarrConfig {
  return {
    minTtl: configSchema.minTtl.default,
    maxTtl: configSchema.maxTtl.default,
    maxAttempts: configSchema.maxAttempts.default,
    lookupTimeoutMs: configSchema.lookupTimeoutMs.default,
    queryTimeoutMs: configSchema.queryTimeoutMs.default,
    maintenanceIntervalMs: configSchema.maintenanceIntervalMs.default,
    maintenanceMaxPings: configSchema.maintenanceMaxPings.default,
    maxKnownNodes: configSchema.maxKnownNodes.default,
    bootstrapNodes: [...configSchema.bootstrapNodes.default],
    logLevel: configSchema.logLevel.default,
  }
}

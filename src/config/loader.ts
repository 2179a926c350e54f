/**
 * Configuration
 *
 * Resolved once per `Docmap` instance from defaults, environment variables
 * and explicit overrides (in increasing priority). A process-wide config can
 * be cached with `setConfig` for code that has no instance at hand.
 */

import type { CascadePolicy } from '../schema/types'
import type { LogLevel } from '../utils/logger'
import { CASCADE_POLICIES } from '../schema/types'
import { LOG_LEVELS } from '../utils/logger'
import { readEnvConfig, type EnvSource } from './env'
import { ConfigurationError, ErrorCode } from '../errors'

/**
 * docmap configuration options
 */
export interface DocmapConfig {
  /** Minimum level written by the console logger (default 'silent') */
  logLevel?: LogLevel

  /**
   * Throw ValidationError from `save()` instead of returning false
   * Default: false
   */
  strictValidation?: boolean

  /** Cascade policy for relations that declare none (default 'orphan') */
  defaultCascade?: CascadePolicy

  /** Maintain created_at / updated_at on every model (default: per model) */
  timestamps?: boolean

  /** Connection string for MongoDocumentStore.connect */
  mongoUrl?: string

  /** Database name for MongoDocumentStore.connect */
  database?: string
}

/**
 * Configuration with every default applied
 */
export interface ResolvedConfig {
  logLevel: LogLevel
  strictValidation: boolean
  defaultCascade: CascadePolicy
  timestamps: boolean | undefined
  mongoUrl: string | undefined
  database: string | undefined
}

export const DEFAULT_CONFIG: Readonly<ResolvedConfig> = Object.freeze({
  logLevel: 'silent',
  strictValidation: false,
  defaultCascade: 'orphan',
  timestamps: undefined,
  mongoUrl: undefined,
  database: undefined,
})

/**
 * Define configuration with type safety
 *
 * @example
 * ```typescript
 * export default defineConfig({
 *   strictValidation: true,
 *   defaultCascade: 'nullify',
 * })
 * ```
 */
export function defineConfig(config: DocmapConfig): DocmapConfig {
  return config
}

/**
 * Merge defaults, environment and overrides, validating every value
 *
 * @throws ConfigurationError on an unknown log level or cascade policy
 */
export function resolveConfig(overrides: DocmapConfig = {}, env: EnvSource = process.env): ResolvedConfig {
  const merged: DocmapConfig = { ...readEnvConfig(env), ...stripUndefined(overrides) }
  validateConfig(merged)
  return {
    logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
    strictValidation: merged.strictValidation ?? DEFAULT_CONFIG.strictValidation,
    defaultCascade: merged.defaultCascade ?? DEFAULT_CONFIG.defaultCascade,
    timestamps: merged.timestamps,
    mongoUrl: merged.mongoUrl,
    database: merged.database,
  }
}

function stripUndefined(config: DocmapConfig): DocmapConfig {
  const out: DocmapConfig = {}
  if (config.logLevel !== undefined) out.logLevel = config.logLevel
  if (config.strictValidation !== undefined) out.strictValidation = config.strictValidation
  if (config.defaultCascade !== undefined) out.defaultCascade = config.defaultCascade
  if (config.timestamps !== undefined) out.timestamps = config.timestamps
  if (config.mongoUrl !== undefined) out.mongoUrl = config.mongoUrl
  if (config.database !== undefined) out.database = config.database
  return out
}

function validateConfig(config: DocmapConfig): void {
  if (config.logLevel !== undefined && !LOG_LEVELS.includes(config.logLevel)) {
    throw new ConfigurationError(
      `Invalid logLevel "${config.logLevel}". Expected one of: ${LOG_LEVELS.join(', ')}`,
      ErrorCode.INVALID_CONFIG,
      { configKey: 'logLevel', actualValue: config.logLevel }
    )
  }
  if (config.defaultCascade !== undefined && !CASCADE_POLICIES.includes(config.defaultCascade)) {
    throw new ConfigurationError(
      `Invalid defaultCascade "${config.defaultCascade}". Expected one of: ${CASCADE_POLICIES.join(', ')}`,
      ErrorCode.INVALID_CONFIG,
      { configKey: 'defaultCascade', actualValue: config.defaultCascade }
    )
  }
}

// =============================================================================
// Process-wide cache
// =============================================================================

let _config: ResolvedConfig | null = null

/**
 * Get cached config, resolving it from the environment on first use
 */
export function getConfig(): ResolvedConfig {
  if (!_config) {
    _config = resolveConfig()
  }
  return _config
}

export function setConfig(config: DocmapConfig): void {
  _config = resolveConfig(config)
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfig(): void {
  _config = null
}

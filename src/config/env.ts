/**
 * Environment Configuration
 *
 * Reads DOCMAP_* variables. Values are parsed, not validated; validation
 * happens when the result is merged by resolveConfig.
 *
 * | Variable                  | Key              |
 * |---------------------------|------------------|
 * | DOCMAP_LOG_LEVEL          | logLevel         |
 * | DOCMAP_STRICT_VALIDATION  | strictValidation |
 * | DOCMAP_DEFAULT_CASCADE    | defaultCascade   |
 * | DOCMAP_TIMESTAMPS         | timestamps       |
 * | DOCMAP_MONGO_URL          | mongoUrl         |
 * | DOCMAP_DATABASE           | database         |
 */

import type { DocmapConfig } from './loader'
import type { CascadePolicy } from '../schema/types'
import type { LogLevel } from '../utils/logger'
import { CASCADE_POLICIES } from '../schema/types'
import { LOG_LEVELS } from '../utils/logger'
import { ConfigurationError, ErrorCode } from '../errors'

/** Environment variable source, usually `process.env` */
export type EnvSource = Record<string, string | undefined>

const ENV_PREFIX = 'DOCMAP_'

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase()
  if (value === 'true' || value === '1' || value === 'yes') return true
  if (value === 'false' || value === '0' || value === 'no' || value === '') return false
  throw new ConfigurationError(
    `Invalid boolean in ${name}: "${raw}"`,
    ErrorCode.INVALID_CONFIG,
    { configKey: name, actualValue: raw }
  )
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw.trim().toLowerCase())
  if (!level) {
    throw new ConfigurationError(
      `Invalid ${ENV_PREFIX}LOG_LEVEL "${raw}". Expected one of: ${LOG_LEVELS.join(', ')}`,
      ErrorCode.INVALID_CONFIG,
      { configKey: `${ENV_PREFIX}LOG_LEVEL`, actualValue: raw }
    )
  }
  return level
}

function parseCascade(raw: string): CascadePolicy {
  const policy = CASCADE_POLICIES.find(p => p === raw.trim().toLowerCase())
  if (!policy) {
    throw new ConfigurationError(
      `Invalid ${ENV_PREFIX}DEFAULT_CASCADE "${raw}". Expected one of: ${CASCADE_POLICIES.join(', ')}`,
      ErrorCode.INVALID_CONFIG,
      { configKey: `${ENV_PREFIX}DEFAULT_CASCADE`, actualValue: raw }
    )
  }
  return policy
}

/**
 * Read configuration from environment variables
 *
 * Unset and empty variables are skipped.
 */
export function readEnvConfig(env: EnvSource): DocmapConfig {
  const config: DocmapConfig = {}
  const get = (key: string): string | undefined => {
    const value = env[ENV_PREFIX + key]
    return value === undefined || value === '' ? undefined : value
  }

  const logLevel = get('LOG_LEVEL')
  if (logLevel !== undefined) config.logLevel = parseLogLevel(logLevel)

  const strict = get('STRICT_VALIDATION')
  if (strict !== undefined) config.strictValidation = parseBoolean(`${ENV_PREFIX}STRICT_VALIDATION`, strict)

  const cascade = get('DEFAULT_CASCADE')
  if (cascade !== undefined) config.defaultCascade = parseCascade(cascade)

  const timestamps = get('TIMESTAMPS')
  if (timestamps !== undefined) config.timestamps = parseBoolean(`${ENV_PREFIX}TIMESTAMPS`, timestamps)

  const mongoUrl = get('MONGO_URL')
  if (mongoUrl !== undefined) config.mongoUrl = mongoUrl

  const database = get('DATABASE')
  if (database !== undefined) config.database = database

  return config
}

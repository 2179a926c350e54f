/**
 * docmap Configuration
 */

export {
  defineConfig,
  resolveConfig,
  getConfig,
  setConfig,
  clearConfig,
  DEFAULT_CONFIG,
  type DocmapConfig,
  type ResolvedConfig,
} from './loader'

export { readEnvConfig, type EnvSource } from './env'

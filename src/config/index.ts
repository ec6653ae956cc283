/**
 * @entry Config module
 *
 * YAML config loading, schema validation, starter config
 */

export {
  loadConfig,
  parseConfig,
  withOverrides,
  applyEnvOverrides,
  deepMergeConfig,
  CONFIG_FILENAME,
  type LoadConfigOptions,
} from './loadConfig.js'
export { initProject, DEFAULT_CONFIG } from './initProject.js'
export * from './schema.js'

/**
 * Configuration module exports
 */

export {
  createAppConfig,
  validateAppConfig,
  getConfigSummary,
  type AppConfig,
  type ConfigOverrides,
  type LogLevel,
} from './app-config.js';
export { loadEnvironmentFile, DEFAULT_ENV_FILE } from './env-file.js';
export {
  DEPENDENCY_MANIFESTS,
  resolveManifests,
  supportedLanguages,
  type ManifestRule,
} from './manifests.js';
export {
  DEFAULT_GITHUB,
  DEFAULT_RETRY_DELAYS_SECONDS,
  DEFAULT_SCAN,
  REPORT_FILES,
  UNKNOWN_DEPENDENCY,
} from './defaults.js';

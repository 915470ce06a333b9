/**
 * Main export file for programmatic use
 */

export {
  createAppConfig,
  validateAppConfig,
  getConfigSummary,
  loadEnvironmentFile,
  resolveManifests,
  supportedLanguages,
  DEPENDENCY_MANIFESTS,
  type AppConfig,
  type ConfigOverrides,
  type ManifestRule,
} from './config/index.js';

export {
  GitHubClient,
  OctokitTransport,
  createGitHubClient,
  createOctokit,
  parseLinkHeader,
  type HttpTransport,
  type HttpResponse,
  type QueryParams,
  type GitHubClientOptions,
} from './infrastructure/github/index.js';

export { RepositoryCatalog } from './application/services/repository-catalog.js';
export {
  DependencyDetector,
  RepositoryTreeWalker,
  selectMatching,
} from './application/services/dependency-detector.js';
export { formatReport } from './application/services/report-formatter.js';
export { toCsv, writeCsvReport, REPOSITORY_COLUMNS, SCANNED_REPOSITORY_COLUMNS } from './infrastructure/report/csv.js';
export { runScan, type ScanResult } from './workflows/scan-workflow.js';

export * from './lib/errors.js';
export { createLogger, createTimer, type Logger } from './lib/logger.js';
export * from './domain/types/index.js';

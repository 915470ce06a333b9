/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used throughout the scanner.
 */

/**
 * GitHub REST API defaults
 */
export const DEFAULT_GITHUB = {
  apiUrl: 'https://api.github.com',
  accept: 'application/vnd.github.v3+json',
  userAgent: 'org-dependency-scanner',
  maxItemsPerPage: 100,
} as const;

/**
 * Delays (in seconds) between retries of a GitHub request that returned
 * 202, a rate limit response, a server error or no response at all
 */
export const DEFAULT_RETRY_DELAYS_SECONDS: readonly number[] = [1, 2, 4, 8, 16, 32, 64];

/**
 * Default scan behaviour
 */
export const DEFAULT_SCAN = {
  maxDepth: 10,
  includeCommits: true,
} as const;

/**
 * Report file names
 */
export const REPORT_FILES = {
  repositories: (organization: string, language: string): string =>
    `${organization}_${language}_repos.csv`,
  dependencies: 'repos_with_dependencies.csv',
} as const;

/**
 * Placeholder values recorded when no dependency manifest is found
 */
export const UNKNOWN_DEPENDENCY = {
  system: 'Unknown',
  file: 'None',
} as const;

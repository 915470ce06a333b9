/**
 * GitHub client factory
 */

import { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { AppConfig } from '../../config/app-config.js';
import { DEFAULT_GITHUB } from '../../config/defaults.js';
import { GitHubClient } from './client.js';
import { OctokitTransport } from './transport.js';

export { GitHubClient, NO_RESPONSE, type GitHubClientOptions, type GetPagesOptions } from './client.js';
export {
  OctokitTransport,
  readHeader,
  type HttpTransport,
  type HttpResponse,
  type QueryParams,
  type ResponseHeaders,
} from './transport.js';
export { parseLinkHeader } from './link-header.js';

/**
 * Octokit instance authenticated with the configured token. Octokit's own
 * diagnostics are routed into the scanner's logger.
 */
export function createOctokit(config: AppConfig, logger: Logger): Octokit {
  const log = logger.child({ component: 'octokit' });
  return new Octokit({
    auth: config.github.token,
    baseUrl: config.github.apiUrl,
    userAgent: DEFAULT_GITHUB.userAgent,
    log: {
      debug: (message: string) => log.debug(message),
      info: (message: string) => log.info(message),
      warn: (message: string) => log.warn(message),
      error: (message: string) => log.error(message),
    },
  });
}

export function createGitHubClient(config: AppConfig, logger: Logger): GitHubClient {
  return new GitHubClient({
    transport: new OctokitTransport(createOctokit(config, logger)),
    logger,
    apiUrl: config.github.apiUrl,
    perPage: config.github.perPage,
    retryDelaysSeconds: config.github.retryDelaysSeconds,
  });
}

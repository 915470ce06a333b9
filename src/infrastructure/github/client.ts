/**
 * GitHub API client with pagination and exponential backoff
 *
 * Every GET returns the list of page bodies gathered. Failures that cannot be
 * retried end pagination early instead of throwing, except for a rejected
 * token, which no later request can recover from.
 */

import type { Logger } from 'pino';
import { DEFAULT_GITHUB, DEFAULT_RETRY_DELAYS_SECONDS } from '../../config/defaults.js';
import { ApiErrorBodySchema } from '../../domain/types/github.js';
import { AuthenticationError, TransportError } from '../../lib/errors.js';
import { sleep as defaultSleep, type Sleep } from '../../shared/async.js';
import { parseLinkHeader } from './link-header.js';
import { readHeader, type HttpResponse, type HttpTransport, type QueryParams } from './transport.js';

/** Status recorded for an attempt that produced no HTTP response */
export const NO_RESPONSE = 0;

export interface GitHubClientOptions {
  transport: HttpTransport;
  logger: Logger;
  apiUrl?: string;
  perPage?: number;
  retryDelaysSeconds?: readonly number[];
  sleep?: Sleep;
  now?: () => number;
}

export interface GetPagesOptions {
  params?: QueryParams;
  /** Stop after the first page even when a next link is present */
  singlePage?: boolean;
}

export class GitHubClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly apiUrl: string;
  private readonly perPage: number;
  private readonly retryDelaysSeconds: readonly number[];
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: GitHubClientOptions) {
    this.transport = options.transport;
    this.logger = options.logger.child({ component: 'github-client' });
    this.apiUrl = (options.apiUrl ?? DEFAULT_GITHUB.apiUrl).replace(/\/+$/, '');
    this.perPage = options.perPage ?? DEFAULT_GITHUB.maxItemsPerPage;
    this.retryDelaysSeconds = options.retryDelaysSeconds ?? DEFAULT_RETRY_DELAYS_SECONDS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * GET a resource and follow its `next` links, returning each non-empty
   * page body in order.
   */
  async getPages(pathOrUrl: string, options: GetPagesOptions = {}): Promise<unknown[]> {
    const pages: unknown[] = [];
    let url: string | undefined = this.resolveUrl(pathOrUrl);
    let params: QueryParams = { per_page: this.perPage, ...options.params };

    while (url !== undefined) {
      const response = await this.getWithBackoff(url, params);
      if (!response || isEmptyBody(response.data)) break;

      pages.push(response.data);
      if (options.singlePage) break;

      // The next link already carries the query string
      url = parseLinkHeader(readHeader(response.headers, 'link')).next;
      params = {};
    }

    return pages;
  }

  private resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//.test(pathOrUrl)) return pathOrUrl;
    return `${this.apiUrl}${pathOrUrl.startsWith('/') ? '' : '/'}${pathOrUrl}`;
  }

  /**
   * @returns the first 200 response, or undefined once the request is given up
   */
  private async getWithBackoff(url: string, params: QueryParams): Promise<HttpResponse | undefined> {
    let response = await this.attempt(url, params);
    if (response.status === 200) return response;

    if (response.status === 422) {
      this.logUnprocessable(url, response);
      return undefined;
    }
    this.ensureAuthenticated(url, response);

    if (!this.isRetryable(response)) {
      this.logger.warn({ url, status: response.status }, `Giving up on ${url}: ${response.status} response`);
      return undefined;
    }

    let retryUrl = url;
    for (const scheduledDelay of this.retryDelaysSeconds) {
      const location = readHeader(response.headers, 'location');
      if (location) retryUrl = location;

      // GitHub's own Retry-After wins over the backoff schedule
      const retryAfter = parseSeconds(readHeader(response.headers, 'retry-after'));
      const delay = retryAfter ?? scheduledDelay;

      await this.sleep(delay * 1000);
      this.logger.info(
        { url: retryUrl, delaySeconds: delay, status: response.status },
        `Retrying request for ${retryUrl} after ${delay} sec due to ${describeStatus(response.status)}`,
      );
      await this.waitForRateLimitReset(response);

      response = await this.attempt(retryUrl, retryUrl === url ? params : {});
      if (response.status === 200) return response;
      this.ensureAuthenticated(retryUrl, response);

      this.logger.warn(
        { url: retryUrl, status: response.status },
        `Retried request and still got ${describeStatus(response.status)}`,
      );
    }

    this.logger.error(
      { url, status: response.status },
      `Retries exhausted for ${url}. Giving up. Status code: ${response.status}`,
    );
    return undefined;
  }

  private async attempt(url: string, params: QueryParams): Promise<HttpResponse> {
    try {
      return await this.transport.get(url, params);
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;
      this.logger.warn({ url, error: error.message }, `Request for ${url} failed without a response`);
      return { status: NO_RESPONSE, headers: {}, data: undefined };
    }
  }

  private isRetryable(response: HttpResponse): boolean {
    const { status } = response;
    if (status === NO_RESPONSE || status === 202 || status === 429 || status >= 500) return true;
    // Only rate limit flavoured 403s clear up by waiting; anything else is a permission problem
    return status === 403 && (isRateLimited(response) || readHeader(response.headers, 'retry-after') !== undefined);
  }

  private ensureAuthenticated(url: string, response: HttpResponse): void {
    if (response.status !== 401) return;
    const body = ApiErrorBodySchema.safeParse(response.data);
    throw new AuthenticationError(
      `GitHub rejected the access token: ${body.success ? body.data.message : 'Bad credentials'}`,
      url,
    );
  }

  /**
   * Sleep until X-RateLimit-Reset when the primary rate limit is used up
   */
  private async waitForRateLimitReset(response: HttpResponse): Promise<void> {
    if (!isRateLimited(response)) return;

    const resetSeconds = parseSeconds(readHeader(response.headers, 'x-ratelimit-reset'));
    if (resetSeconds === undefined) return;

    const waitMs = Math.max(resetSeconds * 1000 - this.now(), 0);
    this.logger.warn(
      { resetAt: new Date(resetSeconds * 1000).toISOString(), waitMs },
      `Sleeping for ${Math.ceil(waitMs / 1000)} seconds due to rate limit`,
    );
    await this.sleep(waitMs);
  }

  private logUnprocessable(url: string, response: HttpResponse): void {
    const body = ApiErrorBodySchema.safeParse(response.data);
    const first = body.success ? body.data.errors?.[0] : undefined;
    const detail = typeof first === 'string' ? first : first?.message;

    this.logger.warn(
      {
        url,
        status: response.status,
        message: body.success ? body.data.message : undefined,
        detail,
      },
      `Skipping: 422 Unprocessable Entity for url ${url}`,
    );
  }
}

function isRateLimited(response: HttpResponse): boolean {
  return (
    (response.status === 403 || response.status === 429) &&
    readHeader(response.headers, 'x-ratelimit-remaining') === '0'
  );
}

function isEmptyBody(data: unknown): boolean {
  if (data === undefined || data === null || data === '') return true;
  return Array.isArray(data) && data.length === 0;
}

function parseSeconds(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function describeStatus(status: number): string {
  return status === NO_RESPONSE ? 'no response' : `${status} response`;
}

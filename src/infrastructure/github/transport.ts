/**
 * HTTP transport for the GitHub REST API
 */

import type { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { DEFAULT_GITHUB } from '../../config/defaults.js';
import { TransportError } from '../../lib/errors.js';

export type QueryParams = Record<string, string | number | boolean>;

export type ResponseHeaders = Record<string, string | number | undefined>;

export interface HttpResponse {
  status: number;
  headers: ResponseHeaders;
  data: unknown;
}

/**
 * Resolves with the response for every HTTP status, error statuses included,
 * and rejects with a TransportError only when no response arrived.
 */
export interface HttpTransport {
  get(url: string, params?: QueryParams): Promise<HttpResponse>;
}

export class OctokitTransport implements HttpTransport {
  constructor(private readonly octokit: Octokit) {}

  async get(url: string, params: QueryParams = {}): Promise<HttpResponse> {
    try {
      const response = await this.octokit.request(`GET ${url}`, {
        ...params,
        headers: { accept: DEFAULT_GITHUB.accept },
      });
      return { status: response.status, headers: response.headers, data: response.data };
    } catch (error) {
      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          headers: error.response.headers,
          data: error.response.data,
        };
      }
      const cause = error instanceof Error ? error : undefined;
      throw new TransportError(`Request for ${url} failed: ${cause?.message ?? String(error)}`, url, cause);
    }
  }
}

/**
 * Case-insensitive header lookup
 */
export function readHeader(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return String(value);
    }
  }
  return undefined;
}

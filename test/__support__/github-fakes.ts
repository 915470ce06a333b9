/**
 * In-process stand-ins for the GitHub API
 */

import { jest } from '@jest/globals';
import type { Logger } from 'pino';
import { GitHubClient, type GitHubClientOptions } from '../../src/infrastructure/github/client';
import type {
  HttpResponse,
  HttpTransport,
  QueryParams,
  ResponseHeaders,
} from '../../src/infrastructure/github/transport';
import { createLogger } from '../../src/lib/logger';
import type { Sleep } from '../../src/shared/async';

export const API = 'https://api.github.com';

export type FakeReply = HttpResponse | Error;

/**
 * Replies are served in order per URL; the last one repeats. Unknown URLs
 * answer 404.
 */
export class FakeTransport implements HttpTransport {
  readonly calls: Array<{ url: string; params: QueryParams }> = [];
  private readonly routes = new Map<string, FakeReply[]>();

  on(url: string, ...replies: FakeReply[]): this {
    this.routes.set(url, [...replies]);
    return this;
  }

  async get(url: string, params: QueryParams = {}): Promise<HttpResponse> {
    this.calls.push({ url, params });
    const queue = this.routes.get(url) ?? [];
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) return respond(404, { message: 'Not Found' });
    if (reply instanceof Error) throw reply;
    return reply;
  }

  urls(): string[] {
    return this.calls.map((call) => call.url);
  }
}

export function respond(status: number, data: unknown = {}, headers: ResponseHeaders = {}): HttpResponse {
  return { status, headers, data };
}

export function ok(data: unknown, headers: ResponseHeaders = {}): HttpResponse {
  return respond(200, data, headers);
}

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

export function createTestClient(
  transport: HttpTransport,
  options: Partial<GitHubClientOptions> = {},
): { client: GitHubClient; sleep: jest.Mock<Sleep> } {
  const sleep = jest.fn<Sleep>().mockResolvedValue(undefined);
  const client = new GitHubClient({ transport, logger: silentLogger(), sleep, ...options });
  return { client, sleep };
}

export function searchItem(fullName: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const [owner, name] = fullName.split('/');
  return {
    id: 1,
    name,
    full_name: fullName,
    html_url: `https://github.com/${fullName}`,
    description: `${name} service`,
    created_at: '2023-01-10T09:00:00Z',
    updated_at: '2024-03-01T12:00:00Z',
    pushed_at: '2024-02-28T08:30:00Z',
    stargazers_count: 5,
    watchers_count: 5,
    forks_count: 1,
    language: 'Python',
    owner: { login: owner },
    private: false,
    size: 120,
    open_issues_count: 2,
    default_branch: 'main',
    ...overrides,
  };
}

export function fileEntry(path: string): Record<string, string> {
  return { type: 'file', name: path.split('/').pop() ?? path, path };
}

export function dirEntry(path: string): Record<string, string> {
  return { type: 'dir', name: path.split('/').pop() ?? path, path };
}

export function commitEntry(sha: string, author: string, date: string): Record<string, unknown> {
  return { sha, commit: { author: { name: author, date, email: 'dev@example.test' }, message: 'Update' } };
}

export function contentsUrl(fullName: string, path = ''): string {
  return `${API}/repos/${fullName}/contents/${path}`;
}

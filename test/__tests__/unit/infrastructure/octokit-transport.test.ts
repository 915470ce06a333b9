/**
 * OctokitTransport against an in-process fetch
 */

import { describe, it, expect } from '@jest/globals';
import { Octokit } from '@octokit/rest';
import { OctokitTransport } from '../../../../src/infrastructure/github/transport';
import { TransportError } from '../../../../src/lib/errors';

interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

function octokitWith(handler: (url: string) => Response): { octokit: Octokit; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch = async (url: string, init: { headers?: Record<string, string> } = {}): Promise<Response> => {
    requests.push({ url, headers: init.headers ?? {} });
    return handler(url);
  };
  const octokit = new Octokit({ auth: 'test-secret', request: { fetch } });
  return { octokit, requests };
}

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8', ...headers },
  });
}

describe('OctokitTransport', () => {
  it('should return status, headers and body of a successful request', async () => {
    const { octokit, requests } = octokitWith(() =>
      json(200, [{ name: 'api' }], { link: '<https://api.github.com/x?page=2>; rel="next"' }),
    );
    const transport = new OctokitTransport(octokit);

    const response = await transport.get('https://api.github.com/orgs/acme/repos', { per_page: 5 });

    expect(response.status).toBe(200);
    expect(response.data).toEqual([{ name: 'api' }]);
    expect(response.headers.link).toBe('<https://api.github.com/x?page=2>; rel="next"');
    expect(requests[0]?.url).toBe('https://api.github.com/orgs/acme/repos?per_page=5');
    expect(requests[0]?.headers.accept).toBe('application/vnd.github.v3+json');
    expect(requests[0]?.headers.authorization).toBe('token test-secret');
  });

  it('should resolve error statuses instead of throwing', async () => {
    const { octokit } = octokitWith(() => json(404, { message: 'Not Found' }));
    const transport = new OctokitTransport(octokit);

    const response = await transport.get('https://api.github.com/repos/acme/gone/contents/');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ message: 'Not Found' });
  });

  it('should reject with TransportError when no response arrives', async () => {
    const { octokit } = octokitWith(() => {
      throw new Error('getaddrinfo ENOTFOUND api.github.com');
    });
    const transport = new OctokitTransport(octokit);

    await expect(transport.get('https://api.github.com/orgs/acme/repos')).rejects.toBeInstanceOf(TransportError);
  });
});

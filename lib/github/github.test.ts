//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { createFakeFetch } from '../../test/fakeFetch.js';
import { ErrorHelper } from '../transitional.js';
import { collectPages } from './collections.js';
import { createGitHubClient, GITHUB_API_VERSION } from './index.js';
import { getRetryDelay } from './octokitRetry.js';

function createClient(fetch: typeof globalThis.fetch, sleep = vi.fn(async (_milliseconds: number) => undefined)) {
  return { octokit: createGitHubClient({ token: 'test-secret', fetch, sleep, retries: 3 }), sleep };
}

function errorWithHeaders(status: number, headers: Record<string, string>) {
  return { status, response: { headers } };
}

describe('GitHub client', () => {
  it('requires a token', () => {
    expect(() => createGitHubClient({})).toThrow('github.token required: set the GITHUB_TOKEN environment variable');
  });

  it('sends the API version and credentials', async () => {
    const { fetch, requests } = createFakeFetch([{ method: 'GET', path: '/orgs/acme/teams', body: [] }]);
    const { octokit } = createClient(fetch);
    await octokit.request('GET /orgs/{org}/teams', { org: 'acme' });
    expect(requests[0].headers.get('x-github-api-version')).toEqual(GITHUB_API_VERSION);
    expect(requests[0].headers.get('authorization')).toEqual('token test-secret');
  });

  it('retries server errors with exponential backoff', async () => {
    const { fetch, requests } = createFakeFetch([
      { method: 'GET', path: '/orgs/acme/teams', status: 502, body: { message: 'Bad Gateway' } },
      { method: 'GET', path: '/orgs/acme/teams', status: 503, body: { message: 'Unavailable' } },
      { method: 'GET', path: '/orgs/acme/teams', body: [{ slug: 'frontend', name: 'Frontend' }] },
    ]);
    const { octokit, sleep } = createClient(fetch);
    const response = await octokit.request('GET /orgs/{org}/teams', { org: 'acme' });
    expect(response.status).toEqual(200);
    expect(requests.length).toEqual(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('gives up after the configured retries', async () => {
    const { fetch, requests } = createFakeFetch([
      { method: 'GET', path: '/orgs/acme/teams', status: 500, body: { message: 'Server Error' } },
    ]);
    const { octokit } = createClient(fetch);
    let status: number | undefined;
    try {
      await octokit.request('GET /orgs/{org}/teams', { org: 'acme' });
    } catch (error) {
      status = ErrorHelper.GetStatus(error);
    }
    expect(status).toEqual(500);
    expect(requests.length).toEqual(4);
  });

  it('does not retry client errors', async () => {
    const { fetch, requests } = createFakeFetch([
      { method: 'GET', path: '/orgs/acme/teams', status: 401, body: { message: 'Bad credentials' } },
    ]);
    const { octokit, sleep } = createClient(fetch);
    await expect(octokit.request('GET /orgs/{org}/teams', { org: 'acme' })).rejects.toThrow('Bad credentials');
    expect(requests.length).toEqual(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('follows pagination links and validates each page', async () => {
    const { fetch, requests } = createFakeFetch([
      {
        method: 'GET',
        path: '/orgs/acme/teams',
        body: [{ slug: 'frontend', name: 'Frontend' }],
        headers: { link: '<https://api.github.com/orgs/acme/teams?per_page=1&page=2>; rel="next"' },
      },
      { method: 'GET', path: '/orgs/acme/teams', body: [{ slug: 'mobile', name: 'Mobile' }] },
    ]);
    const { octokit } = createClient(fetch);
    const schema = z.array(z.object({ slug: z.string() }));
    const slugs = await collectPages(octokit, 'GET /orgs/{org}/teams', { org: 'acme' }, schema, (page) =>
      page.map((team) => team.slug)
    );
    expect(slugs).toEqual(['frontend', 'mobile']);
    expect(requests.map((request) => request.search)).toEqual(['?per_page=100', '?per_page=1&page=2']);
  });

  it('rejects a page with an unexpected shape', async () => {
    const { fetch } = createFakeFetch([{ method: 'GET', path: '/orgs/acme/teams', body: [{ name: 'No slug' }] }]);
    const { octokit } = createClient(fetch);
    const schema = z.array(z.object({ slug: z.string() }));
    await expect(
      collectPages(octokit, 'GET /orgs/{org}/teams', { org: 'acme' }, schema, (page) => page)
    ).rejects.toThrow(/^Unexpected response shape from GET \/orgs\/\{org\}\/teams/);
  });
});

describe('getRetryDelay', () => {
  const now = () => 1_700_000_000_000;

  it('prefers the retry-after header', () => {
    expect(getRetryDelay(errorWithHeaders(503, { 'retry-after': '3' }), 0, now)).toEqual(3000);
  });

  it('waits for the rate limit to reset', () => {
    const error = errorWithHeaders(403, { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000010' });
    expect(getRetryDelay(error, 0, now)).toEqual(11000);
  });

  it('backs off exponentially otherwise', () => {
    expect(getRetryDelay(errorWithHeaders(502, {}), 2, now)).toEqual(4000);
  });
});

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createGitHubClient } from '../lib/github/index.js';
import { createFakeFetch } from '../test/fakeFetch.js';
import { deduplicateSeats, EnterpriseCopilot } from './enterpriseCopilot.js';
import { OrganizationProperties } from './organizationProperties.js';
import { GitHubTeams } from './teams.js';

function seat(login: string, createdAt = '2026-01-05T00:00:00Z') {
  return { assignee: { login }, created_at: createdAt, last_activity_at: null };
}

describe('GitHub listings', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Copilot seats', () => {
    it('lists the seats of the enterprise once per user', async () => {
      const { fetch } = createFakeFetch([
        {
          method: 'GET',
          path: '/enterprises/acme-corp/copilot/billing/seats',
          body: { total_seats: 3, seats: [seat('alice'), seat('bob', '2026-02-10T00:00:00Z'), seat('alice')] },
        },
      ]);
      const copilot = new EnterpriseCopilot(createGitHubClient({ token: 'test-secret', fetch }), 'acme-corp');
      expect(await copilot.listSeats()).toEqual([
        { login: 'alice', createdAt: '2026-01-05T00:00:00Z', lastActivityAt: undefined },
        { login: 'bob', createdAt: '2026-02-10T00:00:00Z', lastActivityAt: undefined },
      ]);
    });

    it('reports duplicate seats', () => {
      const seats = deduplicateSeats([seat('alice'), seat('alice'), seat('alice'), seat('bob'), seat('bob')]);
      expect(seats.map((entry) => entry.login)).toEqual(['alice', 'bob']);
      expect(console.warn).toHaveBeenCalledWith(
        'Detected and skipped 3 duplicate seat entries across 2 users: alice (+2), bob (+1)'
      );
    });

    it('skips seats without an assignee', () => {
      expect(deduplicateSeats([{ assignee: null }, seat('carol')]).map((entry) => entry.login)).toEqual(['carol']);
    });
  });

  describe('teams', () => {
    it('lists organization teams and their members', async () => {
      const { fetch } = createFakeFetch([
        { method: 'GET', path: '/orgs/acme/teams', body: [{ slug: 'frontend', name: 'Frontend', id: 1 }] },
        { method: 'GET', path: '/orgs/acme/teams/frontend/members', body: [{ login: 'alice' }, { login: 'bob' }] },
      ]);
      const teams = new GitHubTeams(createGitHubClient({ token: 'test-secret', fetch }));
      const [frontend] = await teams.listTeams({ kind: 'organizations', organizations: ['acme'] });
      expect(frontend).toEqual({ slug: 'frontend', name: 'Frontend', organization: 'acme' });
      expect(await teams.listMembers(frontend)).toEqual(['alice', 'bob']);
    });

    it('lists enterprise teams and their memberships', async () => {
      const { fetch } = createFakeFetch([
        { method: 'GET', path: '/enterprises/acme-corp/teams', body: [{ slug: 'platform', name: 'Platform' }] },
        { method: 'GET', path: '/enterprises/acme-corp/teams/platform/memberships', body: [{ login: 'erin' }] },
      ]);
      const teams = new GitHubTeams(createGitHubClient({ token: 'test-secret', fetch }), 'acme-corp');
      const [platform] = await teams.listTeams({ kind: 'enterprise', enterprise: 'acme-corp' });
      expect(platform).toEqual({ slug: 'platform', name: 'Platform' });
      expect(await teams.listMembers(platform)).toEqual(['erin']);
    });
  });

  describe('repository custom properties', () => {
    it('maps property values by name', async () => {
      const { fetch } = createFakeFetch([
        {
          method: 'GET',
          path: '/orgs/acme/properties/values',
          body: [
            {
              repository_id: 1,
              repository_name: 'web',
              repository_full_name: 'acme/web',
              properties: [
                { property_name: 'team', value: 'web' },
                { property_name: 'areas', value: ['ui', 'docs'] },
                { property_name: 'owner', value: null },
              ],
            },
          ],
        },
      ]);
      const properties = new OrganizationProperties(createGitHubClient({ token: 'test-secret', fetch }));
      expect(await properties.listRepositoryProperties('acme')).toEqual([
        { repositoryFullName: 'acme/web', properties: { team: 'web', areas: ['ui', 'docs'], owner: null } },
      ]);
    });
  });
});

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { Octokit } from '@octokit/rest';
import { z } from 'zod';

import { collectPages } from '../lib/github/collections.js';
import { CreateError } from '../lib/transitional.js';
import type { ITeamListingService, Team, TeamScope } from './costCenters/types.js';

const TeamEntitySchema = z.object({
  slug: z.string(),
  name: z.string(),
});

const AccountSchema = z.object({
  login: z.string().nullish(),
});

const TeamsPageSchema = z.array(TeamEntitySchema);
const AccountsPageSchema = z.array(AccountSchema);

function logins(accounts: z.infer<typeof AccountsPageSchema>): string[] {
  const result: string[] = [];
  for (const account of accounts) {
    if (account.login) {
      result.push(account.login);
    }
  }
  return result;
}

export class GitHubTeams implements ITeamListingService {
  constructor(
    private readonly octokit: Octokit,
    private readonly enterprise?: string,
    private readonly pageSize?: number
  ) {}

  async listTeams(scope: TeamScope): Promise<Team[]> {
    if (scope.kind === 'enterprise') {
      const teams = await collectPages(
        this.octokit,
        'GET /enterprises/{enterprise}/teams',
        { enterprise: scope.enterprise },
        TeamsPageSchema,
        (page) => page,
        this.pageSize
      );
      return teams.map(({ slug, name }) => ({ slug, name }));
    }
    const result: Team[] = [];
    for (const organization of scope.organizations) {
      const teams = await collectPages(
        this.octokit,
        'GET /orgs/{org}/teams',
        { org: organization },
        TeamsPageSchema,
        (page) => page,
        this.pageSize
      );
      result.push(...teams.map(({ slug, name }) => ({ slug, name, organization })));
    }
    return result;
  }

  async listMembers(team: Team): Promise<string[]> {
    if (team.organization) {
      return collectPages(
        this.octokit,
        'GET /orgs/{org}/teams/{team_slug}/members',
        { org: team.organization, team_slug: team.slug },
        AccountsPageSchema,
        logins,
        this.pageSize
      );
    }
    if (!this.enterprise) {
      throw CreateError.ParameterRequired('github.enterprise', `listing members of enterprise team ${team.slug}`);
    }
    return collectPages(
      this.octokit,
      'GET /enterprises/{enterprise}/teams/{team_slug}/memberships',
      { enterprise: this.enterprise, team_slug: team.slug },
      AccountsPageSchema,
      logins,
      this.pageSize
    );
  }
}

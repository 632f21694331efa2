//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import { ErrorHelper } from '../../lib/transitional.js';
import { getTeamKey, type ITeamListingService, type Team, type TeamScope, type TeamWithMembers } from './types.js';

const debug = Debug.debug('costcenters');

export type TeamFetchFailure = {
  // a team key, or the organization whose listing failed
  source: string;
  message: string;
  // absent when a whole team listing failed
  team?: Team;
};

export type TeamFetchResult = {
  teams: TeamWithMembers[];
  failures: TeamFetchFailure[];
};

export interface ITeamFetchOptions {
  // Teams for which members are not needed, such as unmapped teams in manual mode
  skipMembersFor?: (team: Team) => boolean;
}

function describeScope(scope: TeamScope) {
  return scope.kind === 'enterprise' ? `enterprise ${scope.enterprise}` : `organization ${scope.organizations.join(', ')}`;
}

function splitScope(scope: TeamScope): TeamScope[] {
  if (scope.kind === 'enterprise') {
    return [scope];
  }
  return scope.organizations.map((organization) => ({ kind: 'organizations' as const, organizations: [organization] }));
}

export async function fetchTeamsWithMembers(
  service: ITeamListingService,
  scope: TeamScope,
  options?: ITeamFetchOptions
): Promise<TeamFetchResult> {
  const result: TeamFetchResult = { teams: [], failures: [] };
  for (const singleScope of splitScope(scope)) {
    let teams: Team[] = [];
    try {
      teams = await service.listTeams(singleScope);
      console.log(`Found ${teams.length} teams in ${describeScope(singleScope)}`);
    } catch (error) {
      if (ErrorHelper.IsFatalRemote(error)) {
        throw error;
      }
      const message = ErrorHelper.GetMessage(error);
      console.warn(`Failed to list teams in ${describeScope(singleScope)}: ${message}`);
      result.failures.push({ source: describeScope(singleScope), message });
      continue;
    }
    for (const team of teams) {
      const key = getTeamKey(team);
      if (options?.skipMembersFor && options.skipMembersFor(team)) {
        result.teams.push({ team, members: [] });
        continue;
      }
      try {
        const members = await service.listMembers(team);
        debug(`Team ${key} has ${members.length} members`);
        result.teams.push({ team, members });
      } catch (error) {
        if (ErrorHelper.IsFatalRemote(error)) {
          throw error;
        }
        const message = ErrorHelper.GetMessage(error);
        console.warn(`Failed to fetch members of team ${key}, skipping the team: ${message}`);
        result.failures.push({ source: key, message, team });
      }
    }
  }
  return result;
}

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { groupAssignmentsByCostCenter, resolveAssignments } from '../../business/costCenters/assignmentResolver.js';
import { createNamingPolicy, type ICostCenterNamingPolicy } from '../../business/costCenters/namingPolicy.js';
import { buildTeamsSummary, printTeamsSummary } from '../../business/costCenters/summary.js';
import { fetchTeamsWithMembers, type TeamFetchFailure } from '../../business/costCenters/teamFetcher.js';
import { getTeamKey, type TeamScope } from '../../business/costCenters/types.js';
import type { SyncConfiguration } from '../../config/index.types.js';
import { assertUnreachable, CreateError } from '../../lib/transitional.js';
import { shouldAssign, SyncExecutionMode } from './options.js';
import { synchronizeCostCenters } from './synchronize.js';
import type { ISyncModeHandler } from './types.js';

export function resolveTeamScope(config: SyncConfiguration): TeamScope {
  const { scope, organizations } = config.teams;
  if (!scope) {
    throw CreateError.InvalidParameters(
      'teams.scope must be "organization" or "enterprise"; set TEAMS_SCOPE or the teams configuration'
    );
  }
  switch (scope) {
    case 'organization':
      if (organizations.length === 0) {
        throw CreateError.InvalidParameters(
          'teams.organizations must list at least one organization in organization scope; set GITHUB_ORGANIZATIONS'
        );
      }
      return { kind: 'organizations', organizations };
    case 'enterprise':
      if (!config.github.enterprise) {
        throw CreateError.ParameterRequired('github.enterprise', 'enterprise scope lists the teams of an enterprise');
      }
      return { kind: 'enterprise', enterprise: config.github.enterprise };
    default:
      return assertUnreachable(scope);
  }
}

// Members of a team that could not be fetched are still expected in its cost center
export function limitRemovalsAfterFailures(
  fullSync: boolean,
  failures: TeamFetchFailure[],
  policy: ICostCenterNamingPolicy
): { fullSync: boolean; retainMembersOf: Set<string> } {
  const retainMembersOf = new Set<string>();
  if (!fullSync || failures.length === 0) {
    return { fullSync, retainMembersOf };
  }
  if (failures.some((failure) => !failure.team)) {
    console.warn('A team listing failed; no users will be removed from any cost center in this run');
    return { fullSync: false, retainMembersOf };
  }
  for (const { team, source } of failures) {
    const name = team ? policy.targetName(team) : undefined;
    if (name && !retainMembersOf.has(name)) {
      retainMembersOf.add(name);
      console.warn(`Members of team ${source} could not be fetched; no users will be removed from '${name}'`);
    }
  }
  return { fullSync, retainMembersOf };
}

function describeTeamScope(scope: TeamScope) {
  return scope.kind === 'enterprise'
    ? `enterprise ${scope.enterprise}`
    : `organization(s) ${scope.organizations.join(', ')}`;
}

export const teamsMode: ISyncModeHandler = {
  name: 'teams',

  validate(config) {
    resolveTeamScope(config);
    createNamingPolicy(config.teams);
  },

  describe(config) {
    const fullSync = config.teams.removeUsersNoLongerInTeams ? ', removing users no longer in their team' : '';
    return `assign members of the teams in ${describeTeamScope(resolveTeamScope(config))} to cost centers (${config.teams.mode} mode${fullSync})`;
  },

  async run(providers, options) {
    const { config } = providers;
    const scope = resolveTeamScope(config);
    const policy = createNamingPolicy(config.teams);
    const fetched = await fetchTeamsWithMembers(providers.teams, scope, {
      skipMembersFor: policy.kind === 'manual' ? (team) => !policy.targetName(team) : undefined,
    });
    const resolution = resolveAssignments(fetched.teams, policy);
    const rows = Array.from(resolution.assignments.values()).map((assignment) => ({
      username: assignment.username,
      costCenter: assignment.costCenter,
      team: getTeamKey(assignment.team),
    }));
    if (options.summaryReport) {
      printTeamsSummary(
        buildTeamsSummary(
          config.teams.mode,
          scope.kind === 'enterprise' ? 'enterprise' : 'organization',
          scope.kind === 'organizations' ? scope.organizations : [],
          fetched.teams.length,
          resolution
        )
      );
    }
    const successProperties: Record<string, string | number | boolean> = {
      teams: fetched.teams.length,
      teamFailures: fetched.failures.length,
      users: resolution.assignments.size,
      conflicts: resolution.conflicts.length,
    };
    if (!shouldAssign(options)) {
      return { rows, successProperties };
    }
    const { fullSync, retainMembersOf } = limitRemovalsAfterFailures(
      config.teams.removeUsersNoLongerInTeams,
      fetched.failures,
      policy
    );
    const { totals } = await synchronizeCostCenters(providers, groupAssignmentsByCostCenter(resolution), {
      apply: options.mode === SyncExecutionMode.Apply,
      fullSync,
      retainMembersOf,
      protectedUsers: config.teams.protectedUsers,
      conflicts: resolution.conflicts.length,
    });
    Object.assign(successProperties, totals);
    if (fetched.failures.length > 0) {
      console.warn(`${fetched.failures.length} team listing(s) failed and were skipped`);
    }
    return { rows, successProperties };
  },
};

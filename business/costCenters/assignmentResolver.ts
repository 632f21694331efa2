//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import type { ICostCenterNamingPolicy } from './namingPolicy.js';
import { getTeamKey, type Assignment, type AssignmentConflict, type Team, type TeamWithMembers } from './types.js';

const debug = Debug.debug('costcenters');

const CONFLICT_DISPLAY_LIMIT = 10;

export type AssignmentResolution = {
  // one entry per username
  assignments: Map<string, Assignment>;
  conflicts: AssignmentConflict[];
  // cost centers of every team that contributed members, in processing order
  costCenters: string[];
  skippedTeams: Team[];
  emptyTeams: Team[];
};

// Users belong to one cost center at a time: the last team processed wins.
export function resolveAssignments(
  teams: TeamWithMembers[],
  policy: ICostCenterNamingPolicy
): AssignmentResolution {
  const assignments = new Map<string, Assignment>();
  const membership = new Map<string, Team[]>();
  const costCenters = new Set<string>();
  const skippedTeams: Team[] = [];
  const emptyTeams: Team[] = [];

  for (const { team, members } of teams) {
    const key = getTeamKey(team);
    const costCenter = policy.targetName(team);
    if (!costCenter) {
      console.warn(`No mapping found for team ${key} in ${policy.kind} mode, skipping the team`);
      skippedTeams.push(team);
      continue;
    }
    const uniqueMembers = Array.from(new Set(members));
    if (uniqueMembers.length === 0) {
      debug(`Team ${key} has no members, skipping`);
      emptyTeams.push(team);
      continue;
    }
    costCenters.add(costCenter);
    for (const username of uniqueMembers) {
      let teamsOfUser = membership.get(username);
      if (!teamsOfUser) {
        teamsOfUser = [];
        membership.set(username, teamsOfUser);
      }
      teamsOfUser.push(team);
      assignments.set(username, { username, costCenter, team });
    }
    console.log(`Team ${team.name} (${key}) -> cost center '${costCenter}': ${uniqueMembers.length} members`);
  }

  const conflicts: AssignmentConflict[] = [];
  for (const [username, teamsOfUser] of membership) {
    const assignment = assignments.get(username);
    if (assignment && teamsOfUser.length > 1 && teamsOfUser[0] !== assignment.team) {
      conflicts.push({ username, teams: teamsOfUser, winner: assignment.team });
    }
  }
  reportConflicts(conflicts, assignments);

  return {
    assignments,
    conflicts,
    costCenters: Array.from(costCenters),
    skippedTeams,
    emptyTeams,
  };
}

function reportConflicts(conflicts: AssignmentConflict[], assignments: Map<string, Assignment>) {
  if (conflicts.length === 0) {
    return;
  }
  console.warn(
    `Found ${conflicts.length} users who are members of multiple teams. Each user belongs to one cost center; the last team processed determines the assignment.`
  );
  for (const conflict of conflicts.slice(0, CONFLICT_DISPLAY_LIMIT)) {
    const teams = conflict.teams.map(getTeamKey).join(', ');
    console.warn(`  ${conflict.username} is in multiple teams [${teams}] -> '${assignments.get(conflict.username)?.costCenter}'`);
  }
  if (conflicts.length > CONFLICT_DISPLAY_LIMIT) {
    console.warn(`  ... and ${conflicts.length - CONFLICT_DISPLAY_LIMIT} more multi-team users`);
  }
}

export function groupAssignmentsByCostCenter(resolution: AssignmentResolution): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const costCenter of resolution.costCenters) {
    grouped.set(costCenter, []);
  }
  for (const assignment of resolution.assignments.values()) {
    const usernames = grouped.get(assignment.costCenter) || [];
    usernames.push(assignment.username);
    grouped.set(assignment.costCenter, usernames);
  }
  return grouped;
}

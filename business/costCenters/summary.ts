//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { TeamsMappingMode, TeamsScope } from '../../config/teams.types.js';
import type { AssignmentResolution } from './assignmentResolver.js';
import { groupAssignmentsByCostCenter } from './assignmentResolver.js';
import type { MaterializeResult } from './materializer.js';
import { summarizeSyncResults, type CostCenterSyncResult } from './syncExecutor.js';

export type TeamsSummary = {
  mode: TeamsMappingMode;
  scope: TeamsScope;
  organizations: string[];
  totalTeams: number;
  totalCostCenters: number;
  uniqueUsers: number;
  costCenters: Record<string, { users: number }>;
};

export function buildTeamsSummary(
  mode: TeamsMappingMode,
  scope: TeamsScope,
  organizations: string[],
  totalTeams: number,
  resolution: AssignmentResolution
): TeamsSummary {
  const costCenters: Record<string, { users: number }> = {};
  for (const [name, usernames] of groupAssignmentsByCostCenter(resolution)) {
    costCenters[name] = { users: usernames.length };
  }
  return {
    mode,
    scope,
    organizations: scope === 'enterprise' ? [] : organizations,
    totalTeams,
    totalCostCenters: Object.keys(costCenters).length,
    uniqueUsers: resolution.assignments.size,
    costCenters,
  };
}

export function printTeamsSummary(summary: TeamsSummary) {
  console.log('\n=== Teams Cost Center Summary ===');
  console.log(`Mode: ${summary.mode}`);
  console.log(`Scope: ${summary.scope}`);
  if (summary.organizations.length > 0) {
    console.log(`Organizations: ${summary.organizations.join(', ')}`);
  }
  console.log(`Total teams: ${summary.totalTeams}`);
  console.log(`Cost centers: ${summary.totalCostCenters}`);
  console.log(`Unique users: ${summary.uniqueUsers}`);
  for (const [name, { users }] of Object.entries(summary.costCenters)) {
    console.log(`  ${name}: ${users} users`);
  }
}

export function printCostCenterCounts(grouped: Map<string, string[]>) {
  console.log('\n=== Cost Center Summary ===');
  for (const [name, usernames] of grouped) {
    console.log(`${name}: ${usernames.length} users`);
  }
}

export function printSyncSummary(
  apply: boolean,
  results: CostCenterSyncResult[],
  materialized: MaterializeResult,
  conflicts: number
) {
  const totals = summarizeSyncResults(results);
  console.log(`\n=== ${apply ? 'Sync' : 'Plan'} Summary ===`);
  for (const result of results) {
    if (apply) {
      console.log(
        `${result.name}: +${result.added.length} added, -${result.removed.length} removed, ${result.unchanged} unchanged` +
          (result.addFailed.length + result.removeFailed.length > 0
            ? `, ${result.addFailed.length + result.removeFailed.length} failed`
            : '')
      );
    } else {
      const deferred = result.removalDeferred ? ' (removals deferred until created)' : '';
      console.log(
        `${result.name}: would add ${result.plannedAdds.length}, would remove ${result.plannedRemovals.length}, ${result.unchanged} unchanged${deferred}`
      );
    }
  }
  if (apply) {
    console.log(`Added: ${totals.addedSuccess} (failed: ${totals.addedFailure})`);
    console.log(`Removed: ${totals.removedSuccess} (failed: ${totals.removedFailure})`);
  } else {
    console.log(`Planned additions: ${totals.plannedAdds}`);
    console.log(`Planned removals: ${totals.plannedRemovals}`);
    if (materialized.pendingCreation.length > 0) {
      console.log(`Cost centers to create: ${materialized.pendingCreation.join(', ')}`);
    }
  }
  console.log(`Skipped, already in another cost center: ${totals.skippedElsewhere}`);
  console.log(`Protected from removal: ${totals.protectedUsers}`);
  console.log(`Unresolved cost centers: ${materialized.unresolved.length}`);
  console.log(`Conflicts: ${conflicts}`);
}

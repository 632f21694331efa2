//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { ensureBudgets } from '../../business/costCenters/budgets.js';
import { CostCenterMaterializer, type MaterializeResult } from '../../business/costCenters/materializer.js';
import { printSyncSummary } from '../../business/costCenters/summary.js';
import {
  summarizeSyncResults,
  SyncExecutor,
  type CostCenterSyncResult,
  type CostCenterTarget,
  type SyncTotals,
} from '../../business/costCenters/syncExecutor.js';
import { BudgetOutcome } from '../../business/costCenters/types.js';
import type { IProviders } from '../../interfaces/index.js';

export interface ISynchronizeOptions {
  apply: boolean;
  fullSync: boolean;
  protectedUsers?: string[];
  conflicts?: number;
  // cost centers whose current members full sync keeps
  retainMembersOf?: Set<string>;
}

export type SynchronizeResult = {
  materialized: MaterializeResult;
  results: CostCenterSyncResult[];
  totals: SyncTotals;
};

// Resolves the named cost centers, then reconciles their members
export async function synchronizeCostCenters(
  providers: IProviders,
  desired: Map<string, string[]>,
  options: ISynchronizeOptions
): Promise<SynchronizeResult> {
  const { config } = providers;
  const materializer = new CostCenterMaterializer(providers.registry, providers.cache, {
    autoCreate: config.costCenters.autoCreate,
    apply: options.apply,
  });
  const materialized = await materializer.materialize(Array.from(desired.keys()));
  const targets: CostCenterTarget[] = [];
  for (const [name, usernames] of desired) {
    const id = materialized.resolved.get(name);
    if (id || materialized.pendingCreation.includes(name)) {
      targets.push({ name, id, desired: usernames, retainMembers: options.retainMembersOf?.has(name) });
    }
  }
  const executor = new SyncExecutor(providers.registry, {
    apply: options.apply,
    fullSync: options.fullSync,
    skipUsersInOtherCostCenters: config.costCenters.skipUsersInOtherCostCenters,
    protectedUsers: options.protectedUsers,
  });
  const results = await executor.execute(targets);

  if (config.costCenters.createBudgets) {
    if (options.apply) {
      const budgets = await ensureBudgets(providers.budgets, materialized.resolved);
      console.log(
        `Budgets: ${budgets[BudgetOutcome.Created].length} created, ${budgets[BudgetOutcome.Exists].length} already present, ${budgets[BudgetOutcome.Failed].length} failed`
      );
    } else {
      console.log(`Would ensure budgets for ${materialized.resolved.size + materialized.pendingCreation.length} cost centers`);
    }
  }

  printSyncSummary(options.apply, results, materialized, options.conflicts || 0);
  return { materialized, results, totals: summarizeSyncResults(results) };
}

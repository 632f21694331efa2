//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import _ from 'lodash';

import { ErrorHelper } from '../../lib/transitional.js';
import type { CostCenterMembership, ICostCenterRegistry } from './types.js';

const debug = Debug.debug('costcenters');

// The billing API accepts up to 50 users per add or remove call
export const COST_CENTER_BATCH_SIZE = 50;

export type CostCenterTarget = {
  name: string;
  // absent while the cost center awaits creation
  id?: string;
  desired: string[];
  // full sync leaves current members in place, such as when a team mapped here could not be fetched
  retainMembers?: boolean;
};

export interface ISyncExecutorOptions {
  apply: boolean;
  fullSync: boolean;
  skipUsersInOtherCostCenters: boolean;
  protectedUsers?: string[];
  batchSize?: number;
}

export type SkippedUser = {
  username: string;
  costCenter: string;
};

export type CostCenterSyncResult = {
  name: string;
  id?: string;
  added: string[];
  addFailed: string[];
  removed: string[];
  removeFailed: string[];
  skippedElsewhere: SkippedUser[];
  protectedUsers: string[];
  unchanged: number;
  // what an apply run would do; filled in plan runs
  plannedAdds: string[];
  plannedRemovals: string[];
  removalDeferred: boolean;
  errors: string[];
};

export type SyncTotals = {
  addedSuccess: number;
  addedFailure: number;
  removedSuccess: number;
  removedFailure: number;
  skippedElsewhere: number;
  protectedUsers: number;
  plannedAdds: number;
  plannedRemovals: number;
};

type TargetState = {
  target: CostCenterTarget;
  result: CostCenterSyncResult;
  current?: Set<string>;
};

function createResult(target: CostCenterTarget): CostCenterSyncResult {
  return {
    name: target.name,
    id: target.id,
    added: [],
    addFailed: [],
    removed: [],
    removeFailed: [],
    skippedElsewhere: [],
    protectedUsers: [],
    unchanged: 0,
    plannedAdds: [],
    plannedRemovals: [],
    removalDeferred: false,
    errors: [],
  };
}

function rethrowIfFatal(error: unknown) {
  if (ErrorHelper.IsFatalRemote(error)) {
    throw error;
  }
}

export class SyncExecutor {
  private readonly batchSize: number;
  private readonly protectedUsers: Set<string>;
  // the cost center each user was removed from (or, in plan runs, is due to leave)
  private readonly released = new Map<string, string>();

  constructor(
    private readonly registry: ICostCenterRegistry,
    private readonly options: ISyncExecutorOptions
  ) {
    this.batchSize = options.batchSize || COST_CENTER_BATCH_SIZE;
    this.protectedUsers = new Set((options.protectedUsers || []).map((username) => username.toLowerCase()));
  }

  // Removals for every cost center run before any additions, so that a user
  // moving between two cost centers is free to join the new one.
  async execute(targets: CostCenterTarget[]): Promise<CostCenterSyncResult[]> {
    const states: TargetState[] = [];
    for (const target of targets) {
      const state: TargetState = { target, result: createResult(target) };
      states.push(state);
      if (!target.id) {
        state.result.plannedAdds = Array.from(new Set(target.desired));
        state.result.removalDeferred = this.options.fullSync;
        continue;
      }
      try {
        state.current = new Set(await this.registry.listMembers(target.id));
      } catch (error) {
        rethrowIfFatal(error);
        const message = `Failed to list members of cost center '${target.name}': ${ErrorHelper.GetMessage(error)}`;
        console.error(message);
        state.result.errors.push(message);
      }
    }
    if (this.options.fullSync) {
      for (const state of states) {
        await this.removalPhase(state);
      }
    }
    for (const state of states) {
      await this.additionPhase(state);
    }
    return states.map((state) => state.result);
  }

  private async removalPhase(state: TargetState) {
    const { target, result, current } = state;
    if (!target.id || !current) {
      return;
    }
    if (target.retainMembers) {
      debug(`Not removing members from '${target.name}'`);
      return;
    }
    const desired = new Set(target.desired);
    const orphans: string[] = [];
    for (const username of current) {
      if (desired.has(username)) {
        continue;
      }
      if (this.protectedUsers.has(username.toLowerCase())) {
        result.protectedUsers.push(username);
        continue;
      }
      orphans.push(username);
    }
    if (result.protectedUsers.length > 0) {
      console.log(
        `Keeping ${result.protectedUsers.length} protected user(s) in '${target.name}': ${result.protectedUsers.join(', ')}`
      );
    }
    if (orphans.length === 0) {
      return;
    }
    if (!this.options.apply) {
      result.plannedRemovals = orphans;
      this.release(target.id, orphans);
      return;
    }
    console.warn(`Found ${orphans.length} users in '${target.name}' who are no longer expected there`);
    for (const batch of _.chunk(orphans, this.batchSize)) {
      try {
        await this.registry.removeMembers(target.id, batch);
        for (const username of batch) {
          console.log(`  removed ${username} from '${target.name}'`);
        }
        result.removed.push(...batch);
        this.release(target.id, batch);
      } catch (error) {
        rethrowIfFatal(error);
        const message = ErrorHelper.GetMessage(error);
        for (const username of batch) {
          console.error(`  failed to remove ${username} from '${target.name}': ${message}`);
        }
        result.removeFailed.push(...batch);
        result.errors.push(message);
      }
    }
    console.log(`Found ${orphans.length} orphaned users in '${target.name}', successfully removed ${result.removed.length}`);
  }

  // Without a member listing every desired user is added; adding a member is idempotent
  private async additionPhase(state: TargetState) {
    const { target, result } = state;
    if (!target.id) {
      return;
    }
    const current = state.current || new Set<string>();
    const toAdd: string[] = [];
    for (const username of new Set(target.desired)) {
      if (current.has(username)) {
        ++result.unchanged;
      } else {
        toAdd.push(username);
      }
    }
    const additions = this.options.skipUsersInOtherCostCenters
      ? await this.withoutUsersElsewhere(target.id, toAdd, result)
      : toAdd;
    if (!this.options.apply) {
      result.plannedAdds = additions;
      return;
    }
    for (const batch of _.chunk(additions, this.batchSize)) {
      try {
        await this.registry.addMembers(target.id, batch);
        debug(`Added ${batch.length} users to '${target.name}'`);
        result.added.push(...batch);
      } catch (error) {
        rethrowIfFatal(error);
        const message = ErrorHelper.GetMessage(error);
        console.error(`Failed to add ${batch.length} users to '${target.name}': ${message}`);
        result.addFailed.push(...batch);
        result.errors.push(message);
      }
    }
    if (additions.length > 0) {
      console.log(`Added ${result.added.length} of ${additions.length} users to '${target.name}'`);
    }
  }

  private release(costCenterId: string, usernames: string[]) {
    for (const username of usernames) {
      this.released.set(username, costCenterId);
    }
  }

  private async withoutUsersElsewhere(costCenterId: string, usernames: string[], result: CostCenterSyncResult) {
    const remaining: string[] = [];
    for (const username of usernames) {
      let membership: CostCenterMembership | undefined;
      try {
        membership = await this.registry.getUserCostCenter(username);
      } catch (error) {
        rethrowIfFatal(error);
        debug(`Could not check the current cost center of ${username}: ${ErrorHelper.GetMessage(error)}`);
      }
      if (membership && membership.id !== costCenterId && this.released.get(username) !== membership.id) {
        const costCenter = membership.name || membership.id;
        console.log(`Skipping ${username}, already in cost center '${costCenter}' (use --force-reassign to move)`);
        result.skippedElsewhere.push({ username, costCenter });
      } else {
        remaining.push(username);
      }
    }
    return remaining;
  }
}

export function summarizeSyncResults(results: CostCenterSyncResult[]): SyncTotals {
  const totals: SyncTotals = {
    addedSuccess: 0,
    addedFailure: 0,
    removedSuccess: 0,
    removedFailure: 0,
    skippedElsewhere: 0,
    protectedUsers: 0,
    plannedAdds: 0,
    plannedRemovals: 0,
  };
  for (const result of results) {
    totals.addedSuccess += result.added.length;
    totals.addedFailure += result.addFailed.length;
    totals.removedSuccess += result.removed.length;
    totals.removedFailure += result.removeFailed.length;
    totals.skippedElsewhere += result.skippedElsewhere.length;
    totals.protectedUsers += result.protectedUsers.length;
    totals.plannedAdds += result.plannedAdds.length;
    totals.plannedRemovals += result.plannedRemovals.length;
  }
  return totals;
}

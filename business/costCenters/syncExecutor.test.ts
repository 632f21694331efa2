//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CreateError } from '../../lib/transitional.js';
import { FakeCostCenterRegistry } from '../../test/fakeGitHub.js';
import { summarizeSyncResults, SyncExecutor, type ISyncExecutorOptions } from './syncExecutor.js';

const applyFullSync: ISyncExecutorOptions = {
  apply: true,
  fullSync: true,
  skipUsersInOtherCostCenters: false,
};

function users(count: number) {
  return Array.from({ length: count }, (_, index) => `user-${index}`);
}

describe('SyncExecutor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('converges a cost center to the desired members and then does nothing', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering', ['a', 'b', 'c']);
    const [result] = await new SyncExecutor(registry, applyFullSync).execute([
      { name: 'Engineering', id, desired: ['a', 'd'] },
    ]);
    expect(result.removed).toEqual(['b', 'c']);
    expect(result.added).toEqual(['d']);
    expect(result.unchanged).toEqual(1);
    expect(registry.usersOf(id)).toEqual(['a', 'd']);
    expect(console.log).toHaveBeenCalledWith("Found 2 orphaned users in 'Engineering', successfully removed 2");

    const mutations = registry.mutatingCalls().length;
    const [again] = await new SyncExecutor(registry, applyFullSync).execute([
      { name: 'Engineering', id, desired: ['a', 'd'] },
    ]);
    expect(registry.mutatingCalls().length).toEqual(mutations);
    expect(again.unchanged).toEqual(2);
  });

  it('plans the same changes without calling any mutating endpoint', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering', ['a', 'b', 'c']);
    const [result] = await new SyncExecutor(registry, { ...applyFullSync, apply: false }).execute([
      { name: 'Engineering', id, desired: ['a', 'd'] },
    ]);
    expect(result.plannedRemovals).toEqual(['b', 'c']);
    expect(result.plannedAdds).toEqual(['d']);
    expect(result.added).toEqual([]);
    expect(result.removed).toEqual([]);
    expect(registry.mutatingCalls()).toEqual([]);
    expect(registry.usersOf(id)).toEqual(['a', 'b', 'c']);
  });

  it('leaves extra members alone without full sync', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering', ['a', 'b']);
    const [result] = await new SyncExecutor(registry, { ...applyFullSync, fullSync: false }).execute([
      { name: 'Engineering', id, desired: ['a', 'd'] },
    ]);
    expect(result.removed).toEqual([]);
    expect(registry.usersOf(id)).toEqual(['a', 'b', 'd']);
  });

  it('skips users already in another cost center unless reassignment is forced', async () => {
    const registry = new FakeCostCenterRegistry();
    const other = registry.seed('Other', ['d']);
    const engineering = registry.seed('Engineering');
    const targets = [{ name: 'Engineering', id: engineering, desired: ['d', 'e'] }];

    const [skipped] = await new SyncExecutor(registry, {
      ...applyFullSync,
      fullSync: false,
      skipUsersInOtherCostCenters: true,
    }).execute(targets);
    expect(skipped.skippedElsewhere).toEqual([{ username: 'd', costCenter: 'Other' }]);
    expect(skipped.added).toEqual(['e']);

    const [forced] = await new SyncExecutor(registry, { ...applyFullSync, fullSync: false }).execute(targets);
    expect(forced.added).toEqual(['d']);
    expect(registry.usersOf(other)).toEqual([]);
    expect(registry.usersOf(engineering)).toEqual(['d', 'e']);
  });

  it('does not treat a user leaving one synced cost center for another as taken', async () => {
    const registry = new FakeCostCenterRegistry();
    const mobile = registry.seed('Team: Mobile', ['u']);
    const frontend = registry.seed('Team: Frontend');
    const targets = [
      { name: 'Team: Mobile', id: mobile, desired: [] },
      { name: 'Team: Frontend', id: frontend, desired: ['u'] },
    ];
    const options = { ...applyFullSync, skipUsersInOtherCostCenters: true };

    const planned = await new SyncExecutor(registry, { ...options, apply: false }).execute(targets);
    expect(planned[0].plannedRemovals).toEqual(['u']);
    expect(planned[1].plannedAdds).toEqual(['u']);
    expect(planned[1].skippedElsewhere).toEqual([]);

    const applied = await new SyncExecutor(registry, options).execute(targets);
    expect(applied[0].removed).toEqual(['u']);
    expect(applied[1].added).toEqual(['u']);
    expect(registry.usersOf(frontend)).toEqual(['u']);
  });

  it('adds every desired user when the current members cannot be listed', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering');
    registry.failWhen('listMembers', () => CreateError.ServerError('timeout'));
    const [result] = await new SyncExecutor(registry, applyFullSync).execute([
      { name: 'Engineering', id, desired: ['a', 'b'] },
    ]);
    expect(result.added).toEqual(['a', 'b']);
    expect(result.removed).toEqual([]);
    expect(result.errors).toEqual(["Failed to list members of cost center 'Engineering': timeout"]);
    expect(summarizeSyncResults([result]).addedSuccess).toEqual(2);
    expect(registry.usersOf(id)).toEqual(['a', 'b']);
  });

  it('leaves current members in place for a cost center marked to retain them', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering', ['a', 'b']);
    const [result] = await new SyncExecutor(registry, applyFullSync).execute([
      { name: 'Engineering', id, desired: ['a', 'c'], retainMembers: true },
    ]);
    expect(result.removed).toEqual([]);
    expect(result.added).toEqual(['c']);
    expect(registry.usersOf(id)).toEqual(['a', 'b', 'c']);
  });

  it('adds users in batches of fifty', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering');
    await new SyncExecutor(registry, applyFullSync).execute([{ name: 'Engineering', id, desired: users(120) }]);
    expect(registry.callsTo('addMembers').map((call) => call.values?.length)).toEqual([50, 50, 20]);
  });

  it('counts a failed batch and continues', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering');
    registry.failWhen('addMembers', (_, values) =>
      values && values.includes('user-55') ? CreateError.ServerError('unavailable') : undefined
    );
    const [result] = await new SyncExecutor(registry, applyFullSync).execute([
      { name: 'Engineering', id, desired: users(60) },
    ]);
    expect(result.added.length).toEqual(50);
    expect(result.addFailed).toEqual(users(60).slice(50));
    expect(result.errors).toEqual(['unavailable']);
  });

  it('stops on rejected credentials', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering', ['old']);
    registry.failWhen('removeMembers', () => CreateError.NotAuthorized('Must have admin rights'));
    await expect(
      new SyncExecutor(registry, applyFullSync).execute([{ name: 'Engineering', id, desired: [] }])
    ).rejects.toThrow('Must have admin rights');
  });

  it('never removes protected users', async () => {
    const registry = new FakeCostCenterRegistry();
    const id = registry.seed('Engineering', ['a', 'Admin-Bot']);
    const [result] = await new SyncExecutor(registry, { ...applyFullSync, protectedUsers: ['admin-bot'] }).execute([
      { name: 'Engineering', id, desired: ['a'] },
    ]);
    expect(result.protectedUsers).toEqual(['Admin-Bot']);
    expect(result.removed).toEqual([]);
    expect(registry.usersOf(id)).toEqual(['Admin-Bot', 'a']);
  });

  it('plans every member of a cost center that is not created yet', async () => {
    const registry = new FakeCostCenterRegistry();
    const [result] = await new SyncExecutor(registry, { ...applyFullSync, apply: false }).execute([
      { name: 'Team: New', desired: ['x', 'y', 'x'] },
    ]);
    expect(result.plannedAdds).toEqual(['x', 'y']);
    expect(result.removalDeferred).toBe(true);
    expect(registry.calls).toEqual([]);
  });

  it('totals results across cost centers', async () => {
    const registry = new FakeCostCenterRegistry();
    const first = registry.seed('First', ['gone']);
    const second = registry.seed('Second');
    const results = await new SyncExecutor(registry, applyFullSync).execute([
      { name: 'First', id: first, desired: ['a'] },
      { name: 'Second', id: second, desired: ['b', 'c'] },
    ]);
    expect(summarizeSyncResults(results)).toEqual({
      addedSuccess: 3,
      addedFailure: 0,
      removedSuccess: 1,
      removedFailure: 0,
      skippedElsewhere: 0,
      protectedUsers: 0,
      plannedAdds: 0,
      plannedRemovals: 0,
    });
  });
});

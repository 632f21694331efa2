//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createGitHubClient } from '../lib/github/index.js';
import { createFakeFetch, type FakeRoute } from '../test/fakeFetch.js';
import { BudgetOutcome } from './costCenters/types.js';
import GitHubEnterpriseBilling, { extractExistingCostCenterId } from './enterpriseBilling.js';

const COST_CENTERS = '/enterprises/acme-corp/settings/billing/cost-centers';
const BUDGETS = '/enterprises/acme-corp/settings/billing/budgets';
const EXISTING_ID = '0a1b2c3d-0000-4000-8000-00000000abcd';

function createBilling(routes: FakeRoute[]) {
  const { fetch, requests } = createFakeFetch(routes);
  const octokit = createGitHubClient({ token: 'test-secret', fetch, retries: 0 });
  return { billing: new GitHubEnterpriseBilling(octokit, 'acme-corp'), requests };
}

describe('GitHubEnterpriseBilling', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires an enterprise', () => {
    const octokit = createGitHubClient({ token: 'test-secret' });
    expect(() => new GitHubEnterpriseBilling(octokit, '')).toThrow('github.enterprise required');
  });

  it('finds active cost centers by name with a single listing', async () => {
    const { billing, requests } = createBilling([
      {
        method: 'GET',
        path: COST_CENTERS,
        body: {
          costCenters: [
            { id: 'id-engineering', name: 'Engineering', state: 'Active' },
            { id: 'id-legacy', name: 'Legacy', state: 'deleted' },
          ],
        },
      },
    ]);
    expect(await billing.findByName('Engineering')).toEqual('id-engineering');
    expect(await billing.findByName('Legacy')).toBeUndefined();
    expect(requests.length).toEqual(1);
  });

  it('uses the identifier of an existing cost center when creation conflicts', async () => {
    const { billing } = createBilling([
      { method: 'GET', path: COST_CENTERS, body: { costCenters: [] } },
      {
        method: 'POST',
        path: COST_CENTERS,
        status: 409,
        body: { message: `A cost center with this name already exists, existing cost center UUID: ${EXISTING_ID}` },
      },
    ]);
    expect(await billing.create('Engineering')).toEqual(EXISTING_ID);
    expect(await billing.findByName('Engineering')).toEqual(EXISTING_ID);
  });

  it('falls back to a lookup when the conflict carries no identifier', async () => {
    const { billing } = createBilling([
      { method: 'GET', path: COST_CENTERS, body: { costCenters: [{ id: 'id-1', name: 'Engineering', state: 'active' }] } },
      { method: 'POST', path: COST_CENTERS, status: 409, body: { message: 'Name already taken' } },
    ]);
    expect(await billing.create('Engineering')).toEqual('id-1');
  });

  it('returns the identifier of a new cost center', async () => {
    const { billing, requests } = createBilling([
      { method: 'POST', path: COST_CENTERS, body: { id: 'id-new', name: 'Engineering' } },
      { method: 'GET', path: COST_CENTERS, body: { costCenters: [] } },
    ]);
    expect(await billing.create('Engineering')).toEqual('id-new');
    expect(requests[0].body).toEqual({ name: 'Engineering' });
  });

  it('lists only users as members', async () => {
    const { billing } = createBilling([
      {
        method: 'GET',
        path: `${COST_CENTERS}/id-1`,
        body: {
          id: 'id-1',
          name: 'Engineering',
          resources: [
            { type: 'User', name: 'alice' },
            { type: 'Repository', name: 'acme/web' },
            { type: 'User', name: 'bob' },
          ],
        },
      },
    ]);
    expect(await billing.listMembers('id-1')).toEqual(['alice', 'bob']);
  });

  it('adds and removes users and repositories through the resource endpoint', async () => {
    const { billing, requests } = createBilling([
      { method: 'POST', path: `${COST_CENTERS}/id-1/resource`, body: { message: 'ok' } },
      { method: 'DELETE', path: `${COST_CENTERS}/id-1/resource`, body: { message: 'ok' } },
    ]);
    await billing.addMembers('id-1', ['alice', 'bob']);
    await billing.removeMembers('id-1', ['carol']);
    await billing.addRepositories('id-1', ['acme/web']);
    expect(requests.map(({ method, body }) => ({ method, body }))).toEqual([
      { method: 'POST', body: { users: ['alice', 'bob'] } },
      { method: 'DELETE', body: { users: ['carol'] } },
      { method: 'POST', body: { repositories: ['acme/web'] } },
    ]);
  });

  it('looks up the current cost center of a user', async () => {
    const { billing, requests } = createBilling([
      {
        method: 'GET',
        path: `${COST_CENTERS}/memberships`,
        body: { memberships: [{ cost_center: { id: 'id-2', name: 'Operations' } }] },
      },
    ]);
    expect(await billing.getUserCostCenter('alice')).toEqual({ id: 'id-2', name: 'Operations' });
    expect(requests[0].search).toEqual('?resource_type=user&name=alice');
  });

  it('treats a missing membership as no cost center', async () => {
    const { billing } = createBilling([]);
    expect(await billing.getUserCostCenter('alice')).toBeUndefined();
  });

  it('creates a zero budget for a cost center without one', async () => {
    const { billing, requests } = createBilling([
      { method: 'GET', path: BUDGETS, body: { budgets: [{ budget_scope: 'enterprise', budget_entity_name: 'acme-corp' }] } },
      { method: 'POST', path: BUDGETS, body: {} },
    ]);
    expect(await billing.ensureBudget('id-1', 'Engineering')).toEqual(BudgetOutcome.Created);
    expect(requests[1].body).toEqual({
      budget_type: 'SkuPricing',
      budget_product_sku: 'copilot_premium_request',
      budget_scope: 'cost_center',
      budget_amount: 0,
      prevent_further_usage: true,
      budget_entity_name: 'id-1',
      budget_alerting: { will_alert: false, alert_recipients: [] },
    });
  });

  it('recognizes an existing budget', async () => {
    const { billing } = createBilling([
      { method: 'GET', path: BUDGETS, body: { budgets: [{ budget_scope: 'cost_center', budget_entity_name: 'Engineering' }] } },
    ]);
    expect(await billing.ensureBudget('id-1', 'Engineering')).toEqual(BudgetOutcome.Exists);
  });

  it('stops asking once budgets are unavailable', async () => {
    const { billing, requests } = createBilling([]);
    expect(await billing.ensureBudget('id-1', 'Engineering')).toEqual(BudgetOutcome.Unavailable);
    expect(await billing.ensureBudget('id-2', 'Operations')).toEqual(BudgetOutcome.Unavailable);
    expect(requests.length).toEqual(1);
  });

  it('extracts an identifier from the response data', () => {
    const error = { status: 409, message: 'Conflict', response: { data: { message: `existing cost center UUID: ${EXISTING_ID}` } } };
    expect(extractExistingCostCenterId(error)).toEqual(EXISTING_ID);
    expect(extractExistingCostCenterId(new Error('Conflict'))).toBeUndefined();
  });
});

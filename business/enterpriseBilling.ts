//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { Octokit } from '@octokit/rest';
import Debug from 'debug';
import { z } from 'zod';

import { HttpMethod } from '../lib/github/index.js';
import { parseResponse } from '../lib/github/collections.js';
import { CreateError, ErrorHelper } from '../lib/transitional.js';
import {
  BudgetOutcome,
  type CostCenterMembership,
  type ICostCenterBudgets,
  type ICostCenterRegistry,
} from './costCenters/types.js';

const debug = Debug.debug('costcenters');

const COST_CENTERS_ROUTE = '/enterprises/{enterprise}/settings/billing/cost-centers';
const COST_CENTER_ROUTE = `${COST_CENTERS_ROUTE}/{cost_center_id}`;
const COST_CENTER_RESOURCE_ROUTE = `${COST_CENTER_ROUTE}/resource`;
const COST_CENTER_MEMBERSHIPS_ROUTE = `${COST_CENTERS_ROUTE}/memberships`;
const BUDGETS_ROUTE = '/enterprises/{enterprise}/settings/billing/budgets';

const EXISTING_COST_CENTER_ID = /existing cost center UUID:\s*([a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12})/i;

const GitHubCostCenterResourceSchema = z.object({
  type: z.string(),
  name: z.string(),
});

const GitHubCostCenterSchema = z.object({
  id: z.string(),
  name: z.string(),
  state: z.string().optional(),
  resources: z.array(GitHubCostCenterResourceSchema).optional(),
});

export type GitHubCostCenter = z.infer<typeof GitHubCostCenterSchema>;

const CostCentersResponseSchema = z.object({
  costCenters: z.array(GitHubCostCenterSchema).default([]),
});

const CreatedCostCenterSchema = z.object({
  id: z.string(),
});

const MembershipsResponseSchema = z.object({
  memberships: z
    .array(
      z.object({
        cost_center: z.object({ id: z.string(), name: z.string().optional() }),
      })
    )
    .default([]),
});

const BudgetsResponseSchema = z.object({
  budgets: z
    .array(
      z.object({
        budget_scope: z.string().optional(),
        budget_entity_name: z.string().optional(),
      })
    )
    .default([]),
});

function isActive(costCenter: GitHubCostCenter) {
  return (costCenter.state || '').toLowerCase() === 'active';
}

export function extractExistingCostCenterId(error: unknown): string | undefined {
  const candidates = [ErrorHelper.GetMessage(error)];
  if (error && typeof error === 'object' && 'response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'data' in response) {
      candidates.push(typeof response.data === 'string' ? response.data : JSON.stringify(response.data));
    }
  }
  for (const candidate of candidates) {
    const match = EXISTING_COST_CENTER_ID.exec(candidate);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export default class GitHubEnterpriseBilling implements ICostCenterRegistry, ICostCenterBudgets {
  private _activeCostCenters?: Promise<Map<string, string>>;
  private _budgetsUnavailable = false;

  constructor(
    private readonly octokit: Octokit,
    readonly enterprise: string
  ) {
    if (!enterprise) {
      throw CreateError.ParameterRequired('github.enterprise', 'cost centers belong to an enterprise');
    }
  }

  async getCostCenters(): Promise<GitHubCostCenter[]> {
    const response = await this.octokit.request(`${HttpMethod.Get} ${COST_CENTERS_ROUTE}`, {
      enterprise: this.enterprise,
    });
    const data: unknown = response.data;
    return parseResponse(CostCentersResponseSchema, data, COST_CENTERS_ROUTE).costCenters;
  }

  async getCostCenter(costCenterId: string): Promise<GitHubCostCenter> {
    const response = await this.octokit.request(`${HttpMethod.Get} ${COST_CENTER_ROUTE}`, {
      enterprise: this.enterprise,
      cost_center_id: costCenterId,
    });
    const data: unknown = response.data;
    return parseResponse(GitHubCostCenterSchema, data, COST_CENTER_ROUTE);
  }

  async findByName(name: string): Promise<string | undefined> {
    const active = await this.getActiveCostCenters();
    return active.get(name);
  }

  async create(name: string): Promise<string> {
    let id: string | undefined;
    try {
      const response = await this.octokit.request(`${HttpMethod.Post} ${COST_CENTERS_ROUTE}`, {
        enterprise: this.enterprise,
        name,
      });
      const data: unknown = response.data;
      id = parseResponse(CreatedCostCenterSchema, data, COST_CENTERS_ROUTE).id;
    } catch (error) {
      if (!ErrorHelper.IsConflict(error)) {
        throw error;
      }
      id = extractExistingCostCenterId(error);
      if (!id) {
        this._activeCostCenters = undefined;
        id = await this.findByName(name);
      }
      if (!id) {
        throw CreateError.Conflict(`Cost center '${name}' already exists but its id could not be determined`);
      }
      debug(`Cost center '${name}' already exists with id ${id}`);
    }
    (await this.getActiveCostCenters()).set(name, id);
    return id;
  }

  async listMembers(costCenterId: string): Promise<string[]> {
    const costCenter = await this.getCostCenter(costCenterId);
    return (costCenter.resources || []).filter((resource) => resource.type === 'User').map((resource) => resource.name);
  }

  async addMembers(costCenterId: string, usernames: string[]): Promise<void> {
    await this.changeResources(HttpMethod.Post, costCenterId, { users: usernames });
  }

  async removeMembers(costCenterId: string, usernames: string[]): Promise<void> {
    await this.changeResources(HttpMethod.Delete, costCenterId, { users: usernames });
  }

  async addRepositories(costCenterId: string, repositoryFullNames: string[]): Promise<void> {
    await this.changeResources(HttpMethod.Post, costCenterId, { repositories: repositoryFullNames });
  }

  async getUserCostCenter(username: string): Promise<CostCenterMembership | undefined> {
    try {
      const response = await this.octokit.request(`${HttpMethod.Get} ${COST_CENTER_MEMBERSHIPS_ROUTE}`, {
        enterprise: this.enterprise,
        resource_type: 'user',
        name: username,
      });
      const data: unknown = response.data;
      const [membership] = parseResponse(MembershipsResponseSchema, data, COST_CENTER_MEMBERSHIPS_ROUTE).memberships;
      return membership ? { id: membership.cost_center.id, name: membership.cost_center.name } : undefined;
    } catch (error) {
      if (ErrorHelper.IsNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async ensureBudget(costCenterId: string, costCenterName: string): Promise<BudgetOutcome> {
    if (this._budgetsUnavailable) {
      return BudgetOutcome.Unavailable;
    }
    try {
      if (await this.hasBudget(costCenterId, costCenterName)) {
        debug(`Budget already exists for cost center '${costCenterName}'`);
        return BudgetOutcome.Exists;
      }
      await this.octokit.request(`${HttpMethod.Post} ${BUDGETS_ROUTE}`, {
        enterprise: this.enterprise,
        budget_type: 'SkuPricing',
        budget_product_sku: 'copilot_premium_request',
        budget_scope: 'cost_center',
        budget_amount: 0,
        prevent_further_usage: true,
        budget_entity_name: costCenterId,
        budget_alerting: {
          will_alert: false,
          alert_recipients: [],
        },
      });
      console.log(`Created budget for cost center '${costCenterName}'`);
      return BudgetOutcome.Created;
    } catch (error) {
      if (ErrorHelper.IsNotFound(error)) {
        this._budgetsUnavailable = true;
        return BudgetOutcome.Unavailable;
      }
      if (ErrorHelper.IsFatalRemote(error)) {
        throw error;
      }
      console.error(`Failed to create a budget for cost center '${costCenterName}': ${ErrorHelper.GetMessage(error)}`);
      return BudgetOutcome.Failed;
    }
  }

  // Budgets created with the cost center id are listed under its name
  private async hasBudget(costCenterId: string, costCenterName: string) {
    const response = await this.octokit.request(`${HttpMethod.Get} ${BUDGETS_ROUTE}`, {
      enterprise: this.enterprise,
    });
    const data: unknown = response.data;
    const { budgets } = parseResponse(BudgetsResponseSchema, data, BUDGETS_ROUTE);
    return budgets.some(
      (budget) =>
        budget.budget_scope === 'cost_center' &&
        (budget.budget_entity_name === costCenterName || budget.budget_entity_name === costCenterId)
    );
  }

  private getActiveCostCenters(): Promise<Map<string, string>> {
    if (!this._activeCostCenters) {
      this._activeCostCenters = this.getCostCenters().then((costCenters) => {
        const active = new Map<string, string>();
        for (const costCenter of costCenters.filter(isActive)) {
          active.set(costCenter.name, costCenter.id);
        }
        debug(`Found ${active.size} active cost centers out of ${costCenters.length}`);
        return active;
      });
      this._activeCostCenters.catch(() => {
        this._activeCostCenters = undefined;
      });
    }
    return this._activeCostCenters;
  }

  private async changeResources(
    method: HttpMethod.Post | HttpMethod.Delete,
    costCenterId: string,
    resources: { users: string[] } | { repositories: string[] }
  ) {
    await this.octokit.request(`${method} ${COST_CENTER_RESOURCE_ROUTE}`, {
      enterprise: this.enterprise,
      cost_center_id: costCenterId,
      ...resources,
    });
  }
}

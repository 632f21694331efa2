//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import _ from 'lodash';

import type { ConfigRepositoryMapping } from '../../config/repository.types.js';
import { ErrorHelper } from '../../lib/transitional.js';
import type { CostCenterMaterializer } from './materializer.js';
import { COST_CENTER_BATCH_SIZE } from './syncExecutor.js';
import type { ICostCenterRegistry, IRepositoryPropertyListing, RepositoryCustomProperties } from './types.js';

const debug = Debug.debug('costcenters');

const REPOSITORY_DISPLAY_LIMIT = 10;

export type RepositoryMappingResult = {
  costCenter: string;
  costCenterId?: string;
  propertyName: string;
  propertyValues: string[];
  matched: string[];
  assigned: number;
  success: boolean;
  message: string;
};

export type RepositoryAssignmentSummary = {
  organization: string;
  repositoriesFound: number;
  mappingsProcessed: number;
  results: RepositoryMappingResult[];
};

export interface IRepositoryAssignmentOptions {
  apply: boolean;
  batchSize?: number;
}

// Multi-select values match when any selected value matches
export function findMatchingRepositories(
  repositories: RepositoryCustomProperties[],
  propertyName: string,
  propertyValues: string[]
): string[] {
  const acceptable = new Set(propertyValues);
  const matching: string[] = [];
  for (const repository of repositories) {
    const value = repository.properties[propertyName];
    const values = Array.isArray(value) ? value : value === null || value === undefined ? [] : [value];
    if (values.some((entry) => acceptable.has(entry))) {
      debug(`Repository ${repository.repositoryFullName} matched ${propertyName}=${values.join(',')}`);
      matching.push(repository.repositoryFullName);
    }
  }
  return matching;
}

export class RepositoryAssignments {
  constructor(
    private readonly properties: IRepositoryPropertyListing,
    private readonly registry: ICostCenterRegistry,
    private readonly materializer: CostCenterMaterializer,
    private readonly options: IRepositoryAssignmentOptions
  ) {}

  async run(organization: string, mappings: ConfigRepositoryMapping[]): Promise<RepositoryAssignmentSummary> {
    const repositories = await this.properties.listRepositoryProperties(organization);
    console.log(`Found ${repositories.length} repositories with custom properties in ${organization}`);
    const summary: RepositoryAssignmentSummary = {
      organization,
      repositoriesFound: repositories.length,
      mappingsProcessed: 0,
      results: [],
    };
    for (const mapping of mappings) {
      summary.results.push(await this.processMapping(repositories, mapping));
      ++summary.mappingsProcessed;
    }
    return summary;
  }

  private async processMapping(
    repositories: RepositoryCustomProperties[],
    mapping: ConfigRepositoryMapping
  ): Promise<RepositoryMappingResult> {
    const { costCenter, propertyName, propertyValues } = mapping;
    const result: RepositoryMappingResult = {
      costCenter,
      propertyName,
      propertyValues,
      matched: findMatchingRepositories(repositories, propertyName, propertyValues),
      assigned: 0,
      success: false,
      message: '',
    };
    if (result.matched.length === 0) {
      console.warn(`No repositories have ${propertyName} set to one of: ${propertyValues.join(', ')}`);
      result.message = 'No matching repositories found';
      return result;
    }
    console.log(`Cost center '${costCenter}': ${result.matched.length} matching repositories`);
    for (const name of result.matched.slice(0, REPOSITORY_DISPLAY_LIMIT)) {
      console.log(`  - ${name}`);
    }
    if (result.matched.length > REPOSITORY_DISPLAY_LIMIT) {
      console.log(`  ... and ${result.matched.length - REPOSITORY_DISPLAY_LIMIT} more`);
    }

    const materialized = await this.materializer.materialize([costCenter]);
    const id = materialized.resolved.get(costCenter);
    if (!id) {
      result.message = materialized.pendingCreation.includes(costCenter)
        ? `Would create the cost center and assign ${result.matched.length} repositories`
        : 'The cost center could not be resolved';
      result.success = !this.options.apply && materialized.pendingCreation.includes(costCenter);
      return result;
    }
    result.costCenterId = id;
    if (!this.options.apply) {
      result.success = true;
      result.message = `Would assign ${result.matched.length} repositories`;
      return result;
    }
    const failures: string[] = [];
    for (const batch of _.chunk(result.matched, this.options.batchSize || COST_CENTER_BATCH_SIZE)) {
      try {
        await this.registry.addRepositories(id, batch);
        result.assigned += batch.length;
      } catch (error) {
        if (ErrorHelper.IsFatalRemote(error)) {
          throw error;
        }
        failures.push(ErrorHelper.GetMessage(error));
        console.error(`Failed to assign ${batch.length} repositories to '${costCenter}': ${ErrorHelper.GetMessage(error)}`);
      }
    }
    result.success = result.assigned > 0;
    result.message =
      failures.length > 0
        ? `Assigned ${result.assigned}/${result.matched.length} repositories: ${failures.join('; ')}`
        : `Successfully assigned ${result.assigned}/${result.matched.length} repositories`;
    return result;
  }
}

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { CostCenterMaterializer } from '../../business/costCenters/materializer.js';
import {
  RepositoryAssignments,
  type RepositoryAssignmentSummary,
} from '../../business/costCenters/repositoryAssignments.js';
import { CreateError } from '../../lib/transitional.js';
import { SyncExecutionMode } from './options.js';
import type { ISyncModeHandler } from './types.js';

export function printRepositorySummary(summary: RepositoryAssignmentSummary) {
  console.log('\n=== Repository Assignment Summary ===');
  console.log(`Organization: ${summary.organization}`);
  console.log(`Repositories with custom properties: ${summary.repositoriesFound}`);
  console.log(`Mappings processed: ${summary.mappingsProcessed}`);
  for (const result of summary.results) {
    console.log(`${result.success ? 'ok  ' : 'fail'} ${result.costCenter}: ${result.message}`);
  }
}

export const repositoryMode: ISyncModeHandler = {
  name: 'repository',

  validate(config, options) {
    if (!config.repository.organization) {
      throw CreateError.ParameterRequired(
        'repository.organization',
        'set REPOSITORY_ORGANIZATION or the repository configuration'
      );
    }
    if (config.repository.explicitMappings.length === 0) {
      throw CreateError.InvalidParameters(
        'Repository mode needs at least one entry in repository.explicitMappings (costCenter, propertyName, propertyValues)'
      );
    }
    if (options.users.length > 0 || options.incremental) {
      console.warn('--users and --incremental apply to Copilot seats and are ignored in repository mode');
    }
  },

  describe(config) {
    return `assign repositories of ${config.repository.organization} to ${config.repository.explicitMappings.length} cost center mapping(s)`;
  },

  async run(providers, options) {
    const { config } = providers;
    const organization = config.repository.organization;
    if (!organization) {
      throw CreateError.ParameterRequired('repository.organization');
    }
    const apply = options.mode === SyncExecutionMode.Apply;
    // repository mode always creates missing cost centers
    const materializer = new CostCenterMaterializer(providers.registry, providers.cache, { autoCreate: true, apply });
    const assignments = new RepositoryAssignments(providers.properties, providers.registry, materializer, { apply });
    const summary = await assignments.run(organization, config.repository.explicitMappings);
    printRepositorySummary(summary);
    if (options.export !== undefined) {
      console.warn('Export covers user assignments and is skipped in repository mode');
    }
    return {
      rows: [],
      successProperties: {
        repositories: summary.repositoriesFound,
        mappings: summary.mappingsProcessed,
        assigned: summary.results.reduce((total, result) => total + result.assigned, 0),
        failedMappings: summary.results.filter((result) => !result.success).length,
      },
    };
  },
};

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { DateTime } from 'luxon';

import GitHubEnterpriseBilling from '../../business/enterpriseBilling.js';
import { EnterpriseCopilot } from '../../business/enterpriseCopilot.js';
import { OrganizationProperties } from '../../business/organizationProperties.js';
import { GitHubTeams } from '../../business/teams.js';
import type { SyncConfiguration } from '../../config/index.types.js';
import type { IProviders } from '../../interfaces/index.js';
import { FileCostCenterCache, type CacheClock, type ICostCenterCache } from '../../lib/caching/index.js';
import { createGitHubClient } from '../../lib/github/index.js';
import { CreateError } from '../../lib/transitional.js';

export type OpenCache = (config: SyncConfiguration, clock: CacheClock) => Promise<ICostCenterCache>;
export type CreateProviders = (config: SyncConfiguration, cache: ICostCenterCache, clock: CacheClock) => IProviders;

export const systemClock: CacheClock = () => DateTime.utc();

export const openFileCache: OpenCache = (config, clock) => {
  return FileCostCenterCache.load({ file: config.cache.file, ttlHours: config.cache.ttlHours, clock });
};

export const createGitHubProviders: CreateProviders = (config, cache, clock) => {
  const { github } = config;
  const enterprise = github.enterprise;
  if (!enterprise) {
    throw CreateError.ParameterRequired('github.enterprise', 'set the GITHUB_ENTERPRISE environment variable');
  }
  const octokit = createGitHubClient({ token: github.token, baseUrl: github.baseUrl, retries: github.retries });
  const billing = new GitHubEnterpriseBilling(octokit, enterprise);
  return {
    config,
    cache,
    clock,
    teams: new GitHubTeams(octokit, enterprise, github.pageSize),
    registry: billing,
    budgets: billing,
    seats: new EnterpriseCopilot(octokit, enterprise, github.pageSize),
    properties: new OrganizationProperties(octokit, github.pageSize),
  };
};

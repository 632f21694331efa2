//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import type { SyncConfiguration } from '../../config/index.types.js';
import type { ISyncJob, ISyncJobResult } from '../../interfaces/index.js';
import type { CacheClock } from '../../lib/caching/index.js';
import { exportAssignments } from '../../lib/exporter.js';
import { assertUnreachable } from '../../lib/transitional.js';
import { runCacheCommands } from './cache.js';
import { applyCommandLineOverrides, loadSyncConfiguration, printConfiguration } from './configuration.js';
import { confirmOnConsole, type ConfirmApply } from './confirm.js';
import {
  hasActionBeyondShowConfig,
  hasCacheCommand,
  shouldAssign,
  SyncExecutionMode,
  type CommandLineOptions,
} from './options.js';
import { createGitHubProviders, openFileCache, systemClock, type CreateProviders, type OpenCache } from './providers.js';
import { repositoryMode } from './repository.js';
import { teamsMode } from './teams.js';
import type { ISyncModeHandler } from './types.js';
import { exceptionListMode } from './users.js';

const debug = Debug.debug('costcenters');

export type SyncJobParameters = {
  options: CommandLineOptions;
  // loaded from the configuration directory when absent
  configuration?: SyncConfiguration;
  openCache?: OpenCache;
  createProviders?: CreateProviders;
  confirm?: ConfirmApply;
  clock?: CacheClock;
};

export function selectModeHandler(config: SyncConfiguration, options: CommandLineOptions): ISyncModeHandler {
  if (options.teamsMode) {
    return teamsMode;
  }
  const mode = config.costCenters.mode;
  switch (mode) {
    case 'users':
      return exceptionListMode;
    case 'teams':
      return teamsMode;
    case 'repository':
      return repositoryMode;
    default:
      return assertUnreachable(mode);
  }
}

export default async function costCenterSync({ parameters }: ISyncJob<SyncJobParameters>): Promise<ISyncJobResult> {
  const { options } = parameters;
  const clock = parameters.clock || systemClock;
  const loaded = parameters.configuration || (await loadSyncConfiguration(options.config));
  const config = applyCommandLineOverrides(loaded, options);

  if (options.showConfig) {
    printConfiguration(config);
    if (!hasActionBeyondShowConfig(options)) {
      return {};
    }
  }

  const cache = await (parameters.openCache || openFileCache)(config, clock);
  if (hasCacheCommand(options)) {
    await runCacheCommands(cache, options);
  }
  const assign = shouldAssign(options);
  if (!assign && !options.summaryReport) {
    return {};
  }

  const handler = selectModeHandler(config, options);
  debug(`Running the ${handler.name} mode in ${options.mode} mode`);
  handler.validate(config, options);
  const apply = options.mode === SyncExecutionMode.Apply;
  if (apply && assign && !options.yes) {
    const confirmed = await (parameters.confirm || confirmOnConsole)(handler.describe(config, options));
    if (!confirmed) {
      console.warn('Apply cancelled, no changes were made');
      return { successProperties: { cancelled: true } };
    }
  }
  if (!apply && assign) {
    console.log('Plan mode: no changes will be made. Run with --mode apply to make them.');
  }

  const providers = (parameters.createProviders || createGitHubProviders)(config, cache, clock);
  const result = await handler.run(providers, options);

  if (options.export !== undefined && handler.name !== 'repository') {
    const written = await exportAssignments({
      name: handler.name,
      rows: result.rows,
      directory: config.export.directory,
      formats: options.export === true ? config.export.formats : options.export,
      now: clock(),
    });
    for (const file of written) {
      console.log(`Exported ${file}`);
    }
  }
  return { successProperties: result.successProperties };
}

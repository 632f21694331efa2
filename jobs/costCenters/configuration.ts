//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import fs from 'fs';
import path from 'path';

import type { SyncConfiguration } from '../../config/index.types.js';
import { loadConfiguration } from '../../lib/config/index.js';
import { CreateError } from '../../lib/transitional.js';
import type { CommandLineOptions } from './options.js';

const MASKED_VALUE = '********';

// A directory replaces the configuration graph; a file is merged over it
export async function loadSyncConfiguration(configPath?: string): Promise<SyncConfiguration> {
  if (!configPath) {
    return loadConfiguration();
  }
  const resolved = path.resolve(configPath);
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(resolved);
  } catch (error) {
    throw CreateError.InvalidParameters(
      `The configuration path ${resolved} was not found`,
      error instanceof Error ? error : undefined
    );
  }
  if (stats.isDirectory()) {
    return loadConfiguration({ options: { directoryName: resolved, requireConfigurationDirectory: true } });
  }
  return loadConfiguration({ options: { additionalFiles: [resolved] } });
}

export function applyCommandLineOverrides(config: SyncConfiguration, options: CommandLineOptions): SyncConfiguration {
  return {
    ...config,
    costCenters: {
      ...config.costCenters,
      autoCreate: config.costCenters.autoCreate || options.createCostCenters,
      createBudgets: config.costCenters.createBudgets || options.createBudgets,
      skipUsersInOtherCostCenters: config.costCenters.skipUsersInOtherCostCenters && !options.forceReassign,
    },
  };
}

export function maskConfiguration(config: SyncConfiguration): SyncConfiguration {
  return {
    ...config,
    github: {
      ...config.github,
      token: config.github.token ? MASKED_VALUE : undefined,
    },
  };
}

export function printConfiguration(config: SyncConfiguration) {
  console.log('\n=== Configuration ===');
  console.log(JSON.stringify(maskConfiguration(config), null, 2));
}

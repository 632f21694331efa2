//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import dotenv from 'dotenv';
import walkBack from 'walk-back';

import type { IPainlessConfigGet, IProviderOptions } from './index.js';

import { processEnvironmentProvider } from './environmentConfigurationResolver.js';

const debug = Debug.debug('config');

const DOT_ENV_OVERRIDES_PROCESS_ENV_VAR_KEY = 'PREFER_DOTENV';

function preloadDotEnv(dotEnvFilename: string): Record<string, string> {
  const dotenvPath = walkBack(process.cwd(), dotEnvFilename);
  if (dotenvPath) {
    const outcome = dotenv.config({ path: dotenvPath, quiet: true });
    if (outcome.error) {
      throw outcome.error;
    }
    if (outcome.parsed) {
      debug(`Parsed ${Object.keys(outcome.parsed).length} environment variables from ${dotenvPath}`);
      return outcome.parsed;
    }
  }
  return {};
}

async function initialize(options?: IProviderOptions): Promise<IPainlessConfigGet> {
  options = options || {};
  // By capturing the values, we can override without relying on the default dotenv
  // approach and better log the outcomes.
  const envProviderOptions = { overrideValues: {} };
  const baseProvider = options.provider || processEnvironmentProvider(envProviderOptions);
  const provider: IPainlessConfigGet = { providerName: 'process environment', get: baseProvider.get };
  const dotEnvFilename = provider.get('DOTENV_FILENAME') || '.env';
  const dotenvValues = !options.skipDotEnv && !options.provider ? preloadDotEnv(dotEnvFilename) : {};
  if (options.provider) {
    debug(`options.provider was provided: ${options.provider.providerName}. Skipping any .env values.`);
  }

  const preferDotEnvChoice = provider.get(DOT_ENV_OVERRIDES_PROCESS_ENV_VAR_KEY) === '1';
  if (preferDotEnvChoice) {
    // The provider reads the options object lazily, so this takes effect immediately.
    envProviderOptions.overrideValues = dotenvValues;
    debug(
      `The ${DOT_ENV_OVERRIDES_PROCESS_ENV_VAR_KEY} environment variable was set to 1. Preferring .env file over process.env values.`
    );
  }

  return provider;
}

export default initialize;

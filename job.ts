//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import { DateTime } from 'luxon';

import type { ISyncJob, ISyncJobOptions, ISyncJobResult } from './interfaces/index.js';
import { ErrorHelper } from './lib/transitional.js';

const debug = Debug.debug('startup');

export async function runJob<TParameters>(
  job: (job: ISyncJob<TParameters>) => Promise<ISyncJobResult>,
  options: ISyncJobOptions<TParameters>
): Promise<ISyncJobResult | undefined> {
  if (options.defaultDebugOutput) {
    Debug.enable([process.env.DEBUG, options.defaultDebugOutput].filter((value) => value).join(','));
  }
  debug(`starting ${options.name || 'job'}...`);

  const started = DateTime.utc();
  const jobObject: ISyncJob<TParameters> = {
    started,
    parameters: options.parameters,
    args: options.args || process.argv.slice(2),
  };
  let result: ISyncJobResult;
  try {
    result = await job(jobObject);
  } catch (jobError) {
    console.error(`The job failed: ${ErrorHelper.GetMessage(jobError)}`);
    if (jobError instanceof Error && jobError.stack) {
      debug(jobError.stack);
    }
    const status = ErrorHelper.GetStatus(jobError);
    if (status) {
      debug(`status: ${status}`);
    }
    process.exitCode = 1;
    return;
  }
  const elapsed = DateTime.utc().diff(started).as('seconds');
  debug(`${options.name || 'job'} finished in ${elapsed.toFixed(1)}s`);
  if (result.successProperties) {
    debug(JSON.stringify(result.successProperties));
  }
  process.exitCode = 0;
  return result;
}

export default runJob;

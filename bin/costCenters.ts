#!/usr/bin/env node
//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { runJob } from '../job.js';
import { parseCommandLine } from '../jobs/costCenters/options.js';
import costCenterSync from '../jobs/costCenters/task.js';

const options = parseCommandLine(process.argv.slice(2));

await runJob(costCenterSync, {
  name: 'cost center sync',
  defaultDebugOutput: options.verbose ? 'costcenters,costcenters:*,restapi,restapi:*,config,startup' : undefined,
  parameters: { options },
});

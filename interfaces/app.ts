//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { DateTime } from 'luxon';

export interface ISyncJob<TParameters> {
  started: DateTime;
  parameters: TParameters;
  args: string[];
}

export interface ISyncJobResult {
  successProperties?: Record<string, string | number | boolean>;
}

export interface ISyncJobOptions<TParameters> {
  name?: string;
  defaultDebugOutput?: string;
  parameters: TParameters;
  args?: string[];
}

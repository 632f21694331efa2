//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { ConfigRootCache } from './cache.types.js';
import type { ConfigRootCostCenters } from './costCenters.types.js';
import type { ConfigRootExport } from './export.types.js';
import type { ConfigRootGitHub } from './github.types.js';
import type { ConfigRootRepository } from './repository.types.js';
import type { ConfigRootTeams } from './teams.types.js';

// prettier-ignore
export type SyncConfiguration =
  ConfigRootCache &
  ConfigRootCostCenters &
  ConfigRootExport &
  ConfigRootGitHub &
  ConfigRootRepository &
  ConfigRootTeams;

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type {
  ICopilotSeatListing,
  ICostCenterBudgets,
  ICostCenterRegistry,
  IRepositoryPropertyListing,
  ITeamListingService,
} from '../business/costCenters/types.js';
import type { SyncConfiguration } from '../config/index.types.js';
import type { CacheClock, ICostCenterCache } from '../lib/caching/index.js';

// Everything a sync run talks to, so that tests can substitute fakes
export interface IProviders {
  config: SyncConfiguration;
  cache: ICostCenterCache;
  clock: CacheClock;
  teams: ITeamListingService;
  registry: ICostCenterRegistry;
  budgets: ICostCenterBudgets;
  seats: ICopilotSeatListing;
  properties: IRepositoryPropertyListing;
}

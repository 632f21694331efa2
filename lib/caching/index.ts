//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { DateTime } from 'luxon';

export type CacheClock = () => DateTime;

export type CostCenterCacheStatistics = {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  lastUpdated: string | null;
  cacheFile?: string;
  ttlHours: number;
};

// Cost center names to their remote identifiers, valid for a time-to-live
export interface ICostCenterCache {
  get(name: string): Promise<string | undefined>;
  set(name: string, id: string): Promise<void>;
  has(name: string): Promise<boolean>;
  clear(): Promise<void>;
  cleanupExpired(): Promise<number>;
  getStatistics(): CostCenterCacheStatistics;
}

export { MemoryCostCenterCache } from './memoryCostCenterCache.js';
export { FileCostCenterCache } from './fileCostCenterCache.js';

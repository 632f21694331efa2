//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { ICostCenterCache } from '../../lib/caching/index.js';
import type { CommandLineOptions } from './options.js';

export function formatHitRate(validEntries: number, totalEntries: number): string {
  if (totalEntries === 0) {
    return 'n/a';
  }
  return `${((validEntries / totalEntries) * 100).toFixed(1)}%`;
}

export function printCacheStatistics(cache: ICostCenterCache) {
  const statistics = cache.getStatistics();
  console.log('\n=== Cost Center Cache ===');
  if (statistics.cacheFile) {
    console.log(`Cache file: ${statistics.cacheFile}`);
  }
  console.log(`Time-to-live: ${statistics.ttlHours} hours`);
  console.log(`Entries: ${statistics.totalEntries}`);
  console.log(`Valid: ${statistics.validEntries}`);
  console.log(`Expired: ${statistics.expiredEntries}`);
  console.log(`Effective hit rate: ${formatHitRate(statistics.validEntries, statistics.totalEntries)}`);
  console.log(`Last updated: ${statistics.lastUpdated || 'never'}`);
}

// Cleanup and clearing run before statistics so that the numbers reflect them
export async function runCacheCommands(cache: ICostCenterCache, options: CommandLineOptions) {
  if (options.clearCache) {
    const { totalEntries } = cache.getStatistics();
    await cache.clear();
    console.log(`Cleared ${totalEntries} cached cost centers`);
  }
  if (options.cacheCleanup) {
    const removed = await cache.cleanupExpired();
    console.log(`Removed ${removed} expired cache entries`);
  }
  if (options.cacheStats) {
    printCacheStatistics(cache);
  }
}

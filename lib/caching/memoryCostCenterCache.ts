//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import { DateTime } from 'luxon';

import type { CacheClock, CostCenterCacheStatistics, ICostCenterCache } from './index.js';

const debug = Debug.debug('costcenters:cache');

export const DEFAULT_CACHE_TTL_HOURS = 24;

export type CostCenterCacheEntry = {
  id?: string;
  timestamp?: string;
};

export interface ICostCenterCacheOptions {
  ttlHours?: number;
  clock?: CacheClock;
}

export class MemoryCostCenterCache implements ICostCenterCache {
  protected entries = new Map<string, CostCenterCacheEntry>();
  protected lastUpdated: string | null = null;
  protected readonly ttlHours: number;
  protected readonly clock: CacheClock;

  constructor(options?: ICostCenterCacheOptions) {
    this.ttlHours = options?.ttlHours ?? DEFAULT_CACHE_TTL_HOURS;
    this.clock = options?.clock || (() => DateTime.utc());
  }

  async get(name: string): Promise<string | undefined> {
    const entry = this.entries.get(name);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      debug(`Cache entry for '${name}' has expired`);
      return undefined;
    }
    if (entry.id) {
      debug(`Cache hit: '${name}' -> ${entry.id}`);
    }
    return entry.id || undefined;
  }

  async set(name: string, id: string): Promise<void> {
    this.entries.set(name, { id, timestamp: this.now().toISO() || undefined });
    debug(`Cached: '${name}' -> ${id}`);
    await this.save();
  }

  async has(name: string): Promise<boolean> {
    return (await this.get(name)) !== undefined;
  }

  async clear(): Promise<void> {
    this.entries.clear();
    await this.save();
  }

  async cleanupExpired(): Promise<number> {
    const expiredNames = Array.from(this.entries.entries())
      .filter(([, entry]) => this.isExpired(entry))
      .map(([name]) => name);
    for (const name of expiredNames) {
      this.entries.delete(name);
    }
    if (expiredNames.length > 0) {
      await this.save();
      debug(`Cleaned up ${expiredNames.length} expired cache entries`);
    }
    return expiredNames.length;
  }

  getStatistics(): CostCenterCacheStatistics {
    let validEntries = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry)) {
        ++validEntries;
      }
    }
    return {
      totalEntries: this.entries.size,
      validEntries,
      expiredEntries: this.entries.size - validEntries,
      lastUpdated: this.lastUpdated,
      ttlHours: this.ttlHours,
    };
  }

  protected now() {
    return this.clock().toUTC();
  }

  // Entries without a readable timestamp are never trusted
  protected isExpired(entry: CostCenterCacheEntry): boolean {
    if (!entry.timestamp) {
      return true;
    }
    const cachedAt = DateTime.fromISO(entry.timestamp, { zone: 'utc' });
    if (!cachedAt.isValid) {
      return true;
    }
    return cachedAt.plus({ hours: this.ttlHours }).toMillis() <= this.now().toMillis();
  }

  protected async save(): Promise<void> {
    this.lastUpdated = this.now().toISO();
    await this.persist();
  }

  protected async persist(): Promise<void> {
    // in-memory only
  }
}

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import path from 'path';
import { z } from 'zod';

import type { CostCenterCacheStatistics } from './index.js';
import { readFileToText, writeTextToFileAtomically } from '../utils.js';
import {
  MemoryCostCenterCache,
  type CostCenterCacheEntry,
  type ICostCenterCacheOptions,
} from './memoryCostCenterCache.js';

const debug = Debug.debug('costcenters:cache');

const CACHE_FORMAT_VERSION = '1.0';

const CacheFileSchema = z.object({
  version: z.string().optional(),
  last_updated: z.string().nullable().optional(),
  cost_centers: z.record(
    z.string(),
    z.object({
      id: z.string().optional(),
      timestamp: z.string().optional(),
    })
  ),
});

export interface IFileCostCenterCacheOptions extends ICostCenterCacheOptions {
  file: string;
}

export class FileCostCenterCache extends MemoryCostCenterCache {
  readonly file: string;

  private constructor(options: IFileCostCenterCacheOptions) {
    super(options);
    this.file = path.resolve(options.file);
  }

  static async load(options: IFileCostCenterCacheOptions): Promise<FileCostCenterCache> {
    const cache = new FileCostCenterCache(options);
    await cache.read();
    return cache;
  }

  getStatistics(): CostCenterCacheStatistics {
    return { ...super.getStatistics(), cacheFile: this.file };
  }

  protected async persist(): Promise<void> {
    const costCenters: Record<string, CostCenterCacheEntry> = {};
    for (const name of Array.from(this.entries.keys()).sort()) {
      const entry = this.entries.get(name);
      if (entry) {
        costCenters[name] = entry;
      }
    }
    const contents = {
      version: CACHE_FORMAT_VERSION,
      last_updated: this.lastUpdated,
      cost_centers: costCenters,
    };
    await writeTextToFileAtomically(this.file, JSON.stringify(contents, null, 2));
    debug(`Cache saved to ${this.file}`);
  }

  private async read() {
    let raw: string;
    try {
      raw = await readFileToText(this.file);
    } catch (error) {
      debug(`Cache file ${this.file} could not be read, starting with an empty cache: ${error}`);
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (parseError) {
      console.warn(`The cache file ${this.file} is not valid JSON and will be reset: ${parseError}`);
      return;
    }
    const result = CacheFileSchema.safeParse(parsed);
    if (!result.success) {
      console.warn(`The cache file ${this.file} has an invalid format and will be reset`);
      return;
    }
    this.lastUpdated = result.data.last_updated || null;
    for (const [name, entry] of Object.entries(result.data.cost_centers)) {
      this.entries.set(name, entry);
    }
    debug(`Loaded cache with ${this.entries.size} entries`);
  }
}

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import fs from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import { FileCostCenterCache, MemoryCostCenterCache } from './index.js';

function createClock(start: string) {
  let now = DateTime.fromISO(start, { zone: 'utc' });
  return {
    clock: () => now,
    advance: (hours: number) => {
      now = now.plus({ hours });
    },
  };
}

function temporaryCacheFile() {
  const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'cost-center-cache-'));
  return path.join(directory, 'nested', 'cost_centers.json');
}

describe('cost center cache', () => {
  describe('MemoryCostCenterCache', () => {
    it('returns cached identifiers until the time-to-live passes', async () => {
      const { clock, advance } = createClock('2026-03-01T08:00:00Z');
      const cache = new MemoryCostCenterCache({ ttlHours: 24, clock });
      await cache.set('Team: Frontend', 'cc-frontend');
      expect(await cache.get('Team: Frontend')).toEqual('cc-frontend');
      advance(23);
      expect(await cache.has('Team: Frontend')).toBe(true);
      advance(1);
      expect(await cache.get('Team: Frontend')).toBeUndefined();
      expect(await cache.has('Team: Frontend')).toBe(false);
    });

    it('reports statistics and cleans up expired entries', async () => {
      const { clock, advance } = createClock('2026-03-01T08:00:00Z');
      const cache = new MemoryCostCenterCache({ ttlHours: 2, clock });
      await cache.set('old', 'cc-old');
      advance(3);
      await cache.set('new', 'cc-new');
      expect(cache.getStatistics()).toEqual({
        totalEntries: 2,
        validEntries: 1,
        expiredEntries: 1,
        lastUpdated: '2026-03-01T11:00:00.000Z',
        ttlHours: 2,
      });
      expect(await cache.cleanupExpired()).toEqual(1);
      expect(await cache.cleanupExpired()).toEqual(0);
      expect(cache.getStatistics().totalEntries).toEqual(1);
      await cache.clear();
      expect(cache.getStatistics().totalEntries).toEqual(0);
    });
  });

  describe('FileCostCenterCache', () => {
    it('persists entries in the cache file format', async () => {
      const { clock } = createClock('2026-03-01T08:00:00Z');
      const file = temporaryCacheFile();
      const cache = await FileCostCenterCache.load({ file, ttlHours: 24, clock });
      await cache.set('Team: Mobile', 'cc-mobile');
      const contents: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
      expect(contents).toEqual({
        version: '1.0',
        last_updated: '2026-03-01T08:00:00.000Z',
        cost_centers: {
          'Team: Mobile': { id: 'cc-mobile', timestamp: '2026-03-01T08:00:00.000Z' },
        },
      });
      expect(fs.existsSync(`${file}.tmp`)).toBe(false);

      const reloaded = await FileCostCenterCache.load({ file, ttlHours: 24, clock });
      expect(await reloaded.get('Team: Mobile')).toEqual('cc-mobile');
      expect(reloaded.getStatistics().cacheFile).toEqual(file);
    });

    it('treats entries with unreadable timestamps as expired', async () => {
      const { clock } = createClock('2026-03-01T08:00:00Z');
      const file = temporaryCacheFile();
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(
        file,
        JSON.stringify({
          version: '1.0',
          last_updated: null,
          cost_centers: {
            missing: { id: 'cc-1' },
            garbled: { id: 'cc-2', timestamp: 'yesterday' },
            naive: { id: 'cc-3', timestamp: '2026-03-01T07:00:00' },
          },
        })
      );
      const cache = await FileCostCenterCache.load({ file, ttlHours: 24, clock });
      expect(await cache.get('missing')).toBeUndefined();
      expect(await cache.get('garbled')).toBeUndefined();
      expect(await cache.get('naive')).toEqual('cc-3');
      expect(cache.getStatistics().expiredEntries).toEqual(2);
    });

    it('starts empty when the file is malformed', async () => {
      const file = temporaryCacheFile();
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, '{ not json');
      const cache = await FileCostCenterCache.load({ file });
      expect(cache.getStatistics().totalEntries).toEqual(0);
    });
  });
});

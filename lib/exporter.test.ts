//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import fs from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';

import { escapeCsvValue, exportAssignments } from './exporter.js';

const now = DateTime.fromISO('2026-03-01T09:05:07Z', { zone: 'utc' });

function temporaryDirectory() {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'cost-center-export-')), 'exports');
}

describe('exportAssignments', () => {
  it('writes timestamped assignment and summary files', async () => {
    const directory = temporaryDirectory();
    const written = await exportAssignments({
      name: 'teams',
      directory,
      formats: ['csv', 'json'],
      now,
      rows: [
        { username: 'alice', costCenter: 'Team: Mobile', team: 'acme/mobile' },
        { username: 'bob', costCenter: 'Team: Frontend, Web', team: 'acme/frontend' },
        { username: 'carol', costCenter: 'Team: Mobile', team: 'acme/mobile' },
      ],
    });
    expect(written.map((file) => path.basename(file))).toEqual([
      'teams_assignments_20260301_090507.csv',
      'teams_summary_20260301_090507.csv',
      'teams_20260301_090507.json',
    ]);
    expect(fs.readFileSync(written[0], 'utf8')).toEqual(
      'username,cost_center,team\n' +
        'alice,Team: Mobile,acme/mobile\n' +
        'bob,"Team: Frontend, Web",acme/frontend\n' +
        'carol,Team: Mobile,acme/mobile\n'
    );
    expect(fs.readFileSync(written[1], 'utf8')).toEqual(
      'cost_center,users\nTeam: Mobile,2\n"Team: Frontend, Web",1\n'
    );
    expect(JSON.parse(fs.readFileSync(written[2], 'utf8'))).toEqual({
      generated_at: '2026-03-01T09:05:07.000Z',
      assignments: [
        { username: 'alice', cost_center: 'Team: Mobile', team: 'acme/mobile' },
        { username: 'bob', cost_center: 'Team: Frontend, Web', team: 'acme/frontend' },
        { username: 'carol', cost_center: 'Team: Mobile', team: 'acme/mobile' },
      ],
      summary: { 'Team: Mobile': 2, 'Team: Frontend, Web': 1 },
    });
  });

  it('leaves out the team column for seat-based assignments', async () => {
    const directory = temporaryDirectory();
    const [assignments] = await exportAssignments({
      name: 'users',
      directory,
      formats: ['csv'],
      now,
      rows: [{ username: 'alice', costCenter: '00 - No PRU overages' }],
    });
    expect(fs.readFileSync(assignments, 'utf8')).toEqual('username,cost_center\nalice,00 - No PRU overages\n');
  });

  it('quotes values with separators or quotes', () => {
    expect(escapeCsvValue('plain')).toEqual('plain');
    expect(escapeCsvValue('say "hi"')).toEqual('"say ""hi"""');
  });
});

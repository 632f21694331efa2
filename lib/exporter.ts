//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import fs from 'fs';
import path from 'path';
import Debug from 'debug';
import { DateTime } from 'luxon';

import type { ExportFormat } from '../config/export.types.js';
import { assertUnreachable } from './transitional.js';
import { writeTextToFile } from './utils.js';

const debug = Debug.debug('costcenters');

export type AssignmentRow = {
  username: string;
  costCenter: string;
  // the team the assignment came from, in team mode
  team?: string;
};

export type ExportRequest = {
  // file name prefix, such as the sync mode
  name: string;
  rows: AssignmentRow[];
  directory: string;
  formats: ExportFormat[];
  now?: DateTime;
};

const CSV_NEEDS_QUOTES = /[",\r\n]/;

export function escapeCsvValue(value: string): string {
  return CSV_NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(header: string[], rows: string[][]): string {
  return [header, ...rows].map((row) => row.map(escapeCsvValue).join(',')).join('\n') + '\n';
}

export function countUsersByCostCenter(rows: AssignmentRow[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) {
    counts[row.costCenter] = (counts[row.costCenter] || 0) + 1;
  }
  return counts;
}

export function getExportTimestamp(now: DateTime): string {
  return now.toUTC().toFormat('yyyyMMdd_HHmmss');
}

// Returns the paths written
export async function exportAssignments(request: ExportRequest): Promise<string[]> {
  const now = request.now || DateTime.utc();
  const timestamp = getExportTimestamp(now);
  const withTeams = request.rows.some((row) => row.team !== undefined);
  const summary = countUsersByCostCenter(request.rows);
  await fs.promises.mkdir(request.directory, { recursive: true });
  const written: string[] = [];
  for (const format of new Set(request.formats)) {
    switch (format) {
      case 'csv': {
        const assignmentsFile = path.join(request.directory, `${request.name}_assignments_${timestamp}.csv`);
        const header = withTeams ? ['username', 'cost_center', 'team'] : ['username', 'cost_center'];
        const rows = request.rows.map((row) =>
          withTeams ? [row.username, row.costCenter, row.team || ''] : [row.username, row.costCenter]
        );
        await writeTextToFile(assignmentsFile, toCsv(header, rows));
        const summaryFile = path.join(request.directory, `${request.name}_summary_${timestamp}.csv`);
        await writeTextToFile(
          summaryFile,
          toCsv(
            ['cost_center', 'users'],
            Object.entries(summary).map(([costCenter, users]) => [costCenter, String(users)])
          )
        );
        written.push(assignmentsFile, summaryFile);
        break;
      }
      case 'json': {
        const file = path.join(request.directory, `${request.name}_${timestamp}.json`);
        const contents = {
          generated_at: now.toUTC().toISO(),
          assignments: request.rows.map((row) =>
            row.team !== undefined
              ? { username: row.username, cost_center: row.costCenter, team: row.team }
              : { username: row.username, cost_center: row.costCenter }
          ),
          summary,
        };
        await writeTextToFile(file, JSON.stringify(contents, null, 2));
        written.push(file);
        break;
      }
      default:
        assertUnreachable(format);
    }
  }
  debug(`Exported ${request.rows.length} assignments to ${written.join(', ')}`);
  return written;
}

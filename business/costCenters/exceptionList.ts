//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import { DateTime } from 'luxon';
import { z } from 'zod';

import type { ConfigCostCentersExceptionList } from '../../config/costCenters.types.js';
import { readFileToText, writeTextToFileAtomically } from '../../lib/utils.js';
import type { Assignment, CopilotSeat } from './types.js';

const debug = Debug.debug('costcenters');

const LastRunSchema = z.object({
  last_run: z.string(),
});

// Every seat goes to the default cost center, except listed users.
export function buildExceptionListAssignments(
  seats: CopilotSeat[],
  exceptionList: Pick<ConfigCostCentersExceptionList, 'defaultCostCenter' | 'exceptionCostCenter' | 'users'>
): Map<string, string[]> {
  const exceptions = new Set(exceptionList.users.map((login) => login.toLowerCase()));
  const grouped = new Map<string, string[]>([
    [exceptionList.defaultCostCenter, []],
    [exceptionList.exceptionCostCenter, []],
  ]);
  for (const seat of seats) {
    const costCenter = exceptions.has(seat.login.toLowerCase())
      ? exceptionList.exceptionCostCenter
      : exceptionList.defaultCostCenter;
    grouped.get(costCenter)?.push(seat.login);
  }
  return grouped;
}

export function toAssignmentRows(grouped: Map<string, string[]>): Pick<Assignment, 'username' | 'costCenter'>[] {
  const rows: Pick<Assignment, 'username' | 'costCenter'>[] = [];
  for (const [costCenter, usernames] of grouped) {
    for (const username of usernames) {
      rows.push({ username, costCenter });
    }
  }
  return rows;
}

export function filterSeatsByLogin(seats: CopilotSeat[], logins: string[]): CopilotSeat[] {
  const wanted = new Set(logins.map((login) => login.toLowerCase()));
  return seats.filter((seat) => wanted.has(seat.login.toLowerCase()));
}

// Seats without a creation time are kept
export function filterSeatsCreatedAfter(seats: CopilotSeat[], since: DateTime): CopilotSeat[] {
  return seats.filter((seat) => {
    if (!seat.createdAt) {
      return true;
    }
    const created = DateTime.fromISO(seat.createdAt, { zone: 'utc' });
    return !created.isValid || created.toMillis() > since.toMillis();
  });
}

export async function readLastRunTimestamp(stateFile: string): Promise<DateTime | undefined> {
  let raw: string;
  try {
    raw = await readFileToText(stateFile);
  } catch (error) {
    debug(`No previous run state at ${stateFile}: ${error}`);
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (parseError) {
    console.warn(`The run state file ${stateFile} is not valid JSON and is ignored: ${parseError}`);
    return undefined;
  }
  const result = LastRunSchema.safeParse(parsed);
  if (!result.success) {
    console.warn(`The run state file ${stateFile} has an invalid format and is ignored`);
    return undefined;
  }
  const lastRun = DateTime.fromISO(result.data.last_run, { zone: 'utc' });
  return lastRun.isValid ? lastRun : undefined;
}

export async function saveLastRunTimestamp(stateFile: string, now: DateTime): Promise<void> {
  const contents = { last_run: now.toUTC().toISO() };
  await writeTextToFileAtomically(stateFile, JSON.stringify(contents, null, 2));
  debug(`Saved run timestamp ${contents.last_run} to ${stateFile}`);
}

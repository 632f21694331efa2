//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { Octokit } from '@octokit/rest';
import { z } from 'zod';

import { collectPages } from '../lib/github/collections.js';
import { CreateError } from '../lib/transitional.js';
import type { CopilotSeat, ICopilotSeatListing } from './costCenters/types.js';

const MAXIMUM_DUPLICATES_REPORTED = 10;

const CopilotSeatDataSchema = z.object({
  assignee: z
    .object({
      login: z.string().nullish(),
    })
    .nullish(),
  created_at: z.string().nullish(),
  last_activity_at: z.string().nullish(),
});

// paginate may already have flattened the page to its seats
const CopilotSeatsPageSchema = z.union([
  z.object({
    total_seats: z.number().optional(),
    seats: z.array(CopilotSeatDataSchema).default([]),
  }),
  z.array(CopilotSeatDataSchema),
]);

export type CopilotSeatData = z.infer<typeof CopilotSeatDataSchema>;

export function deduplicateSeats(seats: CopilotSeatData[]): CopilotSeat[] {
  const byLogin = new Map<string, CopilotSeat>();
  const duplicates = new Map<string, number>();
  for (const seat of seats) {
    const login = seat.assignee?.login;
    if (!login) {
      continue;
    }
    if (byLogin.has(login)) {
      duplicates.set(login, (duplicates.get(login) || 0) + 1);
      continue;
    }
    byLogin.set(login, {
      login,
      createdAt: seat.created_at || undefined,
      lastActivityAt: seat.last_activity_at || undefined,
    });
  }
  if (duplicates.size > 0) {
    let total = 0;
    const reported: string[] = [];
    for (const [login, count] of duplicates) {
      total += count;
      if (reported.length < MAXIMUM_DUPLICATES_REPORTED) {
        reported.push(`${login} (+${count})`);
      }
    }
    const more = duplicates.size > MAXIMUM_DUPLICATES_REPORTED ? ', ...' : '';
    console.warn(
      `Detected and skipped ${total} duplicate seat entries across ${duplicates.size} users: ${reported.join(', ')}${more}`
    );
  }
  return Array.from(byLogin.values());
}

export class EnterpriseCopilot implements ICopilotSeatListing {
  constructor(
    private readonly octokit: Octokit,
    readonly enterprise: string,
    private readonly pageSize?: number
  ) {
    if (!enterprise) {
      throw CreateError.ParameterRequired('github.enterprise', 'Copilot seats are listed for an enterprise');
    }
  }

  async listSeats(): Promise<CopilotSeat[]> {
    const seats = await collectPages(
      this.octokit,
      'GET /enterprises/{enterprise}/copilot/billing/seats',
      { enterprise: this.enterprise },
      CopilotSeatsPageSchema,
      (page) => (Array.isArray(page) ? page : page.seats),
      this.pageSize
    );
    const unique = deduplicateSeats(seats);
    console.log(`Found ${unique.length} Copilot seats in enterprise ${this.enterprise}`);
    return unique;
  }
}

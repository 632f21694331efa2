//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import {
  buildExceptionListAssignments,
  filterSeatsByLogin,
  filterSeatsCreatedAfter,
  readLastRunTimestamp,
  saveLastRunTimestamp,
  toAssignmentRows,
} from '../../business/costCenters/exceptionList.js';
import { printCostCenterCounts } from '../../business/costCenters/summary.js';
import { CreateError } from '../../lib/transitional.js';
import { shouldAssign, SyncExecutionMode } from './options.js';
import { synchronizeCostCenters } from './synchronize.js';
import type { ISyncModeHandler } from './types.js';

// Copilot seat holders go to the default cost center, listed users to the exception one
export const exceptionListMode: ISyncModeHandler = {
  name: 'users',

  validate(config) {
    const { exceptionList } = config.costCenters;
    if (!exceptionList.defaultCostCenter || !exceptionList.exceptionCostCenter) {
      throw CreateError.InvalidParameters(
        'costCenters.exceptionList needs both defaultCostCenter and exceptionCostCenter names'
      );
    }
    if (exceptionList.defaultCostCenter === exceptionList.exceptionCostCenter) {
      throw CreateError.InvalidParameters('The default and exception cost centers must be different');
    }
  },

  describe(config, options) {
    const { exceptionList } = config.costCenters;
    const users = options.users.length > 0 ? `${options.users.length} selected Copilot users` : 'Copilot seat holders';
    return `assign ${users} to '${exceptionList.defaultCostCenter}' or '${exceptionList.exceptionCostCenter}'`;
  },

  async run(providers, options) {
    const { config } = providers;
    const apply = options.mode === SyncExecutionMode.Apply;
    let seats = await providers.seats.listSeats();
    if (options.users.length > 0) {
      seats = filterSeatsByLogin(seats, options.users);
      console.log(`Processing ${seats.length} of ${options.users.length} requested users with Copilot seats`);
    }
    if (options.incremental) {
      const since = await readLastRunTimestamp(config.cache.stateFile);
      if (since) {
        seats = filterSeatsCreatedAfter(seats, since);
        console.log(`Incremental run: ${seats.length} seats created since ${since.toISO()}`);
      } else {
        console.log('Incremental run: no previous run recorded, processing every seat');
      }
    }

    const grouped = buildExceptionListAssignments(seats, config.costCenters.exceptionList);
    const rows = toAssignmentRows(grouped);
    if (options.summaryReport) {
      printCostCenterCounts(grouped);
    }
    const successProperties: Record<string, string | number | boolean> = { seats: seats.length };
    if (!shouldAssign(options)) {
      return { rows, successProperties };
    }

    if (seats.length === 0 && options.incremental) {
      console.log('No new Copilot seats since the last run, nothing to do');
    } else {
      // a partial seat list cannot tell who should leave
      const fullSync =
        config.costCenters.exceptionList.removeUsersWithoutSeats && !options.incremental && options.users.length === 0;
      const { totals } = await synchronizeCostCenters(providers, grouped, { apply, fullSync });
      Object.assign(successProperties, totals);
    }
    if (apply) {
      await saveLastRunTimestamp(config.cache.stateFile, providers.clock());
    }
    return { rows, successProperties };
  },
};

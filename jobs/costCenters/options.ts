//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { Command, InvalidArgumentError, Option } from 'commander';

import type { ExportFormat } from '../../config/export.types.js';
import { getPackageIdentity, splitCommaSeparated } from '../../lib/utils.js';

export enum SyncExecutionMode {
  Plan = 'plan',
  Apply = 'apply',
}

export type CommandLineOptions = {
  mode: SyncExecutionMode;
  yes: boolean;
  assignCostCenters: boolean;
  teamsMode: boolean;
  showConfig: boolean;
  summaryReport: boolean;
  users: string[];
  incremental: boolean;
  createCostCenters: boolean;
  createBudgets: boolean;
  forceReassign: boolean;
  cacheStats: boolean;
  clearCache: boolean;
  cacheCleanup: boolean;
  // true exports in the configured formats
  export?: ExportFormat[] | true;
  config?: string;
  verbose: boolean;
};

type ParsedOptions = Partial<Omit<CommandLineOptions, 'mode'>> & {
  mode: SyncExecutionMode;
};

const EXPORT_FORMATS: ExportFormat[] = ['csv', 'json'];

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function parseExportFormats(value: string): ExportFormat[] {
  const formats: ExportFormat[] = [];
  for (const entry of splitCommaSeparated(value.toLowerCase())) {
    if (!isExportFormat(entry)) {
      throw new InvalidArgumentError(`Unsupported export format "${entry}", use ${EXPORT_FORMATS.join(' or ')}.`);
    }
    formats.push(entry);
  }
  if (formats.length === 0) {
    throw new InvalidArgumentError('No export format given.');
  }
  return formats;
}

function parseUsers(value: string): string[] {
  const users = splitCommaSeparated(value);
  if (users.length === 0) {
    throw new InvalidArgumentError('No usernames given.');
  }
  return users;
}

export function createCommand(): Command {
  const { name, version } = getPackageIdentity();
  return new Command(name)
    .version(version)
    .description('Assign GitHub Enterprise users and repositories to billing cost centers')
    .addOption(
      new Option('--mode <mode>', 'plan shows the changes, apply makes them')
        .choices([SyncExecutionMode.Plan, SyncExecutionMode.Apply])
        .default(SyncExecutionMode.Plan)
    )
    .option('-y, --yes', 'apply without asking for confirmation')
    .option('--assign-cost-centers', 'compute and synchronize cost center assignments')
    .option('--teams-mode', 'assign users from team membership')
    .option('--show-config', 'print the effective configuration')
    .option('--summary-report', 'print users per cost center')
    .option('--users <logins>', 'only process these comma-separated Copilot users', parseUsers)
    .option('--incremental', 'only process Copilot seats created since the last apply run')
    .option('--create-cost-centers', 'create cost centers that do not exist yet')
    .option('--create-budgets', 'create a zero budget for each cost center')
    .option('--force-reassign', 'move users that are already in another cost center')
    .option('--cache-stats', 'print cost center cache statistics')
    .option('--clear-cache', 'remove every cached cost center')
    .option('--cache-cleanup', 'remove expired cache entries')
    .option('--export [formats]', 'write assignments as csv and/or json', parseExportFormats)
    .option('--config <path>', 'configuration directory, or a .json/.jsonc file merged over the defaults')
    .option('-v, --verbose', 'print diagnostic output');
}

export function parseCommandLine(args: string[], command?: Command): CommandLineOptions {
  const program = command || createCommand();
  program.parse(args, { from: 'user' });
  const parsed = program.opts<ParsedOptions>();
  return {
    mode: parsed.mode,
    yes: parsed.yes === true,
    assignCostCenters: parsed.assignCostCenters === true,
    teamsMode: parsed.teamsMode === true,
    showConfig: parsed.showConfig === true,
    summaryReport: parsed.summaryReport === true,
    users: parsed.users || [],
    incremental: parsed.incremental === true,
    createCostCenters: parsed.createCostCenters === true,
    createBudgets: parsed.createBudgets === true,
    forceReassign: parsed.forceReassign === true,
    cacheStats: parsed.cacheStats === true,
    clearCache: parsed.clearCache === true,
    cacheCleanup: parsed.cacheCleanup === true,
    export: parsed.export,
    config: parsed.config,
    verbose: parsed.verbose === true,
  };
}

export function hasCacheCommand(options: CommandLineOptions): boolean {
  return options.cacheStats || options.clearCache || options.cacheCleanup;
}

// Plan runs assign when nothing else was asked for
export function shouldAssign(options: CommandLineOptions): boolean {
  if (options.assignCostCenters || options.mode === SyncExecutionMode.Apply) {
    return true;
  }
  return !options.showConfig && !options.summaryReport && !hasCacheCommand(options);
}

export function hasActionBeyondShowConfig(options: CommandLineOptions): boolean {
  return (
    options.assignCostCenters ||
    options.mode === SyncExecutionMode.Apply ||
    options.summaryReport ||
    options.export !== undefined ||
    hasCacheCommand(options)
  );
}

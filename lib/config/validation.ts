//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { z } from 'zod';

import type { SyncConfiguration } from '../../config/index.types.js';
import { CreateError } from '../transitional.js';
import { splitCommaSeparated } from '../utils.js';

// env:// values that are unset resolve to undefined or an empty string
const optionalString = z
  .string()
  .optional()
  .transform((value) => value || undefined);

// Comma-separated environment values or JSON arrays
const stringList = z
  .union([z.array(z.string()), z.string()])
  .default([])
  .transform((value) => (Array.isArray(value) ? value : splitCommaSeparated(value)));

const GitHubSchema = z.object({
  token: optionalString,
  enterprise: optionalString,
  baseUrl: z.string().url('The GitHub API base URL must be a URL'),
  pageSize: z.number().int().min(1).max(100),
  retries: z.number().int().min(0).max(10),
});

const ExceptionListSchema = z.object({
  defaultCostCenter: z.string().min(1, 'The default cost center name is required'),
  exceptionCostCenter: z.string().min(1, 'The exception cost center name is required'),
  users: stringList,
  removeUsersWithoutSeats: z.boolean(),
});

const CostCentersSchema = z.object({
  mode: z.enum(['users', 'teams', 'repository']),
  autoCreate: z.boolean(),
  createBudgets: z.boolean(),
  skipUsersInOtherCostCenters: z.boolean(),
  exceptionList: ExceptionListSchema,
});

const TeamsSchema = z.object({
  scope: z
    .union([z.enum(['organization', 'enterprise']), z.literal('')])
    .optional()
    .transform((value) => value || undefined),
  organizations: stringList,
  mode: z.enum(['auto', 'manual']),
  nameTemplate: z.string().min(1, 'The cost center name template is required'),
  mappings: z.record(z.string(), z.string()).default({}),
  removeUsersNoLongerInTeams: z.boolean(),
  protectedUsers: stringList,
});

const RepositoryMappingSchema = z.object({
  costCenter: z.string().min(1, 'Each repository mapping needs a cost center name'),
  propertyName: z.string().min(1, 'Each repository mapping needs a custom property name'),
  propertyValues: z.array(z.string()).min(1, 'Each repository mapping needs at least one property value'),
});

const RepositorySchema = z.object({
  organization: optionalString,
  explicitMappings: z.array(RepositoryMappingSchema).default([]),
});

const CacheSchema = z.object({
  file: z.string().min(1),
  ttlHours: z.number().positive(),
  stateFile: z.string().min(1),
});

const ExportSchema = z.object({
  directory: z.string().min(1),
  formats: z.array(z.enum(['csv', 'json'])),
});

export const SyncConfigurationSchema: z.ZodType<SyncConfiguration> = z.object({
  cache: CacheSchema,
  costCenters: CostCentersSchema,
  export: ExportSchema,
  github: GitHubSchema,
  repository: RepositorySchema,
  teams: TeamsSchema,
});

export function validateConfiguration(graph: unknown): SyncConfiguration {
  const result = SyncConfigurationSchema.safeParse(graph);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw CreateError.InvalidParameters(`The configuration is not valid:\n  ${details.join('\n  ')}`, result.error);
  }
  return result.data;
}

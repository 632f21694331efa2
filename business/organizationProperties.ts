//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { Octokit } from '@octokit/rest';
import { z } from 'zod';

import { collectPages } from '../lib/github/collections.js';
import type {
  IRepositoryPropertyListing,
  RepositoryCustomProperties,
  RepositoryPropertyValue,
} from './costCenters/types.js';

const PropertyValueSchema = z.object({
  property_name: z.string(),
  value: z.union([z.string(), z.array(z.string())]).nullish(),
});

const RepositoryPropertyValuesSchema = z.object({
  repository_full_name: z.string(),
  properties: z.array(PropertyValueSchema).default([]),
});

const RepositoryPropertyValuesPageSchema = z.array(RepositoryPropertyValuesSchema);

export class OrganizationProperties implements IRepositoryPropertyListing {
  constructor(
    private readonly octokit: Octokit,
    private readonly pageSize?: number
  ) {}

  async listRepositoryProperties(organization: string): Promise<RepositoryCustomProperties[]> {
    const repositories = await collectPages(
      this.octokit,
      'GET /orgs/{org}/properties/values',
      { org: organization },
      RepositoryPropertyValuesPageSchema,
      (page) => page,
      this.pageSize
    );
    return repositories.map((repository) => {
      const properties: Record<string, RepositoryPropertyValue> = {};
      for (const { property_name, value } of repository.properties) {
        properties[property_name] = value ?? null;
      }
      return { repositoryFullName: repository.repository_full_name, properties };
    });
  }
}

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { Octokit } from '@octokit/rest';
import Debug from 'debug';
import type { z } from 'zod';

import { CreateError } from '../transitional.js';
import { DEFAULT_PAGE_SIZE } from './index.js';

const debug = Debug.debug('restapi');

export type CollectionParameters = Record<string, string | number | undefined>;

export function parseResponse<T>(schema: z.ZodType<T>, data: unknown, route: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw CreateError.ServerError(`Unexpected response shape from ${route}: ${result.error.message}`, result.error);
  }
  return result.data;
}

// Follows Link headers until the last page. Each page is validated and
// reduced to its entries by the schema and selector.
export async function collectPages<Page, Entry>(
  octokit: Octokit,
  route: string,
  parameters: CollectionParameters,
  schema: z.ZodType<Page>,
  select: (page: Page) => Entry[],
  pageSize?: number
): Promise<Entry[]> {
  const entries: Entry[] = [];
  let pages = 0;
  const iterator = octokit.paginate.iterator(route, { ...parameters, per_page: pageSize || DEFAULT_PAGE_SIZE });
  for await (const response of iterator) {
    const data: unknown = response.data;
    const page = parseResponse(schema, data, route);
    entries.push(...select(page));
    ++pages;
  }
  debug(`${route}: ${entries.length} entries over ${pages} page(s)`);
  return entries;
}

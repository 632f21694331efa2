//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { Octokit } from '@octokit/rest';
import Debug from 'debug';

import { requestLog } from './octokitRequestLog.js';
import { retryRequests } from './octokitRetry.js';
import { CreateError } from '../transitional.js';
import { getPackageIdentity } from '../utils.js';

const debug = Debug.debug('restapi');
const debugError = Debug.debug('restapi:error');

export enum HttpMethod {
  Get = 'GET',
  Post = 'POST',
  Delete = 'DELETE',
}

export const GITHUB_API_VERSION = '2022-11-28';

export const DEFAULT_PAGE_SIZE = 100;

export interface IGitHubClientOptions {
  token?: string;
  baseUrl?: string;
  retries?: number;
  userAgent?: string;
  fetch?: typeof fetch;
  sleep?: (milliseconds: number) => Promise<void>;
}

export function createGitHubClient(options: IGitHubClientOptions): Octokit {
  if (!options.token) {
    throw CreateError.ParameterRequired('github.token', 'set the GITHUB_TOKEN environment variable');
  }
  const identity = getPackageIdentity();
  const octokit = new Octokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    userAgent: options.userAgent || `${identity.name}/${identity.version}`,
    log: {
      debug: (message: string) => debug(message),
      info: (message: string) => debug(message),
      warn: (message: string) => console.warn(message),
      error: (message: string) => debugError(message),
    },
    request: options.fetch ? { fetch: options.fetch } : undefined,
  });
  octokit.hook.before('request', (requestOptions) => {
    requestOptions.headers['x-github-api-version'] = GITHUB_API_VERSION;
  });
  requestLog(octokit);
  retryRequests(octokit, { retries: options.retries ?? 3, sleep: options.sleep });
  return octokit;
}

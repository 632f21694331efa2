//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { Octokit } from '@octokit/rest';
import Debug from 'debug';

import { ErrorHelper } from '../transitional.js';
import { sleep as defaultSleep } from '../utils.js';

const debug = Debug.debug('restapi');

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const INITIAL_BACKOFF_MILLISECONDS = 1000;

export interface IRetryOptions {
  retries: number;
  sleep?: (milliseconds: number) => Promise<void>;
  now?: () => number;
}

export function getResponseHeader(error: unknown, name: string): string | undefined {
  if (!error || typeof error !== 'object' || !('response' in error)) {
    return undefined;
  }
  const response = error.response;
  if (!response || typeof response !== 'object' || !('headers' in response)) {
    return undefined;
  }
  const headers = response.headers;
  if (!headers || typeof headers !== 'object') {
    return undefined;
  }
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

export function getRetryDelay(error: unknown, attempt: number, now: () => number): number {
  // actual retry headers win
  const retryAfter = Number(getResponseHeader(error, 'retry-after'));
  if (retryAfter > 0) {
    return retryAfter * 1000;
  }
  const status = ErrorHelper.GetStatus(error);
  const remaining = getResponseHeader(error, 'x-ratelimit-remaining');
  const reset = Number(getResponseHeader(error, 'x-ratelimit-reset'));
  if (reset > 0 && (status === 429 || remaining === '0')) {
    return Math.max(reset * 1000 - now(), 0) + 1000;
  }
  return INITIAL_BACKOFF_MILLISECONDS * Math.pow(2, attempt);
}

export function retryRequests(octokit: Octokit, options: IRetryOptions) {
  const sleep = options.sleep || defaultSleep;
  const now = options.now || Date.now;
  octokit.hook.wrap('request', async (request, requestOptions) => {
    for (let attempt = 0; ; attempt++) {
      try {
        return await request(requestOptions);
      } catch (error) {
        const status = ErrorHelper.GetStatus(error);
        if (attempt >= options.retries || status === undefined || !RETRYABLE_STATUS_CODES.has(status)) {
          throw error;
        }
        const delay = getRetryDelay(error, attempt, now);
        debug(
          `${requestOptions.method} ${requestOptions.url} returned ${status}, retry ${attempt + 1} of ${options.retries} in ${delay}ms`
        );
        await sleep(delay);
      }
    }
  });
}

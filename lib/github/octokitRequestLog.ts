// MIT License Copyright (c) 2020 Octokit contributors
//
// Permission is hereby granted, free of charge, to any person obtaining a copy of this software and associated documentation files (the "Software"), to deal in the Software without restriction, including without limitation the rights to use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of the Software, and to permit persons to whom the Software is furnished to do so, subject to the following conditions:
//
// The above copyright notice and this permission notice (including the next paragraph) shall be included in all copies or substantial portions of the Software.
//
// THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.

// From: https://github.com/octokit/plugin-request-log.js/blob/main/src/index.ts

import type { Octokit } from '@octokit/rest';

import { ErrorHelper } from '../transitional.js';
import { getResponseHeader } from './octokitRetry.js';

// Patched so that expected misses (a user outside any cost center, a
// budgets API the enterprise does not have) log as info, not errors.
const EXPECTED_NOT_FOUND_PATHS = ['/cost-centers/memberships', '/settings/billing/budgets'];

export function requestLog(octokit: Octokit) {
  octokit.hook.wrap('request', (request, options) => {
    octokit.log.debug('request', options);

    const start = Date.now();
    const requestOptions = octokit.request.endpoint.parse(options);
    const path = requestOptions.url.replace(options.baseUrl, '');

    return Promise.resolve(request(options))
      .then((response) => {
        const requestId = response.headers['x-github-request-id'];
        octokit.log.info(
          `${requestOptions.method} ${path} - ${response.status} with id ${requestId} in ${Date.now() - start}ms`
        );
        return response;
      })
      .catch((error: unknown) => {
        const requestId = getResponseHeader(error, 'x-github-request-id') || 'UNKNOWN';
        const status = ErrorHelper.GetStatus(error);
        const logAsInfo =
          status === 304 ||
          (status === 404 && EXPECTED_NOT_FOUND_PATHS.some((expected) => path.includes(expected)));
        const message = `${requestOptions.method} ${path} - ${status} with id ${requestId} in ${Date.now() - start}ms`;
        if (logAsInfo) {
          octokit.log.info(message);
        } else {
          octokit.log.error(message);
        }
        throw error;
      });
  });
}

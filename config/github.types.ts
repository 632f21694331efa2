//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootGitHub = {
  github: ConfigGitHub;
};

export type ConfigGitHub = {
  token?: string;
  enterprise?: string;
  baseUrl: string;
  pageSize: number;
  retries: number;
};

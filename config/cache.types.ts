//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootCache = {
  cache: ConfigCache;
};

export type ConfigCache = {
  file: string;
  ttlHours: number;
  stateFile: string;
};

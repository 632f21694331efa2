//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootRepository = {
  repository: ConfigRepository;
};

export type ConfigRepositoryMapping = {
  costCenter: string;
  propertyName: string;
  propertyValues: string[];
};

export type ConfigRepository = {
  organization?: string;
  explicitMappings: ConfigRepositoryMapping[];
};

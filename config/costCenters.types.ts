//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootCostCenters = {
  costCenters: ConfigCostCenters;
};

export type CostCenterMode = 'users' | 'teams' | 'repository';

export type ConfigCostCenters = {
  mode: CostCenterMode;
  autoCreate: boolean;
  createBudgets: boolean;
  skipUsersInOtherCostCenters: boolean;
  exceptionList: ConfigCostCentersExceptionList;
};

export type ConfigCostCentersExceptionList = {
  defaultCostCenter: string;
  exceptionCostCenter: string;
  users: string[];
  removeUsersWithoutSeats: boolean;
};

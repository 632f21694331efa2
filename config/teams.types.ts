//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type ConfigRootTeams = {
  teams: ConfigTeams;
};

export type TeamsScope = 'organization' | 'enterprise';

export type TeamsMappingMode = 'auto' | 'manual';

export type ConfigTeams = {
  scope?: TeamsScope;
  organizations: string[];
  mode: TeamsMappingMode;
  nameTemplate: string;
  // team key (org/slug, or slug at enterprise scope) to cost center name
  mappings: Record<string, string>;
  removeUsersNoLongerInTeams: boolean;
  protectedUsers: string[];
};

//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

export type Team = {
  slug: string;
  name: string;
  // absent for enterprise teams
  organization?: string;
};

export type TeamWithMembers = {
  team: Team;
  members: string[];
};

export type TeamScope =
  | { kind: 'organizations'; organizations: string[] }
  | { kind: 'enterprise'; enterprise: string };

export type Assignment = {
  username: string;
  costCenter: string;
  team: Team;
};

export type AssignmentConflict = {
  username: string;
  // every team the user belongs to, in processing order
  teams: Team[];
  winner: Team;
};

export type CostCenterMembership = {
  id: string;
  name?: string;
};

export type CopilotSeat = {
  login: string;
  createdAt?: string;
  lastActivityAt?: string;
};

export type RepositoryPropertyValue = string | string[] | null;

export type RepositoryCustomProperties = {
  repositoryFullName: string;
  properties: Record<string, RepositoryPropertyValue>;
};

export enum BudgetOutcome {
  Created = 'created',
  Exists = 'exists',
  Unavailable = 'unavailable',
  Failed = 'failed',
}

export interface ITeamListingService {
  listTeams(scope: TeamScope): Promise<Team[]>;
  listMembers(team: Team): Promise<string[]>;
}

export interface ICostCenterRegistry {
  findByName(name: string): Promise<string | undefined>;
  create(name: string): Promise<string>;
  listMembers(costCenterId: string): Promise<string[]>;
  // At most one batch of users per call
  addMembers(costCenterId: string, usernames: string[]): Promise<void>;
  removeMembers(costCenterId: string, usernames: string[]): Promise<void>;
  getUserCostCenter(username: string): Promise<CostCenterMembership | undefined>;
  addRepositories(costCenterId: string, repositoryFullNames: string[]): Promise<void>;
}

export interface ICostCenterBudgets {
  ensureBudget(costCenterId: string, costCenterName: string): Promise<BudgetOutcome>;
}

export interface ICopilotSeatListing {
  listSeats(): Promise<CopilotSeat[]>;
}

export interface IRepositoryPropertyListing {
  listRepositoryProperties(organization: string): Promise<RepositoryCustomProperties[]>;
}

export function getTeamKey(team: Team): string {
  return team.organization ? `${team.organization}/${team.slug}` : team.slug;
}

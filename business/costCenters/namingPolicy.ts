//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import type { ConfigTeams } from '../../config/teams.types.js';
import { assertUnreachable, CreateError } from '../../lib/transitional.js';
import { getTeamKey, type Team } from './types.js';

const TEMPLATE_PLACEHOLDER = /\{([^{}]*)\}/g;

const TemplateVariables = {
  team_name: (team: Team) => team.name,
  team_slug: (team: Team) => team.slug,
  org: (team: Team) => team.organization || '',
};

type TemplateVariable = keyof typeof TemplateVariables;

function isTemplateVariable(name: string): name is TemplateVariable {
  return Object.prototype.hasOwnProperty.call(TemplateVariables, name);
}

export interface ICostCenterNamingPolicy {
  readonly kind: ConfigTeams['mode'];
  // undefined when the team has no cost center
  targetName(team: Team): string | undefined;
}

export class AutoNamingPolicy implements ICostCenterNamingPolicy {
  readonly kind = 'auto';

  constructor(private readonly template: string) {
    if (!template.trim()) {
      throw CreateError.InvalidParameters('teams.nameTemplate must not be empty in auto mode');
    }
    const unknown = Array.from(template.matchAll(TEMPLATE_PLACEHOLDER))
      .map((match) => match[1])
      .filter((name) => !isTemplateVariable(name));
    if (unknown.length > 0) {
      throw CreateError.InvalidParameters(
        `teams.nameTemplate "${template}" uses unknown placeholder(s) ${unknown
          .map((name) => `{${name}}`)
          .join(', ')}. Available: ${Object.keys(TemplateVariables)
          .map((name) => `{${name}}`)
          .join(', ')}`
      );
    }
  }

  targetName(team: Team): string {
    return this.template.replace(TEMPLATE_PLACEHOLDER, (placeholder: string, name: string) =>
      isTemplateVariable(name) ? TemplateVariables[name](team) : placeholder
    );
  }
}

export class ManualNamingPolicy implements ICostCenterNamingPolicy {
  readonly kind = 'manual';
  private readonly mappings: Map<string, string>;

  constructor(mappings: Record<string, string>) {
    this.mappings = new Map(Object.entries(mappings).filter(([, costCenter]) => costCenter));
    if (this.mappings.size === 0) {
      throw CreateError.InvalidParameters(
        'Manual teams mode needs at least one entry in teams.mappings (team key to cost center name)'
      );
    }
  }

  targetName(team: Team): string | undefined {
    return this.mappings.get(getTeamKey(team));
  }
}

export function createNamingPolicy(teams: Pick<ConfigTeams, 'mode' | 'nameTemplate' | 'mappings'>): ICostCenterNamingPolicy {
  switch (teams.mode) {
    case 'auto':
      return new AutoNamingPolicy(teams.nameTemplate);
    case 'manual':
      return new ManualNamingPolicy(teams.mappings);
    default:
      return assertUnreachable(teams.mode);
  }
}

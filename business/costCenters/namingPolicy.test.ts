//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { describe, expect, it } from 'vitest';

import { ErrorHelper } from '../../lib/transitional.js';
import { createTeam } from '../../test/fakeGitHub.js';
import { AutoNamingPolicy, createNamingPolicy, ManualNamingPolicy } from './namingPolicy.js';

describe('cost center naming', () => {
  describe('auto mode', () => {
    it('renders the team name into the template', () => {
      const policy = new AutoNamingPolicy('Team: {team_name}');
      expect(policy.targetName(createTeam('frontend', 'acme'))).toEqual('Team: Frontend');
    });

    it('supports the slug and organization placeholders', () => {
      const policy = new AutoNamingPolicy('{org}/{team_slug}');
      expect(policy.targetName(createTeam('frontend', 'acme'))).toEqual('acme/frontend');
      expect(policy.targetName(createTeam('platform'))).toEqual('/platform');
    });

    it('rejects unknown placeholders', () => {
      let thrown: unknown;
      try {
        new AutoNamingPolicy('CC {team}');
      } catch (error) {
        thrown = error;
      }
      expect(ErrorHelper.IsInvalidParameters(thrown)).toBe(true);
      expect(ErrorHelper.GetMessage(thrown)).toEqual(
        'teams.nameTemplate "CC {team}" uses unknown placeholder(s) {team}. Available: {team_name}, {team_slug}, {org}'
      );
    });

    it('rejects an empty template', () => {
      expect(() => new AutoNamingPolicy('  ')).toThrow('teams.nameTemplate must not be empty in auto mode');
    });
  });

  describe('manual mode', () => {
    const mappings = {
      'acme/frontend': 'Web',
      platform: 'Platform',
    };

    it('looks teams up by their key', () => {
      const policy = new ManualNamingPolicy(mappings);
      expect(policy.targetName(createTeam('frontend', 'acme'))).toEqual('Web');
      expect(policy.targetName(createTeam('platform'))).toEqual('Platform');
      expect(policy.targetName(createTeam('backend', 'acme'))).toBeUndefined();
    });

    it('requires at least one mapping', () => {
      expect(() => new ManualNamingPolicy({})).toThrow(/at least one entry in teams.mappings/);
      expect(() => new ManualNamingPolicy({ 'acme/frontend': '' })).toThrow(/at least one entry/);
    });
  });

  it('creates the policy for the configured mode', () => {
    expect(createNamingPolicy({ mode: 'auto', nameTemplate: 'Team: {team_name}', mappings: {} }).kind).toEqual('auto');
    expect(createNamingPolicy({ mode: 'manual', nameTemplate: '', mappings: { 'acme/mobile': 'Mobile' } }).kind).toEqual('manual');
  });
});

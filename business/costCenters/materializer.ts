//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import type { ICostCenterCache } from '../../lib/caching/index.js';
import { ErrorHelper } from '../../lib/transitional.js';
import type { ICostCenterRegistry } from './types.js';

const debug = Debug.debug('costcenters');

export interface IMaterializerOptions {
  autoCreate: boolean;
  // Plan runs never create
  apply: boolean;
}

export type MaterializeResult = {
  // name to remote identifier
  resolved: Map<string, string>;
  created: string[];
  // would be created by an apply run
  pendingCreation: string[];
  unresolved: string[];
};

export class CostCenterMaterializer {
  constructor(
    private readonly registry: ICostCenterRegistry,
    private readonly cache: ICostCenterCache,
    private readonly options: IMaterializerOptions
  ) {}

  async materialize(names: string[]): Promise<MaterializeResult> {
    const result: MaterializeResult = {
      resolved: new Map(),
      created: [],
      pendingCreation: [],
      unresolved: [],
    };
    for (const name of new Set(names)) {
      try {
        await this.materializeOne(name, result);
      } catch (error) {
        if (ErrorHelper.IsFatalRemote(error)) {
          throw error;
        }
        console.warn(`Could not resolve cost center '${name}': ${ErrorHelper.GetMessage(error)}`);
        result.unresolved.push(name);
      }
    }
    if (result.unresolved.length > 0) {
      console.warn(
        `${result.unresolved.length} cost center(s) could not be resolved; their members are skipped: ${result.unresolved.join(', ')}`
      );
    }
    return result;
  }

  private async materializeOne(name: string, result: MaterializeResult) {
    const cached = await this.cache.get(name);
    if (cached) {
      result.resolved.set(name, cached);
      return;
    }
    const existing = await this.registry.findByName(name);
    if (existing) {
      debug(`Found existing cost center '${name}' with id ${existing}`);
      await this.cache.set(name, existing);
      result.resolved.set(name, existing);
      return;
    }
    if (!this.options.autoCreate) {
      console.warn(`Cost center '${name}' does not exist and auto-create is disabled`);
      result.unresolved.push(name);
      return;
    }
    if (!this.options.apply) {
      console.log(`Would create cost center '${name}'`);
      result.pendingCreation.push(name);
      return;
    }
    const id = await this.registry.create(name);
    console.log(`Created cost center '${name}' with id ${id}`);
    await this.cache.set(name, id);
    result.resolved.set(name, id);
    result.created.push(name);
  }
}

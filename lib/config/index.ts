//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';

import type { SyncConfiguration } from '../../config/index.types.js';

import environmentConfigurationResolver from './environmentConfigurationResolver.js';
import multiGraphBuilder from './multiGraphBuilder.js';
import painlessConfigAsCode from './painlessConfigAsCode.js';
import { validateConfiguration } from './validation.js';

const debug = Debug.debug('config');

export interface IPainlessConfigGet {
  providerName: string;
  get(name: string): string | undefined;
}

export type ConfigurationGraph = Record<string, unknown>;

type Resolver = (object: object) => Promise<void>;

export interface ILibraryOptions {
  options?: IProviderOptions;
  environment?: IPainlessConfigGet;
  graphProvider?: (api: ILibraryOptions) => Promise<ConfigurationGraph>;
}

export interface IProviderOptions {
  provider?: IPainlessConfigGet;
  applicationRoot?: string;
  skipDotEnv?: boolean;
  directoryName?: string;
  requireConfigurationDirectory?: boolean;
  // .json or .jsonc files merged over the directory graph, in order
  additionalFiles?: string[];
  graph?: ConfigurationGraph;
}

async function getConfigGraph(
  libraryOptions: ILibraryOptions,
  options: IProviderOptions,
  environmentProvider: IPainlessConfigGet
): Promise<ConfigurationGraph> {
  if (options.graph) {
    // resolvers write into the graph; callers keep their copy
    return structuredClone(options.graph);
  }
  const graphProvider = libraryOptions.graphProvider || multiGraphBuilder;
  const graphLibraryApi: ILibraryOptions = {
    options,
    environment: environmentProvider,
  };
  return graphProvider(graphLibraryApi);
}

async function initialize(libraryOptions?: ILibraryOptions) {
  libraryOptions = libraryOptions || {};
  const environmentProvider = libraryOptions.environment || (await painlessConfigAsCode(libraryOptions.options));
  const resolvers: Resolver[] = [
    environmentConfigurationResolver({ provider: environmentProvider }).resolveObjectVariables,
  ];
  const library = libraryOptions;
  return {
    environment: environmentProvider,
    resolve: async function (options?: IProviderOptions): Promise<ConfigurationGraph> {
      options = { ...library.options, ...options };
      // Find or build the configuration graph
      const graph = await getConfigGraph(library, options, environmentProvider);
      try {
        // In order, resolve the graph
        for (const resolver of resolvers) {
          await resolver(graph);
        }
      } catch (resolveConfigurationError) {
        console.warn(`Error while resolving the graph with a resolver: ${resolveConfigurationError}`);
        throw resolveConfigurationError;
      }
      debug(`Resolved configuration graph with nodes: ${Object.keys(graph).join(', ')}`);
      return graph;
    },
  };
}

export async function loadConfiguration(libraryOptions?: ILibraryOptions): Promise<SyncConfiguration> {
  const painlessConfigResolver = await initialize(libraryOptions);
  const graph = await painlessConfigResolver.resolve();
  return validateConfiguration(graph);
}

export default initialize;

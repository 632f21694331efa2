//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import appRoot from 'app-root-path';
import deepmerge from 'deepmerge';
import fs from 'fs';
import path from 'path';

import type { ConfigurationGraph, ILibraryOptions, IProviderOptions } from './index.js';
import graphBuilder, { readGraphNode } from './graphBuilder.js';

const DEFAULT_CONFIGURATION_DIRECTORY = 'config';

function isGraph(value: unknown): value is ConfigurationGraph {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

async function composeGraphs(api: ILibraryOptions): Promise<ConfigurationGraph> {
  const options = api.options || {};
  const applicationRoot = options.applicationRoot || appRoot.path;

  const directories: string[] = [];
  addAppConfigDirectory(directories, api, options, applicationRoot);

  let graph: ConfigurationGraph = {};
  const overwriteMerge = (destinationArray: unknown[], sourceArray: unknown[]) => sourceArray;
  for (const directory of directories) {
    const result = await graphBuilder(api, directory);
    graph = deepmerge(graph, result, { arrayMerge: overwriteMerge });
  }
  // Single files layer over the directory graph, for example from --config
  for (const file of options.additionalFiles || []) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      throw new Error(`The configuration file ${resolved} was not found`);
    }
    const value = await readGraphNode(resolved);
    if (!isGraph(value)) {
      throw new Error(`The configuration file ${resolved} must contain an object`);
    }
    graph = deepmerge(graph, value, { arrayMerge: overwriteMerge });
  }
  if (Object.getOwnPropertyNames(graph).length === 0) {
    throw new Error(
      `Processed ${directories.length} configuration directories and ${(options.additionalFiles || []).length} files, yet the resulting graph object did not have properties.`
    );
  }
  return graph;
}

function addAppConfigDirectory(
  paths: string[],
  api: ILibraryOptions,
  options: IProviderOptions,
  applicationRoot: string
) {
  let directoryName = options.directoryName;
  const key = api.environment?.get('CONFIGURATION_GRAPH_DIRECTORY_KEY') || 'CONFIGURATION_GRAPH_DIRECTORY';
  if (!directoryName && api.environment) {
    directoryName = api.environment.get(key);
  }
  directoryName = directoryName || DEFAULT_CONFIGURATION_DIRECTORY;
  const dirPath = path.resolve(applicationRoot, directoryName);
  try {
    fs.statSync(dirPath);
    paths.push(dirPath);
  } catch (notFound) {
    throw new Error(`The configuration graph directory ${dirPath} was not found. ${key}`, {
      cause: notFound,
    });
  }
}

export default composeGraphs;

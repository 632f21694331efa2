//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { promises as fs } from 'fs';
import objectPath from 'object-path';
import path from 'path';
import { jsonc } from 'jsonc';

import type { ConfigurationGraph, ILibraryOptions } from './index.js';

type GraphNodeProcessor = (filePath: string) => Promise<unknown>;

const SUPPORTED_EXTENSIONS = new Map<string, GraphNodeProcessor>([
  ['.json', jsonProcessor],
  ['.jsonc', jsoncProcessor],
]);

// Typed configuration nodes and their tests live beside the JSON files
const IGNORED_EXTENSIONS = ['.ts', '.md'];

async function jsonProcessor(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  return JSON.parse(raw);
}

async function jsoncProcessor(filePath: string): Promise<unknown> {
  const contents = await fs.readFile(filePath, 'utf8');
  return jsonc.parse(contents);
}

export async function readGraphNode(filePath: string): Promise<unknown> {
  const processor = SUPPORTED_EXTENSIONS.get(path.extname(filePath));
  if (!processor) {
    throw new Error(`Unsupported configuration file extension for ${filePath}`);
  }
  try {
    return await processor(filePath);
  } catch (parseError) {
    throw new Error(`The configuration file ${filePath} could not be parsed`, { cause: parseError });
  }
}

export default async (api: ILibraryOptions, dirPath: string): Promise<ConfigurationGraph> => {
  const options = api.options || {};
  const requireConfigurationDirectory = options.requireConfigurationDirectory || false;

  const config: ConfigurationGraph = {};
  let files: string[] = [];
  try {
    files = await fs.readdir(dirPath);
  } catch (directoryError) {
    if (requireConfigurationDirectory) {
      throw directoryError;
    }
  }
  for (const filename of files.sort()) {
    const file = path.join(dirPath, filename);
    const ext = path.extname(file);
    const nodeName = path.basename(file, ext);
    if (IGNORED_EXTENSIONS.includes(ext) || nodeName.endsWith('.types')) {
      continue;
    }
    if (!SUPPORTED_EXTENSIONS.has(ext)) {
      console.warn(`Configuration graph: unsupported configuration extension: ${ext} for path: ${file}`);
      continue;
    }
    let value = await readGraphNode(file);
    if (value !== undefined) {
      const existing: unknown = objectPath.get(config, nodeName);
      if (existing && typeof existing === 'object' && value && typeof value === 'object') {
        value = { ...existing, ...value };
      }
      objectPath.set(config, nodeName, value);
    }
  }
  return config;
};

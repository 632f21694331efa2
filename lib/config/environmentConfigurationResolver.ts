//
// Copyright (c) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import Debug from 'debug';
import objectPath from 'object-path';
import { URL } from 'url';

// Configuration Assumptions:
// In URL syntax, we define a custom scheme of "env://" which resolves
// an environment variable in the object, directly overwriting the
// original value.
//
// For example:
//   "env://GITHUB_TOKEN" resolves to the value of the GITHUB_TOKEN variable
//   "env://GITHUB_API_RETRIES?default=3&type=integer" resolves to a number

const envProtocol = 'env:';

const debug = Debug.debug('config');

export interface IEnvironmentProvider {
  get: (key: string) => string | undefined;
}

export interface IEnvironmentProviderOptions {
  provider?: IEnvironmentProvider;
  overrideValues?: Record<string, string>;
}

type EnvironmentValueType = string | number | boolean | undefined;

function getUrlIfEnvironmentVariable(value: string) {
  try {
    const u = new URL(value);
    if (u.protocol === envProtocol) {
      return u;
    }
  } catch (typeError) {
    // not a URL
  }
  return null;
}

function identifyPaths(node: object, prefix?: string): Map<string, URL> {
  prefix = prefix !== undefined ? prefix + '.' : '';
  const paths = new Map<string, URL>();
  for (const [property, value] of Object.entries(node)) {
    if (value && typeof value === 'object') {
      for (const [childPath, childUrl] of identifyPaths(value, prefix + property)) {
        paths.set(childPath, childUrl);
      }
      continue;
    }
    if (typeof value !== 'string') {
      continue;
    }
    const envUrl = getUrlIfEnvironmentVariable(value);
    if (!envUrl) {
      continue;
    }
    const originalHostname = value.substring(
      value.indexOf(envProtocol) + envProtocol.length + 2,
      value.indexOf(envProtocol) + envProtocol.length + 2 + envUrl.hostname.length
    );
    if (originalHostname.toLowerCase() === envUrl.hostname.toLowerCase()) {
      envUrl.hostname = originalHostname;
    }
    paths.set(prefix + property, envUrl);
  }
  return paths;
}

export function processEnvironmentProvider(options?: IEnvironmentProviderOptions): IEnvironmentProvider {
  return {
    get: (key: string) => {
      const { overrideValues } = options || {};
      if (overrideValues && overrideValues[key] && overrideValues[key] !== process.env[key]) {
        const overrideOrSetDescriptor = process.env[key] === undefined ? 'Setting' : 'Overriding';
        debug(`${overrideOrSetDescriptor} environment variable ${key} with the .env value instead of process.env`);
      }
      return overrideValues && overrideValues[key] ? overrideValues[key] : process.env[key];
    },
  };
}

function castValue(variableName: string, currentValue: EnvironmentValueType, type: string): EnvironmentValueType {
  switch (type) {
    case 'boolean':
    case 'bool': {
      return !!currentValue && currentValue !== 'false' && currentValue !== '0' && currentValue !== 'False';
    }
    case 'integer':
    case 'int': {
      if (currentValue === undefined) {
        return currentValue;
      }
      const attemptedValue = parseInt(String(currentValue), 10);
      if (isNaN(attemptedValue)) {
        console.warn(
          `The value "${currentValue}" for the env:// variable "${variableName}" is not a valid integer. Using the original value instead.`
        );
        return currentValue;
      }
      return attemptedValue;
    }
    default: {
      throw new Error(
        `The "type" parameter for the env:// string was set to "${type}", a type that is currently not supported.`
      );
    }
  }
}

export default function createClient(options?: IEnvironmentProviderOptions) {
  options = options || {};
  const provider = options.provider || processEnvironmentProvider(options);
  return {
    resolveObjectVariables: async (object: object) => {
      const paths = identifyPaths(object);
      for (const [path, parsed] of paths) {
        const variableName = parsed.hostname;
        let variableValue: EnvironmentValueType = provider.get(variableName);
        const defaultValue = parsed.searchParams.get('default');
        // Support for default variables
        if (variableValue === undefined && defaultValue !== null) {
          variableValue = defaultValue;
        }
        const type = parsed.searchParams.get('type');
        if (type) {
          variableValue = castValue(variableName, variableValue, type);
        }
        objectPath.set(object, path, variableValue);
      }
    },
  };
}

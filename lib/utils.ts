//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

export function sleep(milliseconds: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(() => {
      process.nextTick(resolve);
    }, milliseconds);
  });
}

export function readFileToText(filename: string): Promise<string> {
  return new Promise((resolve, reject) => {
    return fs.readFile(filename, 'utf8', (error, data) => {
      return error ? reject(error) : resolve(data);
    });
  });
}

export function writeTextToFile(filename: string, stringContent: string): Promise<void> {
  return new Promise((resolve, reject) => {
    return fs.writeFile(filename, stringContent, 'utf8', (error) => {
      if (error) {
        console.warn(`Trouble writing ${filename} ${error}`);
      }
      return error ? reject(error) : resolve();
    });
  });
}

export async function writeTextToFileAtomically(filename: string, stringContent: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filename), { recursive: true });
  const temporaryFilename = `${filename}.tmp`;
  await writeTextToFile(temporaryFilename, stringContent);
  await fs.promises.rename(temporaryFilename, filename);
}

export function splitCommaSeparated(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry);
}

type PackageIdentity = {
  name: string;
  version: string;
};

let packageIdentity: PackageIdentity | undefined;

export function getPackageIdentity(): PackageIdentity {
  if (packageIdentity) {
    return packageIdentity;
  }
  // Source runs sit one directory below the root; compiled output two
  const dirname = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.resolve(dirname, '..', 'package.json'), path.resolve(dirname, '..', '..', 'package.json')]) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'name' in parsed && 'version' in parsed) {
      packageIdentity = { name: String(parsed.name), version: String(parsed.version) };
      return packageIdentity;
    }
  }
  packageIdentity = { name: 'cost-center-sync', version: '0.0.0' };
  return packageIdentity;
}

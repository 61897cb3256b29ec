#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createProcessCliIo, runStackwatchCli } from './index.js';

interface PackageManifest {
  readonly name?: string;
  readonly version?: string;
  readonly description?: string;
}

const MANIFEST_NAME = '@stackwatch/cli';

const readManifest = (manifestPath: string): PackageManifest | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(manifestPath, 'utf8'));
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }
  const record: object = parsed;
  const read = (key: string): string | undefined => {
    const value: unknown = Reflect.get(record, key);
    return typeof value === 'string' ? value : undefined;
  };
  const name = read('name');
  const version = read('version');
  const description = read('description');
  return {
    ...(name === undefined ? {} : { name }),
    ...(version === undefined ? {} : { version }),
    ...(description === undefined ? {} : { description }),
  };
};

const loadPackageManifest = (): PackageManifest => {
  let directory = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    // Missing or unreadable manifests are skipped while walking up the tree.
    const manifest = readManifest(path.join(directory, 'package.json'));
    if (manifest?.name === MANIFEST_NAME) {
      return manifest;
    }

    const parentDirectory = path.dirname(directory);
    if (parentDirectory === directory) {
      return {};
    }

    directory = parentDirectory;
  }
};

const packageManifest = loadPackageManifest();
const io = createProcessCliIo({ process });

const exitCode = await runStackwatchCli({
  programName: 'stackwatch',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

if (process.argv.length <= 2) {
  io.writeOut('Run `stackwatch watch --help` to get started.\n');
}

io.exit(exitCode);

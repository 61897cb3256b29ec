import path from 'node:path';

import { loadConfigModule } from '@stackwatch/core/config';
import type { LogLevel } from '@stackwatch/core/logging';
import { z } from 'zod';

export {
  findConfigPath,
  resolveConfigPath,
  type ResolveConfigPathOptions,
} from '@stackwatch/core/config';

export const DEFAULT_TEMPLATE_FILE = 'template.yaml';

/**
 * Watch settings after validation. Paths are absolute.
 */
export interface WatchConfig {
  readonly template: string;
  readonly ignore: readonly string[];
  readonly logLevel?: LogLevel;
}

/**
 * Result object returned when configuration data has been loaded and normalised from disk.
 */
export interface LoadedWatchConfig {
  readonly path: string;
  readonly directory: string;
  readonly config: WatchConfig;
}

/**
 * Loads a stackwatch configuration file and validates its shape.
 *
 * @param configPath - Path to the configuration file.
 * @returns The validated configuration with the template resolved against the file's directory.
 * @throws {Error} When the file is missing or holds an unexpected shape.
 */
export async function loadWatchConfig(configPath: string): Promise<LoadedWatchConfig> {
  const loaded = await loadConfigModule<unknown>({ path: configPath });
  return {
    path: loaded.path,
    directory: loaded.directory,
    config: parseWatchConfig(loaded.config, loaded.directory),
  };
}

/**
 * Validates raw configuration data.
 *
 * @param value - Value exported by the configuration file.
 * @param configDirectory - Directory relative paths are resolved against.
 */
export function parseWatchConfig(value: unknown, configDirectory: string): WatchConfig {
  const parsed = createWatchConfigSchema().parse(value ?? {});
  return {
    template: path.resolve(configDirectory, parsed.template),
    ignore: parsed.ignore,
    ...(parsed.logLevel ? { logLevel: parsed.logLevel } : {}),
  };
}

function createWatchConfigSchema() {
  const nonEmptyString = z
    .string()
    .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

  return z
    .object({
      template: nonEmptyString.default(DEFAULT_TEMPLATE_FILE),
      ignore: z.array(nonEmptyString).default([]),
      logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    })
    .strict();
}

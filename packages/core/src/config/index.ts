import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

const MODULE_NAME = 'stackwatch';

/** Search order inside a directory. `package.json` counts only with a `stackwatch` key. */
export const DEFAULT_STACKWATCH_CONFIG_FILES = Object.freeze([
  'stackwatch.config.mjs',
  'stackwatch.config.js',
  'stackwatch.config.cjs',
  'stackwatch.config.json',
  '.stackwatchrc',
  '.stackwatchrc.json',
  '.stackwatchrc.yaml',
  '.stackwatchrc.yml',
  'package.json',
] as const);

/** Exports consulted, in order, when a config module has no usable default export. */
const MODULE_EXPORT_KEYS = ['default', 'config', 'watchConfig'] as const;

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  /** Explicit file, relative to `cwd`. It must exist. */
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule<TConfig = unknown> {
  readonly path: string;
  readonly directory: string;
  readonly config: TConfig;
}

/**
 * Raised when an explicitly named configuration file does not exist, or when discovery was
 * required and found nothing.
 */
export class ConfigNotFoundError extends Error {
  constructor(
    message: string,
    readonly searchedPath: string,
  ) {
    super(message);
    this.name = 'ConfigNotFoundError';
  }
}

const importConfigModule: Loader = async (filepath) => {
  const imported: unknown = await import(pathToFileURL(filepath).href);
  if (typeof imported !== 'object' || imported === null) {
    return imported;
  }
  const exports: Record<string, unknown> = { ...imported };
  const key = MODULE_EXPORT_KEYS.find((candidate) => exports[candidate] !== undefined);
  return key === undefined ? exports : exports[key];
};

// Function exports are called and promises awaited until a plain value remains.
async function unwrapExport(candidate: unknown): Promise<unknown> {
  let value = candidate;
  while (typeof value === 'function' || value instanceof Promise) {
    value = typeof value === 'function' ? value() : await value;
  }
  return value;
}

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      ...defaultLoaders,
      '.js': importConfigModule,
      '.mjs': importConfigModule,
      '.cjs': importConfigModule,
    },
    transform: async (result: CosmiconfigResult) =>
      result ? { ...result, config: await unwrapExport(result.config) } : result,
  });
}

async function loadExplicit(
  explorer: ReturnType<typeof createExplorer>,
  filePath: string,
  missingMessage: string,
): Promise<Exclude<CosmiconfigResult, null>> {
  let result: CosmiconfigResult;
  try {
    result = await explorer.load(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigNotFoundError(missingMessage, filePath);
    }
    throw error;
  }
  if (!result || result.isEmpty) {
    throw new ConfigNotFoundError(missingMessage, filePath);
  }
  return result;
}

/**
 * Searches the working directory for a configuration file without failing when none exists.
 *
 * @returns The discovered path, or `undefined`.
 */
export async function findConfigPath(
  options: Omit<ResolveConfigPathOptions, 'configPath'> = {},
): Promise<string | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const explorer = createExplorer(options.candidates ?? DEFAULT_STACKWATCH_CONFIG_FILES, cwd);
  const result = await explorer.search(cwd);
  return result && !result.isEmpty ? result.filepath : undefined;
}

/**
 * Determines the absolute path to a stackwatch configuration file. An explicit `configPath`
 * wins over discovery.
 *
 * @throws {ConfigNotFoundError} When the explicit file is missing or discovery finds nothing.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    const explorer = createExplorer(DEFAULT_STACKWATCH_CONFIG_FILES, cwd);
    const resolvedPath = path.resolve(cwd, options.configPath);
    const loaded = await loadExplicit(
      explorer,
      resolvedPath,
      `Configuration file not found: ${options.configPath}`,
    );
    return loaded.filepath;
  }

  const discovered = await findConfigPath({
    cwd,
    ...(options.candidates ? { candidates: options.candidates } : {}),
  });
  if (!discovered) {
    throw new ConfigNotFoundError(
      'Unable to locate stackwatch configuration file in the current directory.',
      cwd,
    );
  }
  return discovered;
}

/**
 * Loads a configuration file, calling exported factories and awaiting exported promises.
 * The value is returned as found; callers validate it.
 *
 * @throws {ConfigNotFoundError} When the file does not exist or is empty.
 */
export async function loadConfigModule<TConfig = unknown>(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule<TConfig>> {
  const resolvedPath = path.resolve(options.cwd ?? process.cwd(), options.path);
  const explorer = createExplorer(DEFAULT_STACKWATCH_CONFIG_FILES, path.dirname(resolvedPath));
  const result = await loadExplicit(
    explorer,
    resolvedPath,
    `Configuration file not found at ${resolvedPath}`,
  );

  return {
    path: result.filepath,
    directory: path.dirname(result.filepath),
    config: result.config,
  };
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

import path from 'node:path';
import process from 'node:process';

import type { StructuredLogger } from '@stackwatch/core/logging';
import { writeJson, writeLine, type WritableTarget } from '@stackwatch/core/reporting';
import {
  ChokidarPathObserver,
  findConfigPath,
  loadWatchConfig,
  parseWatchConfig,
  resolveConfigPath,
  startWatchSession,
  type PathObserverPort,
  type WatchConfig,
  type WatchSessionHandle,
} from '@stackwatch/sync';

import type { CliKernelContext } from '../../kernel/types.js';
import { isInteractiveStream } from '../../utils/streams.js';
import { formatWatchChange, serialiseWatchChange } from './format-change.js';
import type { WatchCommandOptions } from './options.js';

export interface WatchCommandDependencies {
  readonly cwd?: string;
  readonly findConfigPath?: typeof findConfigPath;
  readonly resolveConfigPath?: typeof resolveConfigPath;
  readonly loadWatchConfig?: typeof loadWatchConfig;
  readonly startWatchSession?: typeof startWatchSession;
  readonly createObserver?: (options: {
    readonly ignored: readonly string[];
    readonly logger: StructuredLogger;
  }) => PathObserverPort;
}

export interface ExecuteWatchCommandOptions {
  readonly options: WatchCommandOptions;
  readonly context: CliKernelContext;
  readonly dependencies?: WatchCommandDependencies;
}

/**
 * Loads the configuration, watches the application until SIGINT or SIGTERM, and prints one
 * line for every reported change.
 */
export const executeWatchCommand = async ({
  options,
  context,
  dependencies = {},
}: ExecuteWatchCommandOptions): Promise<void> => {
  const { io } = context;
  const globals = context.getGlobalOptions();
  const cwd = dependencies.cwd ?? process.cwd();
  const config = await readWatchConfig(options, cwd, dependencies);
  const templatePath = options.template ? path.resolve(cwd, options.template) : config.template;
  const logger = context.createLogger(config.logLevel);
  const createObserver =
    dependencies.createObserver ??
    ((observerOptions) => new ChokidarPathObserver(observerOptions));
  const start = dependencies.startWatchSession ?? startWatchSession;

  const stdout: WritableTarget = { write: (line: string) => io.writeOut(line) };
  const observer = createObserver({ ignored: config.ignore, logger });

  let session: WatchSessionHandle;
  try {
    session = await start({
      templatePath,
      observer,
      logger,
      onChange: (change) => {
        if (globals.logFormat === 'json') {
          writeJson(stdout, { event: 'change', ...serialiseWatchChange(change) });
        } else {
          writeLine(stdout, formatWatchChange(change, cwd));
        }
      },
    });
  } catch (error) {
    await observer.close();
    throw error;
  }

  if (globals.logFormat === 'pretty') {
    const hint = isInteractiveStream(io.stdout) ? ' Press Ctrl+C to stop.' : '';
    writeLine(
      stdout,
      `Watching ${session.watchedResources.length} resource(s) from ${templatePath}.${hint}`,
    );
  }

  const signal = await context.waitForInterrupt();
  logger.log({
    level: 'info',
    name: 'stackwatch.cli',
    event: 'watch.interrupted',
    data: { signal },
  });
  await session.close();
};

const readWatchConfig = async (
  options: WatchCommandOptions,
  cwd: string,
  dependencies: WatchCommandDependencies,
): Promise<WatchConfig> => {
  const resolve = dependencies.resolveConfigPath ?? resolveConfigPath;
  const find = dependencies.findConfigPath ?? findConfigPath;
  const load = dependencies.loadWatchConfig ?? loadWatchConfig;

  const configPath = options.config
    ? await resolve({ cwd, configPath: options.config })
    : await find({ cwd });
  if (!configPath) {
    return parseWatchConfig({}, cwd);
  }
  const loaded = await load(configPath);
  return loaded.config;
};

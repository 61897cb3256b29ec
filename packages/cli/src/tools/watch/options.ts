import type { Command } from 'commander';

export interface WatchCommandOptions {
  readonly template?: string;
  readonly config?: string;
}

export const registerWatchOptions = (command: Command): void => {
  command
    .option('-t, --template <path>', 'Template to watch; overrides the configuration file')
    .option('-c, --config <path>', 'Path to a stackwatch configuration file');
};

const readStringOption = (options: Record<string, unknown>, key: string): string | undefined => {
  const value = options[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

export const resolveWatchOptions = (command: Command): WatchCommandOptions => {
  const options = command.opts<Record<string, unknown>>();
  const template = readStringOption(options, 'template');
  const config = readStringOption(options, 'config');
  return {
    ...(template === undefined ? {} : { template }),
    ...(config === undefined ? {} : { config }),
  } satisfies WatchCommandOptions;
};

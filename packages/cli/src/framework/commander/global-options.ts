import { InvalidOptionArgumentError, type Command } from 'commander';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '@stackwatch/core/logging';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit machine-readable JSON logs.';
const LOG_LEVEL_HELP = `Minimum log level (${LOG_LEVELS.join(', ')}).`;

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'pretty',
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
});

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', JSON_LOGS_HELP, false)
    .option('--log-level <level>', LOG_LEVEL_HELP, parseLogLevelOption);
};

export const readGlobalOptions = (program: Command): CliGlobalOptions => {
  const options = program.optsWithGlobals<{ jsonLogs?: boolean; logLevel?: LogLevel }>();

  return {
    logFormat: options.jsonLogs ? 'json' : 'pretty',
    ...(options.logLevel ? { logLevel: options.logLevel } : {}),
  };
};

const parseLogLevelOption = (value: string): LogLevel => {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  if (isLogLevel(normalized)) {
    return normalized;
  }

  throw new InvalidOptionArgumentError(
    `Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}.`,
  );
};

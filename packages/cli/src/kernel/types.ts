import type { Command } from 'commander';
import type { LogLevel, StructuredLogger } from '@stackwatch/core/logging';

import type { CliIo, CliSignal } from '../io/cli-io.js';

export type CliLogFormat = 'pretty' | 'json';

export interface CliGlobalOptions {
  readonly logFormat: CliLogFormat;
  /** Unset unless `--log-level` was passed, so configuration files can supply one. */
  readonly logLevel?: LogLevel;
}

export interface CliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export interface CliKernelContext {
  readonly io: CliIo;
  readonly getGlobalOptions: () => CliGlobalOptions;
  /** Builds a logger honouring the global format and level, falling back to `defaultLevel`. */
  readonly createLogger: (defaultLevel?: LogLevel) => StructuredLogger;
  /**
   * Resolves with the first SIGINT or SIGTERM received while the command runs. A second signal
   * before the command returns exits the process at once.
   */
  readonly waitForInterrupt: () => Promise<CliSignal>;
}

export interface CliCommandModule {
  readonly id: string;
  register(command: Command, context: CliKernelContext): void;
}

export interface CliKernel {
  register(module: CliCommandModule): CliKernel;
  run(argv?: readonly string[]): Promise<number>;
}

import process from 'node:process';

import { Command, CommanderError } from 'commander';

import {
  createDefaultGlobalOptions,
  readGlobalOptions,
  registerGlobalOptions,
} from '../framework/commander/global-options.js';
import type { CliIo, CliSignal } from '../io/cli-io.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { createCliLogger } from '../logging/create-cli-logger.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
} from './types.js';

const TERMINATION_SIGNALS: readonly CliSignal[] = ['SIGINT', 'SIGTERM'];

/** Shell convention: 128 plus the signal number. */
export const SIGNAL_EXIT_CODES: Readonly<Record<CliSignal, number>> = Object.freeze({
  SIGINT: 130,
  SIGTERM: 143,
});

const createProgram = (options: CliKernelOptions, io: CliIo): Command => {
  const program = new Command(options.programName)
    .description(options.description ?? '')
    .version(options.version)
    .configureHelp({ sortOptions: true, sortSubcommands: true })
    .configureOutput({
      writeOut: (text: string) => io.writeOut(text),
      writeErr: (text: string) => io.writeErr(text),
    })
    .showHelpAfterError('(run with --help for usage)')
    .showSuggestionAfterError()
    .exitOverride();

  registerGlobalOptions(program);
  return program;
};

/**
 * Builds the command kernel. Commands run inside {@link CliKernel.run}, which turns commander
 * outcomes and thrown errors into an exit code, and owns the termination signal listeners that
 * long running commands wait on.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createProgram(options, io);
  let globalOptions: CliGlobalOptions = createDefaultGlobalOptions();
  const signalReleases: (() => void)[] = [];

  const releaseSignals = (): void => {
    for (const release of signalReleases.splice(0)) {
      release();
    }
  };

  const subscribe = (listener: (signal: CliSignal) => void): void => {
    for (const signal of TERMINATION_SIGNALS) {
      signalReleases.push(io.onSignal(signal, () => listener(signal)));
    }
  };

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => globalOptions,
    createLogger: (defaultLevel = 'info') =>
      createCliLogger({
        io,
        format: globalOptions.logFormat,
        level: globalOptions.logLevel ?? defaultLevel,
      }),
    waitForInterrupt: () =>
      new Promise<CliSignal>((resolve) => {
        subscribe((signal) => {
          releaseSignals();
          // Shutdown is in progress; a repeated signal skips the remaining cleanup.
          subscribe((repeated) => {
            io.writeErr(`Received ${repeated} again, stopping without cleanup.\n`);
            io.exit(SIGNAL_EXIT_CODES[repeated]);
          });
          resolve(signal);
        });
      }),
  };

  program.hook('preAction', () => {
    globalOptions = readGlobalOptions(program);
  });

  return {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return this;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      try {
        await program.parseAsync([...argv], { from: 'node' });
        return 0;
      } catch (error) {
        // Commander has already written its own message.
        if (error instanceof CommanderError) {
          return error.exitCode;
        }

        const message = formatCliError(error);
        io.writeErr(message.endsWith('\n') ? message : `${message}\n`);
        return 1;
      } finally {
        releaseSignals();
      }
    },
  };
};

import process from 'node:process';

import type { CliIo, CliSignal } from './cli-io.js';

/**
 * The members of `process` the adapter uses.
 */
export interface CliProcess {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  readonly exitCode?: number | string | undefined;
  exit(code?: number | string): never;
  on(signal: CliSignal, listener: () => void): unknown;
  off(signal: CliSignal, listener: () => void): unknown;
}

export interface ProcessCliIoOptions {
  readonly process?: CliProcess;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target: CliProcess = options.process ?? process;

  return {
    stdin: target.stdin,
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    exit: (code: number): never => {
      const nonZeroExitCode =
        target.exitCode !== undefined && target.exitCode !== 0 ? target.exitCode : undefined;
      const resolvedCode = code === 0 && nonZeroExitCode !== undefined ? nonZeroExitCode : code;
      return target.exit(resolvedCode);
    },
    onSignal: (signal: CliSignal, listener: () => void) => {
      target.on(signal, listener);
      return () => {
        target.off(signal, listener);
      };
    },
  };
};

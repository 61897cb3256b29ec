import process from 'node:process';

import { createCliKernel } from './kernel/cli-kernel.js';
import type { CliIo } from './io/cli-io.js';
import type { CliKernel } from './kernel/types.js';
import { watchCommandModule } from './tools/watch/watch-command-module.js';

export interface CreateStackwatchCliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export const createStackwatchCliKernel = (options: CreateStackwatchCliKernelOptions): CliKernel => {
  const kernel = createCliKernel(options);
  kernel.register(watchCommandModule);
  return kernel;
};

export interface RunStackwatchCliOptions extends CreateStackwatchCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runStackwatchCli = async ({
  argv = process.argv,
  programName,
  version,
  description,
  io,
}: RunStackwatchCliOptions): Promise<number> => {
  const kernel = createStackwatchCliKernel({ programName, version, description, io });
  return kernel.run(argv);
};

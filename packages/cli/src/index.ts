export { SIGNAL_EXIT_CODES, createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo, type CliProcess } from './io/process-cli-io.js';
export type { CliIo, CliSignal } from './io/cli-io.js';
export { createCliLogger } from './logging/create-cli-logger.js';
export { watchCommandModule } from './tools/watch/watch-command-module.js';
export {
  executeWatchCommand,
  type ExecuteWatchCommandOptions,
  type WatchCommandDependencies,
} from './tools/watch/watch-command-runner.js';
export { createStackwatchCliKernel, runStackwatchCli } from './run-stackwatch-cli.js';

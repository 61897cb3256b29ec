import type { Command } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import { registerWatchOptions, resolveWatchOptions } from './options.js';
import { executeWatchCommand } from './watch-command-runner.js';

export const watchCommandModule: CliCommandModule = {
  id: 'sync.watch',
  register(program, context) {
    const watchCommand = program
      .command('watch')
      .summary('Watch a serverless application for meaningful changes.')
      .description(
        'Watch the template, function code, layer content and API definitions of an application and report every change that would need a sync.',
      );

    registerWatchOptions(watchCommand);
    watchCommand.action(async (_options: unknown, command: Command) => {
      await executeWatchCommand({ options: resolveWatchOptions(command), context });
    });
  },
};

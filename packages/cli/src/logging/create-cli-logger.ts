import {
  JsonLineLogger,
  createLevelFilteredLogger,
  type LogLevel,
  type StructuredLogger,
} from '@stackwatch/core/logging';
import { formatLogEntry } from '@stackwatch/core/reporting';

import type { CliIo } from '../io/cli-io.js';
import type { CliLogFormat } from '../kernel/types.js';

export interface CreateCliLoggerOptions {
  readonly io: CliIo;
  readonly format: CliLogFormat;
  readonly level: LogLevel;
}

/**
 * JSON logs go to stdout one object per line. Pretty logs go to stderr, leaving stdout to
 * change notifications.
 */
export const createCliLogger = ({ io, format, level }: CreateCliLoggerOptions): StructuredLogger => {
  const destination: StructuredLogger =
    format === 'json'
      ? new JsonLineLogger({ write: (line: string) => io.writeOut(line) })
      : {
          log(entry) {
            io.writeErr(`${formatLogEntry(entry)}\n`);
          },
        };

  return createLevelFilteredLogger(destination, level);
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(['debug', 'info', 'warn', 'error']);

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export class JsonLineLogger implements StructuredLogger {
  constructor(private readonly output: { write(line: string): void }) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};

/**
 * Narrows arbitrary input to a supported log level.
 *
 * @param value - Candidate level, typically read from configuration or a CLI flag.
 * @returns `true` when the value names a known level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Wraps a logger so that entries below the minimum level are dropped.
 *
 * @param logger - Destination logger.
 * @param minimumLevel - Lowest level that is still forwarded.
 * @returns A logger honouring the threshold.
 */
export function createLevelFilteredLogger(
  logger: StructuredLogger,
  minimumLevel: LogLevel,
): StructuredLogger {
  const threshold = LOG_LEVELS.indexOf(minimumLevel);
  return {
    log(entry) {
      if (LOG_LEVELS.indexOf(entry.level) >= threshold) {
        logger.log(entry);
      }
    },
  } satisfies StructuredLogger;
}

import type { StructuredLogEvent } from '../logging/structured-logger.js';

/** Line oriented sink, such as a wrapper around a CLI output stream. */
export interface WritableTarget {
  write(line: string): void;
}

export interface SerialisedError {
  readonly name: string;
  readonly message: string;
  /** Node system error code, such as `ENOSPC` when the watch limit is exhausted. */
  readonly code?: string;
  readonly stack?: string;
  readonly cause?: SerialisedError;
}

const MAX_CAUSE_DEPTH = 3;

export function formatDurationMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

/**
 * One line summary of a thrown value: `name: message` for errors, `String(value)` otherwise.
 */
export function formatUnknownError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Converts a thrown value into a JSON friendly payload for structured log events. Error causes
 * are followed a few levels deep.
 */
export function serialiseError(error: unknown, depth = 0): SerialisedError {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) };
  }

  const code = readErrorCode(error);
  const cause =
    error.cause !== undefined && depth < MAX_CAUSE_DEPTH
      ? serialiseError(error.cause, depth + 1)
      : undefined;
  return {
    name: error.name,
    message: error.message,
    ...(code ? { code } : {}),
    ...(error.stack ? { stack: error.stack } : {}),
    ...(cause ? { cause } : {}),
  };
}

/**
 * Renders a log event as `[level] event (elapsed) {data}`, leaving out the parts it lacks.
 */
export function formatLogEntry(entry: StructuredLogEvent): string {
  const elapsed = entry.elapsedMs === undefined ? '' : ` (${formatDurationMs(entry.elapsedMs)})`;
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.level}] ${entry.event}${elapsed}${data}`;
}

export function writeJson(target: WritableTarget, payload: unknown): void {
  writeLine(target, JSON.stringify(payload));
}

export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}\n`);
}

function readErrorCode(error: Error): string | undefined {
  if (!('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

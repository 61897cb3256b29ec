export {
  formatDurationMs,
  formatLogEntry,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
} from './formatting.js';

export type { SerialisedError, WritableTarget } from './formatting.js';

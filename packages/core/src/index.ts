export {
  JsonLineLogger,
  LOG_LEVELS,
  createLevelFilteredLogger,
  isLogLevel,
  noopLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  formatDurationMs,
  formatLogEntry,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
  type SerialisedError,
  type WritableTarget,
} from './reporting/index.js';

export {
  ConfigNotFoundError,
  DEFAULT_STACKWATCH_CONFIG_FILES,
  findConfigPath,
  loadConfigModule,
  resolveConfigPath,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
  type ResolveConfigPathOptions,
} from './config/index.js';

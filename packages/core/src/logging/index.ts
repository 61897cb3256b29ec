export {
  JsonLineLogger,
  LOG_LEVELS,
  createLevelFilteredLogger,
  isLogLevel,
  noopLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';

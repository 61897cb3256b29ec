export {
  FunctionNotFoundError,
  MissingCodeUriError,
  MissingDefinitionUriError,
  ResourceNotFoundError,
  TriggerResolutionError,
  isTriggerResolutionError,
} from './domain/errors.js';
export type * from './domain/ports/index.js';
export { ResourceIdentifier, type ResourceIdentifierLike } from './domain/resource-identifier.js';
export {
  API_DEFINITION_PROPERTY,
  API_RESOURCE_TYPES,
  FUNCTION_RESOURCE_TYPES,
  LAYER_RESOURCE_TYPES,
  NESTED_STACK_RESOURCE_TYPES,
  ResourceTypes,
  walkStacks,
  type ResourceRecord,
  type Stack,
} from './domain/stacks.js';

export * from './providers/index.js';
export * from './triggers/index.js';

export {
  DefinitionValidator,
  type DefinitionValidatorOptions,
} from './validation/definition-validator.js';

export {
  ChokidarPathObserver,
  createChokidarWatcher,
  type ChokidarPathObserverOptions,
  type FileSystemWatcherFactory,
  type FileSystemWatcherHandle,
  type FileSystemWatcherOptions,
  type RawWatchEvent,
} from './infrastructure/watch/chokidar-observer.js';

export {
  startWatchSession,
  type WatchChange,
  type WatchSessionHandle,
  type WatchSessionOptions,
} from './application/watch-session.js';
export {
  DEFAULT_TEMPLATE_FILE,
  findConfigPath,
  loadWatchConfig,
  parseWatchConfig,
  resolveConfigPath,
  type LoadedWatchConfig,
  type ResolveConfigPathOptions,
  type WatchConfig,
} from './application/configuration/config-loader.js';

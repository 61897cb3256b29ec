export type {
  AnyInTreeRule,
  ChangeCallback,
  ExactFileRule,
  FileChangeEvent,
  FileChangeType,
  MatchRule,
  PathObserverPort,
  WatchRegistration,
  WatchTarget,
} from './watchers.js';
export type {
  FunctionResource,
  LayerVersion,
  PackageType,
  StackResourcesPort,
} from './resources.js';
export type { DefinitionValidatorFactory, DefinitionValidatorPort } from './validation.js';

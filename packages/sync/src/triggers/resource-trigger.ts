import type { StackResourcesPort } from '../domain/ports/resources.js';
import type { DefinitionValidatorFactory } from '../domain/ports/validation.js';
import type { WatchTarget } from '../domain/ports/watchers.js';
import { DefinitionValidator } from '../validation/definition-validator.js';

export type TriggerKind = 'template' | 'function-code' | 'layer-code' | 'api-definition';

/**
 * Resolves one resource into the targets an observer should register.
 *
 * All lookups happen when the trigger is constructed. `resolve()` is idempotent, has no side
 * effects, and never returns an empty list.
 */
export interface ResourceTrigger {
  readonly kind: TriggerKind;
  resolve(): readonly WatchTarget[];
}

export interface TriggerDependencies {
  readonly resources?: StackResourcesPort;
  readonly createValidator?: DefinitionValidatorFactory;
}

export const defaultValidatorFactory: DefinitionValidatorFactory = (filePath) =>
  new DefinitionValidator(filePath);

import { ResourceNotFoundError } from '../domain/errors.js';
import type { ChangeCallback } from '../domain/ports/watchers.js';
import { ResourceIdentifier, type ResourceIdentifierLike } from '../domain/resource-identifier.js';
import {
  API_RESOURCE_TYPES,
  FUNCTION_RESOURCE_TYPES,
  LAYER_RESOURCE_TYPES,
  type Stack,
} from '../domain/stacks.js';
import { defaultStackResources } from '../providers/index.js';
import { ApiDefinitionTrigger } from './api-definition-trigger.js';
import {
  createLambdaImageCodeTrigger,
  createLambdaZipCodeTrigger,
} from './function-code-trigger.js';
import { LayerCodeTrigger } from './layer-code-trigger.js';
import type { ResourceTrigger, TriggerDependencies } from './resource-trigger.js';

/**
 * Selects and constructs the trigger matching a resource's type.
 *
 * @returns The trigger, or `undefined` for resource types that carry no local code.
 * @throws {TriggerResolutionError} Whatever the selected trigger raises while resolving.
 */
export function createCodeTrigger(
  identifier: ResourceIdentifierLike,
  stacks: readonly Stack[],
  onCodeChange: ChangeCallback,
  dependencies: TriggerDependencies = {},
): ResourceTrigger | undefined {
  const id = ResourceIdentifier.from(identifier);
  const resources = dependencies.resources ?? defaultStackResources;
  const resource = resources.getResourceById(stacks, id);
  if (!resource) {
    throw new ResourceNotFoundError(id.toString());
  }

  if (FUNCTION_RESOURCE_TYPES.includes(resource.Type)) {
    const packageType = resources.lookupFunction(stacks, id)?.packageType;
    return packageType === 'Image'
      ? createLambdaImageCodeTrigger(id, stacks, onCodeChange, dependencies)
      : createLambdaZipCodeTrigger(id, stacks, onCodeChange, dependencies);
  }
  if (LAYER_RESOURCE_TYPES.includes(resource.Type)) {
    return new LayerCodeTrigger(id, stacks, onCodeChange, dependencies);
  }
  if (API_RESOURCE_TYPES.includes(resource.Type)) {
    return new ApiDefinitionTrigger(id, stacks, onCodeChange, dependencies);
  }
  return undefined;
}

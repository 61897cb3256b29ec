import { ResourceNotFoundError } from '../domain/errors.js';
import type { StackResourcesPort } from '../domain/ports/resources.js';
import { ResourceIdentifier, type ResourceIdentifierLike } from '../domain/resource-identifier.js';
import type { ResourceRecord, Stack } from '../domain/stacks.js';

export interface ResolvedCodeResource {
  readonly identifier: ResourceIdentifier;
  readonly resource: ResourceRecord;
}

/**
 * First step of every code trigger: the identifier must denote a resource of the stacks.
 *
 * @throws {ResourceNotFoundError} When the lookup finds nothing.
 */
export function resolveCodeResource(
  identifier: ResourceIdentifierLike,
  stacks: readonly Stack[],
  resources: StackResourcesPort,
): ResolvedCodeResource {
  const id = ResourceIdentifier.from(identifier);
  const resource = resources.getResourceById(stacks, id);
  if (!resource) {
    throw new ResourceNotFoundError(id.toString());
  }
  return { identifier: id, resource };
}

import { ResourceIdentifier, type ResourceIdentifierLike } from '../domain/resource-identifier.js';
import {
  childStackPath,
  readStringProperty,
  walkStacks,
  type ResourceRecord,
  type Stack,
} from '../domain/stacks.js';

export interface LocatedResource {
  readonly stack: Stack;
  readonly logicalId: string;
  readonly resource: ResourceRecord;
}

/**
 * Finds a resource by identifier, falling back to a resource whose `Metadata.SamResourceId`
 * carries the requested logical id within the same stack.
 *
 * @param stacks - Stacks to search.
 * @param identifier - Identifier or its string form.
 * @returns The stack, logical id and record, or `undefined` when nothing matches.
 */
export function locateResource(
  stacks: readonly Stack[],
  identifier: ResourceIdentifierLike,
): LocatedResource | undefined {
  const id = ResourceIdentifier.from(identifier);
  for (const stack of walkStacks(stacks)) {
    if (stack.stackPath !== id.stackPath) {
      continue;
    }
    if (Object.hasOwn(stack.resources, id.logicalId)) {
      const resource = stack.resources[id.logicalId];
      if (resource) {
        return { stack, logicalId: id.logicalId, resource };
      }
    }
    for (const [logicalId, resource] of Object.entries(stack.resources)) {
      if (readStringProperty(resource.Metadata, 'SamResourceId') === id.logicalId) {
        return { stack, logicalId, resource };
      }
    }
  }
  return undefined;
}

export function getResourceById(
  stacks: readonly Stack[],
  identifier: ResourceIdentifierLike,
): ResourceRecord | undefined {
  return locateResource(stacks, identifier)?.resource;
}

/**
 * Lists an identifier for every resource of every stack, parents first.
 */
export function listResourceIdentifiers(stacks: readonly Stack[]): ResourceIdentifier[] {
  const identifiers: ResourceIdentifier[] = [];
  for (const stack of walkStacks(stacks)) {
    for (const logicalId of Object.keys(stack.resources)) {
      identifiers.push(new ResourceIdentifier(stack.stackPath, logicalId));
    }
  }
  return identifiers;
}

/**
 * Iterates every resource of the given types along with its full path.
 */
export function* resourcesOfType(
  stacks: readonly Stack[],
  types: readonly string[],
): Generator<LocatedResource & { readonly fullPath: string }> {
  for (const stack of walkStacks(stacks)) {
    for (const [logicalId, resource] of Object.entries(stack.resources)) {
      if (types.includes(resource.Type)) {
        yield { stack, logicalId, resource, fullPath: childStackPath(stack.stackPath, logicalId) };
      }
    }
  }
}

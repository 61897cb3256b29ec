import type { FunctionResource, PackageType } from '../domain/ports/resources.js';
import type { ResourceIdentifierLike } from '../domain/resource-identifier.js';
import {
  FUNCTION_RESOURCE_TYPES,
  ResourceTypes,
  childStackPath,
  isRecord,
  readStringProperty,
  type Stack,
} from '../domain/stacks.js';
import { locateResource, resourcesOfType, type LocatedResource } from './stack-resources.js';

/**
 * Resolves the function typed view of a resource. The identifier may also name a function by
 * its `FunctionName` property.
 *
 * @param stacks - Stacks to search.
 * @param identifier - Resource identifier or function name.
 * @returns The function view, or `undefined` when the identifier does not denote a function.
 */
export function lookupFunction(
  stacks: readonly Stack[],
  identifier: ResourceIdentifierLike,
): FunctionResource | undefined {
  const located = locateResource(stacks, identifier);
  if (located) {
    return FUNCTION_RESOURCE_TYPES.includes(located.resource.Type)
      ? toFunctionResource(located)
      : undefined;
  }

  const name = String(identifier);
  for (const candidate of resourcesOfType(stacks, FUNCTION_RESOURCE_TYPES)) {
    if (readStringProperty(candidate.resource.Properties, 'FunctionName') === name) {
      return toFunctionResource(candidate);
    }
  }
  return undefined;
}

/**
 * Lists every function declared across the stacks.
 */
export function listFunctions(stacks: readonly Stack[]): FunctionResource[] {
  return [...resourcesOfType(stacks, FUNCTION_RESOURCE_TYPES)].map((located) =>
    toFunctionResource(located),
  );
}

function toFunctionResource({ stack, logicalId, resource }: LocatedResource): FunctionResource {
  const properties = resource.Properties;
  const packageType: PackageType =
    readStringProperty(properties, 'PackageType') === 'Image' ? 'Image' : 'Zip';
  const serverless = resource.Type === ResourceTypes.serverlessFunction;
  const code = properties?.['Code'];

  const codeUri =
    packageType === 'Zip'
      ? serverless
        ? readStringProperty(properties, 'CodeUri')
        : typeof code === 'string' && code.length > 0
          ? code
          : undefined
      : undefined;
  const imageUri = serverless
    ? readStringProperty(properties, 'ImageUri')
    : isRecord(code)
      ? readStringProperty(code, 'ImageUri')
      : undefined;
  const handler = readStringProperty(properties, 'Handler');
  const runtime = readStringProperty(properties, 'Runtime');

  return {
    name: logicalId,
    fullPath: childStackPath(stack.stackPath, logicalId),
    resourceType: resource.Type,
    packageType,
    ...(codeUri ? { codeUri } : {}),
    ...(imageUri ? { imageUri } : {}),
    ...(handler ? { handler } : {}),
    ...(runtime ? { runtime } : {}),
    ...(resource.Metadata ? { metadata: resource.Metadata } : {}),
  } satisfies FunctionResource;
}

import type { LayerVersion } from '../domain/ports/resources.js';
import type { ResourceIdentifierLike } from '../domain/resource-identifier.js';
import {
  LAYER_RESOURCE_TYPES,
  ResourceTypes,
  childStackPath,
  readStringProperty,
  type Stack,
} from '../domain/stacks.js';
import { locateResource, resourcesOfType, type LocatedResource } from './stack-resources.js';

export function lookupLayer(
  stacks: readonly Stack[],
  identifier: ResourceIdentifierLike,
): LayerVersion | undefined {
  const located = locateResource(stacks, identifier);
  if (!located || !LAYER_RESOURCE_TYPES.includes(located.resource.Type)) {
    return undefined;
  }
  return toLayerVersion(located);
}

export function listLayers(stacks: readonly Stack[]): LayerVersion[] {
  return [...resourcesOfType(stacks, LAYER_RESOURCE_TYPES)].map((located) =>
    toLayerVersion(located),
  );
}

function toLayerVersion({ stack, logicalId, resource }: LocatedResource): LayerVersion {
  const properties = resource.Properties;
  const codeUri = readStringProperty(
    properties,
    resource.Type === ResourceTypes.serverlessLayer ? 'ContentUri' : 'Content',
  );
  const runtimes = properties?.['CompatibleRuntimes'];
  const compatibleRuntimes = Array.isArray(runtimes)
    ? runtimes.filter((runtime): runtime is string => typeof runtime === 'string')
    : undefined;

  return {
    name: logicalId,
    fullPath: childStackPath(stack.stackPath, logicalId),
    resourceType: resource.Type,
    ...(codeUri ? { codeUri } : {}),
    ...(compatibleRuntimes ? { compatibleRuntimes } : {}),
    ...(resource.Metadata ? { metadata: resource.Metadata } : {}),
  } satisfies LayerVersion;
}

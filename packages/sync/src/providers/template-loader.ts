import { readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  ResourceTypes,
  childStackPath,
  isRecord,
  type ResourceRecord,
  type Stack,
} from '../domain/stacks.js';
import { parseTemplate } from './template-parser.js';

export class StackLoadError extends Error {
  constructor(
    message: string,
    readonly location: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'StackLoadError';
  }
}

export interface LoadStacksOptions {
  /** Name given to the root stack. Defaults to the template's base name without extension. */
  readonly stackName?: string;
  readonly readTextFile?: (filePath: string) => Promise<string>;
}

/** Properties holding local paths, per resource type. */
const LOCAL_PATH_PROPERTIES: Readonly<Record<string, readonly string[]>> = {
  [ResourceTypes.serverlessFunction]: ['CodeUri'],
  [ResourceTypes.lambdaFunction]: ['Code'],
  [ResourceTypes.serverlessLayer]: ['ContentUri'],
  [ResourceTypes.lambdaLayer]: ['Content'],
  [ResourceTypes.serverlessApi]: ['DefinitionUri'],
  [ResourceTypes.serverlessHttpApi]: ['DefinitionUri'],
  [ResourceTypes.restApi]: ['BodyS3Location'],
  [ResourceTypes.httpApi]: ['BodyS3Location'],
  [ResourceTypes.serverlessApplication]: ['Location'],
  [ResourceTypes.cloudFormationStack]: ['TemplateURL'],
};

const NESTED_LOCATION_PROPERTY: Readonly<Record<string, string>> = {
  [ResourceTypes.serverlessApplication]: 'Location',
  [ResourceTypes.cloudFormationStack]: 'TemplateURL',
};

const REMOTE_LOCATION = /^(?:s3|https?):\/\//i;

/**
 * Reads a template from disk into a root stack. Local code and definition paths are rebased
 * onto the template's directory and nested stacks with a local template are loaded as children.
 *
 * @param templatePath - Template file, relative to the working directory or absolute.
 * @param options - Root stack name and file reader overrides.
 * @returns A single element list holding the root stack.
 * @throws {StackLoadError} When a template cannot be read, parsed, or nests itself.
 */
export async function loadStacks(
  templatePath: string,
  options: LoadStacksOptions = {},
): Promise<Stack[]> {
  const location = path.resolve(templatePath);
  const readTextFile = options.readTextFile ?? ((filePath: string) => readFile(filePath, 'utf8'));
  const name = options.stackName ?? path.basename(location, path.extname(location));
  const root = await loadStack(location, '', name, readTextFile, []);
  return [root];
}

async function loadStack(
  location: string,
  stackPath: string,
  name: string,
  readTextFile: (filePath: string) => Promise<string>,
  ancestors: readonly string[],
): Promise<Stack> {
  if (ancestors.includes(location)) {
    throw new StackLoadError(`Template ${location} nests itself.`, location);
  }

  let text: string;
  try {
    text = await readTextFile(location);
  } catch (error) {
    throw new StackLoadError(`Unable to read template ${location}.`, location, { cause: error });
  }

  let template: Readonly<Record<string, unknown>>;
  try {
    template = parseTemplate(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new StackLoadError(`Unable to parse template ${location}: ${detail}`, location, {
      cause: error,
    });
  }

  const directory = path.dirname(location);
  const resources = readResources(template['Resources'], location, directory);
  const children: Stack[] = [];

  for (const [logicalId, resource] of Object.entries(resources)) {
    const locationProperty = NESTED_LOCATION_PROPERTY[resource.Type];
    const childLocation = locationProperty ? resource.Properties?.[locationProperty] : undefined;
    if (typeof childLocation !== 'string' || REMOTE_LOCATION.test(childLocation)) {
      continue;
    }
    children.push(
      await loadStack(
        childLocation,
        childStackPath(stackPath, logicalId),
        logicalId,
        readTextFile,
        [...ancestors, location],
      ),
    );
  }

  return {
    stackPath,
    name,
    location,
    resources,
    ...(children.length > 0 ? { children } : {}),
  } satisfies Stack;
}

function readResources(
  value: unknown,
  location: string,
  directory: string,
): Readonly<Record<string, ResourceRecord>> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new StackLoadError(`Resources in ${location} must be a mapping.`, location);
  }

  const resources: Record<string, ResourceRecord> = {};
  for (const [logicalId, candidate] of Object.entries(value)) {
    const type = isRecord(candidate) ? candidate['Type'] : undefined;
    if (!isRecord(candidate) || typeof type !== 'string') {
      throw new StackLoadError(`Resource ${logicalId} in ${location} must declare a Type.`, location);
    }
    resources[logicalId] = rebaseResource(
      {
        Type: type,
        ...(isRecord(candidate['Properties']) ? { Properties: candidate['Properties'] } : {}),
        ...(isRecord(candidate['Metadata']) ? { Metadata: candidate['Metadata'] } : {}),
      },
      directory,
    );
  }
  return resources;
}

function rebaseResource(resource: ResourceRecord, directory: string): ResourceRecord {
  const keys = LOCAL_PATH_PROPERTIES[resource.Type] ?? [];
  const properties = resource.Properties ? { ...resource.Properties } : undefined;
  if (properties) {
    for (const key of keys) {
      const value = properties[key];
      if (typeof value === 'string' && value.length > 0 && !REMOTE_LOCATION.test(value)) {
        properties[key] = path.resolve(directory, value);
      }
    }
  }

  const dockerContext = resource.Metadata?.['DockerContext'];
  const metadata =
    resource.Metadata && typeof dockerContext === 'string' && dockerContext.length > 0
      ? { ...resource.Metadata, DockerContext: path.resolve(directory, dockerContext) }
      : resource.Metadata;

  return {
    Type: resource.Type,
    ...(properties ? { Properties: properties } : {}),
    ...(metadata ? { Metadata: metadata } : {}),
  };
}

import type { ResourceIdentifierLike } from '../resource-identifier.js';
import type { ResourceRecord, Stack } from '../stacks.js';

export type PackageType = 'Zip' | 'Image';

/**
 * Function typed view over a template resource.
 */
export interface FunctionResource {
  readonly name: string;
  readonly fullPath: string;
  readonly resourceType: string;
  readonly packageType: PackageType;
  /** Local code location; never set for image functions. */
  readonly codeUri?: string;
  readonly imageUri?: string;
  readonly handler?: string;
  readonly runtime?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Layer typed view over a template resource.
 */
export interface LayerVersion {
  readonly name: string;
  readonly fullPath: string;
  readonly resourceType: string;
  readonly codeUri?: string;
  readonly compatibleRuntimes?: readonly string[];
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Read-only lookups over a set of stacks used by the code triggers.
 */
export interface StackResourcesPort {
  getResourceById(
    stacks: readonly Stack[],
    identifier: ResourceIdentifierLike,
  ): ResourceRecord | undefined;
  lookupFunction(
    stacks: readonly Stack[],
    identifier: ResourceIdentifierLike,
  ): FunctionResource | undefined;
  lookupLayer(stacks: readonly Stack[], identifier: ResourceIdentifierLike): LayerVersion | undefined;
}

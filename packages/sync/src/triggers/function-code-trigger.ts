import { FunctionNotFoundError, MissingCodeUriError } from '../domain/errors.js';
import type { FunctionResource } from '../domain/ports/resources.js';
import type { ChangeCallback, WatchTarget } from '../domain/ports/watchers.js';
import type { ResourceIdentifier, ResourceIdentifierLike } from '../domain/resource-identifier.js';
import type { ResourceRecord, Stack } from '../domain/stacks.js';
import { defaultStackResources } from '../providers/index.js';
import { resolveCodeResource } from './code-resource.js';
import type { ResourceTrigger, TriggerDependencies } from './resource-trigger.js';
import { createDirectoryTarget } from './watch-targets.js';

/**
 * Picks the directory holding a function's code.
 */
export type CodeLocationStrategy = (fn: FunctionResource) => string | undefined;

/** Zip functions build from their `CodeUri`. */
export const zipCodeLocation: CodeLocationStrategy = (fn) => fn.codeUri;

/** Image functions build from the `DockerContext` metadata entry. */
export const imageCodeLocation: CodeLocationStrategy = (fn) => {
  if (!fn.metadata) {
    return undefined;
  }
  const context = fn.metadata['DockerContext'];
  return typeof context === 'string' ? context : undefined;
};

/**
 * Watches the code directory of a function. Changes inside the tree and the directory being
 * created or removed all reach the callback unwrapped.
 */
export class FunctionCodeTrigger implements ResourceTrigger {
  readonly kind = 'function-code' as const;
  readonly identifier: ResourceIdentifier;
  readonly resource: ResourceRecord;
  readonly functionResource: FunctionResource;
  readonly codeUri: string;
  private readonly onCodeChange: ChangeCallback;

  /**
   * @throws {ResourceNotFoundError} When the identifier is not in the stacks.
   * @throws {FunctionNotFoundError} When the resource is not a function.
   * @throws {MissingCodeUriError} When the strategy finds no code location.
   */
  constructor(
    identifier: ResourceIdentifierLike,
    stacks: readonly Stack[],
    onCodeChange: ChangeCallback,
    codeLocation: CodeLocationStrategy,
    dependencies: TriggerDependencies = {},
  ) {
    const resources = dependencies.resources ?? defaultStackResources;
    const resolved = resolveCodeResource(identifier, stacks, resources);
    const functionResource = resources.lookupFunction(stacks, resolved.identifier);
    if (!functionResource) {
      throw new FunctionNotFoundError(resolved.identifier.toString());
    }
    const codeUri = codeLocation(functionResource);
    if (!codeUri) {
      throw new MissingCodeUriError(resolved.identifier.toString());
    }

    this.identifier = resolved.identifier;
    this.resource = resolved.resource;
    this.functionResource = functionResource;
    this.codeUri = codeUri;
    this.onCodeChange = onCodeChange;
  }

  resolve(): readonly WatchTarget[] {
    return [
      createDirectoryTarget(this.codeUri, {
        onEvent: this.onCodeChange,
        onCreate: this.onCodeChange,
        onDelete: this.onCodeChange,
      }),
    ];
  }
}

export function createLambdaZipCodeTrigger(
  identifier: ResourceIdentifierLike,
  stacks: readonly Stack[],
  onCodeChange: ChangeCallback,
  dependencies: TriggerDependencies = {},
): FunctionCodeTrigger {
  return new FunctionCodeTrigger(identifier, stacks, onCodeChange, zipCodeLocation, dependencies);
}

export function createLambdaImageCodeTrigger(
  identifier: ResourceIdentifierLike,
  stacks: readonly Stack[],
  onCodeChange: ChangeCallback,
  dependencies: TriggerDependencies = {},
): FunctionCodeTrigger {
  return new FunctionCodeTrigger(identifier, stacks, onCodeChange, imageCodeLocation, dependencies);
}

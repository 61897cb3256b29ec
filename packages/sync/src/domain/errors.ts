/**
 * Base class for failures raised while a trigger resolves its resource. These are only ever
 * thrown from trigger construction.
 */
export class TriggerResolutionError extends Error {
  constructor(
    message: string,
    readonly resourceId: string,
  ) {
    super(message);
    this.name = 'TriggerResolutionError';
  }
}

export class ResourceNotFoundError extends TriggerResolutionError {
  constructor(resourceId: string) {
    super(`Resource "${resourceId}" was not found in the supplied stacks.`, resourceId);
    this.name = 'ResourceNotFoundError';
  }
}

export class FunctionNotFoundError extends TriggerResolutionError {
  constructor(resourceId: string) {
    super(`Resource "${resourceId}" is not a function.`, resourceId);
    this.name = 'FunctionNotFoundError';
  }
}

export class MissingCodeUriError extends TriggerResolutionError {
  constructor(resourceId: string) {
    super(`Resource "${resourceId}" does not declare a local code location.`, resourceId);
    this.name = 'MissingCodeUriError';
  }
}

export class MissingDefinitionUriError extends TriggerResolutionError {
  constructor(resourceId: string) {
    super(`Resource "${resourceId}" does not declare a local definition file.`, resourceId);
    this.name = 'MissingDefinitionUriError';
  }
}

export function isTriggerResolutionError(value: unknown): value is TriggerResolutionError {
  return value instanceof TriggerResolutionError;
}

import { MissingDefinitionUriError } from '../domain/errors.js';
import type { ChangeCallback, WatchTarget } from '../domain/ports/watchers.js';
import type { ResourceIdentifier, ResourceIdentifierLike } from '../domain/resource-identifier.js';
import {
  API_DEFINITION_PROPERTY,
  readStringProperty,
  type ResourceRecord,
  type Stack,
} from '../domain/stacks.js';
import { defaultStackResources } from '../providers/index.js';
import { resolveCodeResource } from './code-resource.js';
import {
  defaultValidatorFactory,
  type ResourceTrigger,
  type TriggerDependencies,
} from './resource-trigger.js';
import { ValidationGate } from './validation-gate.js';
import { createSingleFileTarget } from './watch-targets.js';

/**
 * Watches the local definition file of an API. Events pass through the same validation gate as
 * template changes.
 *
 * Serverless APIs declare the file as `DefinitionUri`; API Gateway resources as a local
 * `BodyS3Location` path, which packaging uploads.
 */
export class ApiDefinitionTrigger implements ResourceTrigger {
  readonly kind = 'api-definition' as const;
  readonly identifier: ResourceIdentifier;
  readonly resource: ResourceRecord;
  readonly definitionFile: string;
  readonly gate: ValidationGate;

  /**
   * @throws {ResourceNotFoundError} When the identifier is not in the stacks.
   * @throws {MissingDefinitionUriError} When the definition property is absent or not a path.
   */
  constructor(
    identifier: ResourceIdentifierLike,
    stacks: readonly Stack[],
    onCodeChange: ChangeCallback,
    dependencies: TriggerDependencies = {},
  ) {
    const resources = dependencies.resources ?? defaultStackResources;
    const resolved = resolveCodeResource(identifier, stacks, resources);
    const property = API_DEFINITION_PROPERTY[resolved.resource.Type] ?? 'DefinitionUri';
    const definitionFile = readStringProperty(resolved.resource.Properties, property);
    if (!definitionFile) {
      throw new MissingDefinitionUriError(resolved.identifier.toString());
    }

    const createValidator = dependencies.createValidator ?? defaultValidatorFactory;
    this.identifier = resolved.identifier;
    this.resource = resolved.resource;
    this.definitionFile = definitionFile;
    this.gate = new ValidationGate(createValidator(definitionFile), onCodeChange);
  }

  resolve(): readonly WatchTarget[] {
    return [createSingleFileTarget(this.definitionFile, this.gate.onEvent)];
  }
}

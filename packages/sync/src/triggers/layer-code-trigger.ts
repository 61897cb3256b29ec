import { MissingCodeUriError, ResourceNotFoundError } from '../domain/errors.js';
import type { LayerVersion } from '../domain/ports/resources.js';
import type { ChangeCallback, WatchTarget } from '../domain/ports/watchers.js';
import type { ResourceIdentifier, ResourceIdentifierLike } from '../domain/resource-identifier.js';
import type { ResourceRecord, Stack } from '../domain/stacks.js';
import { defaultStackResources } from '../providers/index.js';
import { resolveCodeResource } from './code-resource.js';
import type { ResourceTrigger, TriggerDependencies } from './resource-trigger.js';
import { createDirectoryTarget } from './watch-targets.js';

/**
 * Watches the content directory of a layer version.
 */
export class LayerCodeTrigger implements ResourceTrigger {
  readonly kind = 'layer-code' as const;
  readonly identifier: ResourceIdentifier;
  readonly resource: ResourceRecord;
  readonly layer: LayerVersion;
  readonly codeUri: string;
  private readonly onCodeChange: ChangeCallback;

  /**
   * @throws {ResourceNotFoundError} When the identifier is not in the stacks or is not a layer.
   * @throws {MissingCodeUriError} When the layer declares no content location.
   */
  constructor(
    identifier: ResourceIdentifierLike,
    stacks: readonly Stack[],
    onCodeChange: ChangeCallback,
    dependencies: TriggerDependencies = {},
  ) {
    const resources = dependencies.resources ?? defaultStackResources;
    const resolved = resolveCodeResource(identifier, stacks, resources);
    const layer = resources.lookupLayer(stacks, resolved.identifier);
    // Not a layer-specific error, unlike the function trigger.
    if (!layer) {
      throw new ResourceNotFoundError(resolved.identifier.toString());
    }
    if (!layer.codeUri) {
      throw new MissingCodeUriError(resolved.identifier.toString());
    }

    this.identifier = resolved.identifier;
    this.resource = resolved.resource;
    this.layer = layer;
    this.codeUri = layer.codeUri;
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

import type { DefinitionValidatorPort } from '../domain/ports/validation.js';
import type { ChangeCallback, FileChangeEvent } from '../domain/ports/watchers.js';

/**
 * Pairs a validator with the callback it guards. Rejected validations are expected and are
 * never raised.
 */
export class ValidationGate {
  constructor(
    readonly validator: DefinitionValidatorPort,
    readonly callback: ChangeCallback,
  ) {}

  /** `forward` bound to this gate, for use as a target's `onEvent`. */
  readonly onEvent: ChangeCallback = (event) => {
    this.forward(event);
  };

  /**
   * Passes `event` to the callback when the validator accepts the current file content.
   *
   * @returns Whether the callback ran.
   */
  forward(event?: FileChangeEvent): boolean {
    if (!this.validator.validate()) {
      return false;
    }
    this.callback(event);
    return true;
  }
}

import type { DefinitionValidatorFactory } from '../domain/ports/validation.js';
import type { ChangeCallback, WatchTarget } from '../domain/ports/watchers.js';
import { defaultValidatorFactory, type ResourceTrigger } from './resource-trigger.js';
import { ValidationGate } from './validation-gate.js';
import { createSingleFileTarget } from './watch-targets.js';

export interface TemplateTriggerOptions {
  readonly createValidator?: DefinitionValidatorFactory;
}

/**
 * Watches a template file and reports only edits that still parse and change its structure.
 */
export class TemplateTrigger implements ResourceTrigger {
  readonly kind = 'template' as const;
  readonly gate: ValidationGate;

  constructor(
    readonly templateFile: string,
    onTemplateChange: ChangeCallback,
    options: TemplateTriggerOptions = {},
  ) {
    const createValidator = options.createValidator ?? defaultValidatorFactory;
    this.gate = new ValidationGate(createValidator(templateFile), onTemplateChange);
  }

  resolve(): readonly WatchTarget[] {
    return [createSingleFileTarget(this.templateFile, this.gate.onEvent)];
  }
}

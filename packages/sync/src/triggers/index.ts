export { ApiDefinitionTrigger } from './api-definition-trigger.js';
export { resolveCodeResource, type ResolvedCodeResource } from './code-resource.js';
export {
  FunctionCodeTrigger,
  createLambdaImageCodeTrigger,
  createLambdaZipCodeTrigger,
  imageCodeLocation,
  zipCodeLocation,
  type CodeLocationStrategy,
} from './function-code-trigger.js';
export { LayerCodeTrigger } from './layer-code-trigger.js';
export {
  defaultValidatorFactory,
  type ResourceTrigger,
  type TriggerDependencies,
  type TriggerKind,
} from './resource-trigger.js';
export { TemplateTrigger, type TemplateTriggerOptions } from './template-trigger.js';
export { createCodeTrigger } from './trigger-factory.js';
export { ValidationGate } from './validation-gate.js';
export {
  createDirectoryTarget,
  createSingleFileTarget,
  escapeRegExp,
  isWithin,
  matchesRule,
  type DirectoryTargetCallbacks,
} from './watch-targets.js';

import type { StackResourcesPort } from '../domain/ports/resources.js';
import { lookupFunction } from './function-provider.js';
import { lookupLayer } from './layer-provider.js';
import { getResourceById } from './stack-resources.js';

export const defaultStackResources: StackResourcesPort = Object.freeze({
  getResourceById,
  lookupFunction,
  lookupLayer,
});

export { listFunctions, lookupFunction } from './function-provider.js';
export { listLayers, lookupLayer } from './layer-provider.js';
export {
  getResourceById,
  listResourceIdentifiers,
  locateResource,
  resourcesOfType,
  type LocatedResource,
} from './stack-resources.js';
export { TemplateParseError, parseTemplate } from './template-parser.js';
export { StackLoadError, loadStacks, type LoadStacksOptions } from './template-loader.js';

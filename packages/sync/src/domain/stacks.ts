/**
 * Raw template resource as declared under `Resources`. Owned by its stack and never mutated.
 */
export interface ResourceRecord {
  readonly Type: string;
  readonly Properties?: Readonly<Record<string, unknown>>;
  readonly Metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Immutable snapshot of one template and the stacks nested beneath it.
 */
export interface Stack {
  /** Slash separated path of parent stack names; `''` for a root stack. */
  readonly stackPath: string;
  readonly name: string;
  /** Template file the stack was read from. */
  readonly location: string;
  readonly resources: Readonly<Record<string, ResourceRecord>>;
  readonly children?: readonly Stack[];
}

export const ResourceTypes = Object.freeze({
  serverlessFunction: 'AWS::Serverless::Function',
  lambdaFunction: 'AWS::Lambda::Function',
  serverlessLayer: 'AWS::Serverless::LayerVersion',
  lambdaLayer: 'AWS::Lambda::LayerVersion',
  serverlessApi: 'AWS::Serverless::Api',
  serverlessHttpApi: 'AWS::Serverless::HttpApi',
  restApi: 'AWS::ApiGateway::RestApi',
  httpApi: 'AWS::ApiGatewayV2::Api',
  serverlessApplication: 'AWS::Serverless::Application',
  cloudFormationStack: 'AWS::CloudFormation::Stack',
} as const);

export const FUNCTION_RESOURCE_TYPES: readonly string[] = [
  ResourceTypes.serverlessFunction,
  ResourceTypes.lambdaFunction,
];

export const LAYER_RESOURCE_TYPES: readonly string[] = [
  ResourceTypes.serverlessLayer,
  ResourceTypes.lambdaLayer,
];

export const API_RESOURCE_TYPES: readonly string[] = [
  ResourceTypes.serverlessApi,
  ResourceTypes.serverlessHttpApi,
  ResourceTypes.restApi,
  ResourceTypes.httpApi,
];

/** Property naming the local definition file of each API resource type. */
export const API_DEFINITION_PROPERTY: Readonly<Record<string, string>> = Object.freeze({
  [ResourceTypes.serverlessApi]: 'DefinitionUri',
  [ResourceTypes.serverlessHttpApi]: 'DefinitionUri',
  [ResourceTypes.restApi]: 'BodyS3Location',
  [ResourceTypes.httpApi]: 'BodyS3Location',
});

export const NESTED_STACK_RESOURCE_TYPES: readonly string[] = [
  ResourceTypes.serverlessApplication,
  ResourceTypes.cloudFormationStack,
];

/**
 * Joins a parent stack path with a child stack name.
 *
 * @param parentPath - Path of the parent stack, `''` for the root.
 * @param name - Logical id of the nested stack resource.
 * @returns The child stack path.
 */
export function childStackPath(parentPath: string, name: string): string {
  return parentPath ? `${parentPath}/${name}` : name;
}

/**
 * Visits every stack depth first, yielding parents before their children.
 *
 * @param stacks - Root stacks supplied by the caller.
 */
export function* walkStacks(stacks: readonly Stack[]): Generator<Stack> {
  for (const stack of stacks) {
    yield stack;
    if (stack.children && stack.children.length > 0) {
      yield* walkStacks(stack.children);
    }
  }
}

/**
 * Reads a string valued property, treating empty strings as absent.
 */
export function readStringProperty(
  record: Readonly<Record<string, unknown>> | undefined,
  key: string,
): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Narrows an unknown value to a plain string keyed record.
 */
export function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

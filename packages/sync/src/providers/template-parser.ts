import { parse, type CollectionTag, type ScalarTag } from 'yaml';

import { isRecord } from '../domain/stacks.js';

const INTRINSIC_FUNCTIONS = [
  'And',
  'Base64',
  'Cidr',
  'Equals',
  'FindInMap',
  'GetAZs',
  'ImportValue',
  'Join',
  'Not',
  'Or',
  'Select',
  'Split',
  'Sub',
  'Transform',
  'If',
] as const;

export class TemplateParseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TemplateParseError';
  }
}

/**
 * Parses a JSON or YAML template. Short-form intrinsic tags such as `!Ref` and `!GetAtt` are
 * expanded to their long form so that both spellings compare equal.
 *
 * @param text - Template source.
 * @returns The top level mapping.
 * @throws {TemplateParseError} When the text is not valid YAML or is not a mapping.
 */
export function parseTemplate(text: string): Readonly<Record<string, unknown>> {
  let document: unknown;
  try {
    document = parse(text, { customTags: INTRINSIC_TAGS, logLevel: 'error', uniqueKeys: true });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TemplateParseError(`Template is not valid YAML: ${detail}`, { cause: error });
  }
  if (!isRecord(document)) {
    throw new TemplateParseError('Template must be a mapping at the top level.');
  }
  return document;
}

function createIntrinsicTags(
  name: string,
  toLongForm: (value: unknown) => unknown,
): (ScalarTag | CollectionTag)[] {
  const tag = `!${name}`;
  return [
    { tag, resolve: (value: string) => toLongForm(value) } satisfies ScalarTag,
    {
      tag,
      collection: 'seq',
      resolve: (value) => toLongForm(value.toJSON()),
    } satisfies CollectionTag,
    {
      tag,
      collection: 'map',
      resolve: (value) => toLongForm(value.toJSON()),
    } satisfies CollectionTag,
  ];
}

const INTRINSIC_TAGS: (ScalarTag | CollectionTag)[] = [
  ...createIntrinsicTags('Ref', (value) => ({ Ref: value })),
  ...createIntrinsicTags('Condition', (value) => ({ Condition: value })),
  ...createIntrinsicTags('GetAtt', (value) => ({
    'Fn::GetAtt': typeof value === 'string' ? splitAttribute(value) : value,
  })),
  ...INTRINSIC_FUNCTIONS.flatMap((name) =>
    createIntrinsicTags(name, (value) => ({ [`Fn::${name}`]: value })),
  ),
];

function splitAttribute(value: string): string[] {
  const separator = value.indexOf('.');
  return separator === -1 ? [value] : [value.slice(0, separator), value.slice(separator + 1)];
}

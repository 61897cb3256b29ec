import { ConfigNotFoundError } from '@stackwatch/core/config';
import { StackLoadError } from '@stackwatch/sync';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { formatCliError } from './format-cli-error.js';

describe('formatCliError', () => {
  it('prefers stack traces from Error instances', () => {
    const error = new Error('boom');
    error.stack = 'Captured stack trace';

    expect(formatCliError(error)).toBe('Captured stack trace');
  });

  it('returns error messages when stack traces are unavailable', () => {
    const error = new Error('missing stack');
    error.stack = undefined;

    expect(formatCliError(error)).toBe('missing stack');
  });

  it('prints template load failures without a stack', () => {
    const error = new StackLoadError(
      'Unable to read template /app/template.yaml.',
      '/app/template.yaml',
    );

    expect(formatCliError(error)).toBe('Unable to read template /app/template.yaml.');
  });

  it('prints missing configuration files without a stack', () => {
    const error = new ConfigNotFoundError(
      'Configuration file not found: watch.json',
      '/app/watch.json',
    );

    expect(formatCliError(error)).toBe('Configuration file not found: watch.json');
  });

  it('lists configuration issues', () => {
    const result = z
      .object({ template: z.string(), ignore: z.array(z.string()) })
      .strict()
      .safeParse({ template: 1, ignore: ['ok', 2] });
    if (result.success) {
      throw new Error('Expected the sample configuration to be rejected.');
    }

    expect(formatCliError(result.error)).toBe(
      [
        'Invalid stackwatch configuration:',
        '  - template: Expected string, received number',
        '  - ignore.1: Expected string, received number',
      ].join('\n'),
    );
  });

  it('returns string errors as-is', () => {
    expect(formatCliError('plain error')).toBe('plain error');
  });

  it('inspects non-error values for debugging context', () => {
    const diagnostic = { reason: 'watch failed', details: { resource: 'Fn', code: 2 } };

    expect(formatCliError(diagnostic)).toContain("reason: 'watch failed'");
    expect(formatCliError(diagnostic)).toContain("resource: 'Fn'");
  });
});

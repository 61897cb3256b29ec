import { inspect } from 'node:util';

import { ConfigNotFoundError } from '@stackwatch/core/config';
import { StackLoadError } from '@stackwatch/sync';
import { ZodError } from 'zod';

/**
 * Renders a failure for stderr. Configuration and template problems print their message alone;
 * anything else keeps its stack for debugging.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${location}: ${issue.message}`;
    });
    return ['Invalid stackwatch configuration:', ...issues].join('\n');
  }

  if (error instanceof StackLoadError || error instanceof ConfigNotFoundError) {
    return error.message;
  }

  if (error instanceof Error) {
    return error.stack ?? error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};

import path from 'node:path';

import type { WatchChange } from '@stackwatch/sync';

const displayPath = (filePath: string, cwd: string): string => {
  const relative = path.relative(cwd, filePath);
  return relative === '' || relative.startsWith('..') || path.isAbsolute(relative)
    ? filePath
    : relative;
};

/**
 * One line describing a change, with paths shown relative to `cwd` when they lie beneath it.
 */
export const formatWatchChange = (change: WatchChange, cwd: string): string => {
  if (change.reason === 'template') {
    return `Template changed: ${displayPath(change.templatePath, cwd)}`;
  }

  if (!change.event) {
    return `Code changed: ${change.resourceId}`;
  }

  return `Code changed: ${change.resourceId} (${change.event.type} ${displayPath(change.event.path, cwd)})`;
};

/**
 * JSON payload describing a change for `--json-logs` output.
 */
export const serialiseWatchChange = (change: WatchChange): Record<string, unknown> => ({
  reason: change.reason,
  ...(change.reason === 'template'
    ? { templatePath: change.templatePath }
    : { resourceId: change.resourceId }),
  ...(change.event
    ? { path: change.event.path, type: change.event.type, isDirectory: change.event.isDirectory }
    : {}),
});

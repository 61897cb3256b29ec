import path from 'node:path';

import type {
  ChangeCallback,
  MatchRule,
  WatchTarget,
} from '../domain/ports/watchers.js';

export interface DirectoryTargetCallbacks {
  readonly onEvent: ChangeCallback;
  readonly onCreate?: ChangeCallback;
  readonly onDelete?: ChangeCallback;
}

/**
 * Escapes every character with a meaning in regular expression syntax.
 */
export function escapeRegExp(value: string): string {
  return value.replaceAll(/[.*+?^${}()|[\]\\]/g, String.raw`\$&`);
}

/**
 * Builds a target for one file. The parent directory is observed without recursion and only
 * events for the exact resolved path pass the match rule.
 *
 * @param filePath - File to watch, relative to the working directory or absolute.
 * @param onEvent - Receives matching events.
 */
export function createSingleFileTarget(filePath: string, onEvent: ChangeCallback): WatchTarget {
  const file = path.resolve(filePath);
  return {
    path: path.dirname(file),
    recursive: false,
    staticFolder: false,
    matchRule: { kind: 'exact-file', file, pattern: new RegExp(`^${escapeRegExp(file)}$`) },
    onEvent,
  };
}

/**
 * Builds a recursive target for a whole directory tree.
 *
 * @param dirPath - Directory to watch, relative to the working directory or absolute.
 * @param callbacks - `onEvent` for entries in the tree, `onCreate`/`onDelete` for the directory itself.
 */
export function createDirectoryTarget(
  dirPath: string,
  callbacks: DirectoryTargetCallbacks,
): WatchTarget {
  const root = path.resolve(dirPath);
  return {
    path: root,
    recursive: true,
    staticFolder: true,
    matchRule: { kind: 'any-in-tree', root },
    onEvent: callbacks.onEvent,
    ...(callbacks.onCreate ? { onCreate: callbacks.onCreate } : {}),
    ...(callbacks.onDelete ? { onDelete: callbacks.onDelete } : {}),
  };
}

/**
 * Evaluates a match rule against an event path. Tree rules resolve relative paths against
 * their root.
 */
export function matchesRule(rule: MatchRule, candidate: string): boolean {
  if (rule.kind === 'exact-file') {
    return rule.pattern.test(candidate);
  }
  return isWithin(rule.root, path.resolve(rule.root, candidate));
}

/**
 * @returns `true` when `candidate` is `root` or lies beneath it.
 */
export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

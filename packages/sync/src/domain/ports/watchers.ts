export type FileChangeType = 'created' | 'updated' | 'deleted';

export interface FileChangeEvent {
  readonly type: FileChangeType;
  /** Absolute path of the affected entry. */
  readonly path: string;
  readonly isDirectory: boolean;
}

/**
 * Invoked synchronously by the observer on its event delivery path. The return value is ignored.
 */
export type ChangeCallback = (event?: FileChangeEvent) => void;

export interface ExactFileRule {
  readonly kind: 'exact-file';
  /** Absolute, normalised file path. */
  readonly file: string;
  /** `^<escaped file>$`, case sensitive. */
  readonly pattern: RegExp;
}

export interface AnyInTreeRule {
  readonly kind: 'any-in-tree';
  /** Absolute, normalised root of the tree. */
  readonly root: string;
}

export type MatchRule = ExactFileRule | AnyInTreeRule;

/**
 * One path to observe and the rule deciding which of its events reach `onEvent`.
 *
 * `recursive` is `true` exactly when the target is a directory tree. Single files are observed
 * through their parent directory so that the file may be created after registration.
 */
export interface WatchTarget {
  readonly path: string;
  readonly recursive: boolean;
  /** Marks the whole subtree as one logical unit the observer may merge with enclosing trees. */
  readonly staticFolder: boolean;
  readonly matchRule: MatchRule;
  readonly onEvent: ChangeCallback;
  /** Called when the watched directory itself appears. */
  readonly onCreate?: ChangeCallback;
  /** Called when the watched directory itself disappears. */
  readonly onDelete?: ChangeCallback;
}

export interface WatchRegistration {
  close(): Promise<void>;
}

export interface PathObserverPort {
  register(targets: readonly WatchTarget[]): WatchRegistration;
  close(): Promise<void>;
}

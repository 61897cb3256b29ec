import type { DefinitionValidatorPort } from '../domain/ports/validation.js';
import type {
  PathObserverPort,
  WatchRegistration,
  WatchTarget,
} from '../domain/ports/watchers.js';
import type { ResourceRecord, Stack } from '../domain/stacks.js';
import type {
  FileSystemWatcherFactory,
  FileSystemWatcherHandle,
  FileSystemWatcherOptions,
  RawWatchEvent,
} from '../infrastructure/watch/chokidar-observer.js';

export function createStack(
  resources: Readonly<Record<string, ResourceRecord>>,
  overrides: Partial<Omit<Stack, 'resources'>> = {},
): Stack {
  return {
    stackPath: '',
    name: 'root',
    location: '/workspace/template.yaml',
    resources,
    ...overrides,
  };
}

export function onlyTarget(targets: readonly WatchTarget[]): WatchTarget {
  const [first] = targets;
  if (targets.length !== 1 || !first) {
    throw new Error(`Expected exactly one watch target, received ${targets.length}.`);
  }
  return first;
}

/**
 * Validator returning scripted results in order, then repeating the last one.
 */
export class ScriptedValidator implements DefinitionValidatorPort {
  calls = 0;

  constructor(private readonly results: readonly boolean[]) {}

  validate(): boolean {
    const index = Math.min(this.calls, this.results.length - 1);
    this.calls += 1;
    return this.results[index] ?? false;
  }
}

export class FakeFileSystemWatcher implements FileSystemWatcherHandle {
  closed = false;
  private readonly listeners: ((event: RawWatchEvent, changedPath: string) => void)[] = [];
  private readonly errorListeners: ((error: unknown) => void)[] = [];

  constructor(
    readonly target: string,
    readonly options: FileSystemWatcherOptions,
  ) {}

  onAll(listener: (event: RawWatchEvent, changedPath: string) => void): void {
    this.listeners.push(listener);
  }

  onError(listener: (error: unknown) => void): void {
    this.errorListeners.push(listener);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  emit(event: RawWatchEvent, changedPath: string): void {
    for (const listener of this.listeners) {
      listener(event, changedPath);
    }
  }

  fail(error: unknown): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }
}

export interface FakeWatcherFactory {
  readonly create: FileSystemWatcherFactory;
  readonly watchers: FakeFileSystemWatcher[];
  /** Most recently opened watcher for a path. */
  get(target: string): FakeFileSystemWatcher | undefined;
}

export function createFakeWatcherFactory(): FakeWatcherFactory {
  const watchers: FakeFileSystemWatcher[] = [];
  return {
    watchers,
    create: (target, options) => {
      const watcher = new FakeFileSystemWatcher(target, options);
      watchers.push(watcher);
      return watcher;
    },
    get: (target) => watchers.filter((watcher) => watcher.target === target).at(-1),
  };
}

export interface RecordedRegistration {
  readonly targets: readonly WatchTarget[];
  closed: boolean;
}

/**
 * Observer that records registrations instead of touching the file system.
 */
export class RecordingObserver implements PathObserverPort {
  readonly registrations: RecordedRegistration[] = [];
  closed = false;

  register(targets: readonly WatchTarget[]): WatchRegistration {
    const entry: RecordedRegistration = { targets: [...targets], closed: false };
    this.registrations.push(entry);
    return {
      close: async () => {
        entry.closed = true;
      },
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Targets of the most recent registration that is still open. */
  activeTargets(): readonly WatchTarget[] {
    return this.registrations.filter((entry) => !entry.closed).at(-1)?.targets ?? [];
  }

  /** Finds the active target observing `targetPath`, or matching it exactly for single files. */
  findTarget(targetPath: string): WatchTarget {
    const target = this.activeTargets().find((candidate) =>
      candidate.matchRule.kind === 'exact-file'
        ? candidate.matchRule.file === targetPath
        : candidate.path === targetPath,
    );
    if (!target) {
      throw new Error(`No active watch target for ${targetPath}.`);
    }
    return target;
  }
}

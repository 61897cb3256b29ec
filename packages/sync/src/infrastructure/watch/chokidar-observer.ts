import path from 'node:path';

import { watch } from 'chokidar';
import { noopLogger, type StructuredLogger } from '@stackwatch/core/logging';
import { serialiseError } from '@stackwatch/core/reporting';

import type {
  ChangeCallback,
  FileChangeEvent,
  FileChangeType,
  PathObserverPort,
  WatchRegistration,
  WatchTarget,
} from '../../domain/ports/watchers.js';
import { isWithin, matchesRule } from '../../triggers/watch-targets.js';

export type RawWatchEvent = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

export interface FileSystemWatcherOptions {
  readonly depth?: number;
  readonly ignored?: readonly string[];
  /** Report entries already present when the watcher starts. Off unless set. */
  readonly reportExisting?: boolean;
}

/**
 * Subset of a chokidar watcher the observer depends on.
 */
export interface FileSystemWatcherHandle {
  onAll(listener: (event: RawWatchEvent, changedPath: string) => void): void;
  onError(listener: (error: unknown) => void): void;
  close(): Promise<void>;
}

export type FileSystemWatcherFactory = (
  target: string,
  options: FileSystemWatcherOptions,
) => FileSystemWatcherHandle;

export interface ChokidarPathObserverOptions {
  readonly createWatcher?: FileSystemWatcherFactory;
  readonly ignored?: readonly string[];
  readonly logger?: StructuredLogger;
}

const EVENT_MAP: Record<RawWatchEvent, { type: FileChangeType; isDirectory: boolean }> = {
  add: { type: 'created', isDirectory: false },
  addDir: { type: 'created', isDirectory: true },
  change: { type: 'updated', isDirectory: false },
  unlink: { type: 'deleted', isDirectory: false },
  unlinkDir: { type: 'deleted', isDirectory: true },
};

/**
 * Opens a chokidar watcher and adapts it to {@link FileSystemWatcherHandle}.
 */
export const createChokidarWatcher: FileSystemWatcherFactory = (target, options) => {
  const watcher = watch(target, {
    ignoreInitial: options.reportExisting !== true,
    persistent: true,
    ...(options.depth === undefined ? {} : { depth: options.depth }),
    ...(options.ignored && options.ignored.length > 0 ? { ignored: [...options.ignored] } : {}),
  });
  return {
    onAll(listener) {
      watcher.on('all', (eventName, changedPath) => {
        listener(eventName, changedPath);
      });
    },
    onError(listener) {
      watcher.on('error', listener);
    },
    close: () => watcher.close(),
  } satisfies FileSystemWatcherHandle;
};

interface Channel {
  readonly path: string;
  readonly recursive: boolean;
  readonly targets: Set<WatchTarget>;
  /** Unset while the observed directory is missing or after the channel closed. */
  watcher: FileSystemWatcherHandle | undefined;
  /** Depth-0 watcher on the parent directory, waiting for the observed one to reappear. */
  parentWatcher: FileSystemWatcherHandle | undefined;
}

/**
 * Registers watch targets with chokidar, sharing one watcher per observed path.
 *
 * Recursive static folders nested inside an already observed recursive folder reuse its
 * watcher, and a newly registered enclosing folder absorbs the watchers of the folders it
 * contains. Every event is offered to all targets of its channel and reaches those whose
 * match rule accepts it.
 *
 * chokidar stops observing a root that is removed. When that happens the channel watches the
 * parent directory instead, and reopens on the root once it is created again.
 */
export class ChokidarPathObserver implements PathObserverPort {
  private readonly channels = new Map<string, Channel>();
  private readonly createWatcher: FileSystemWatcherFactory;
  private readonly ignored: readonly string[];
  private readonly logger: StructuredLogger;
  private readonly pendingClosures = new Set<Promise<void>>();

  constructor(options: ChokidarPathObserverOptions = {}) {
    this.createWatcher = options.createWatcher ?? createChokidarWatcher;
    this.ignored = options.ignored ?? [];
    this.logger = options.logger ?? noopLogger;
  }

  register(targets: readonly WatchTarget[]): WatchRegistration {
    const registered = [...targets];
    const pendingClosures: Promise<void>[] = [];
    for (const target of registered) {
      pendingClosures.push(...this.attach(target));
    }

    let closed = false;
    return {
      close: async () => {
        await Promise.all(pendingClosures);
        if (closed) {
          return;
        }
        closed = true;
        await Promise.all(registered.map((target) => this.detach(target)));
      },
    } satisfies WatchRegistration;
  }

  async close(): Promise<void> {
    const channels = [...this.channels.values()];
    this.channels.clear();
    await Promise.all(channels.map((channel) => this.closeChannel(channel)));
    await Promise.all(this.pendingClosures);
  }

  /** Paths currently observed by an open watcher. */
  watchedPaths(): string[] {
    return [...this.channels.values()].map((channel) => channel.path);
  }

  private attach(target: WatchTarget): Promise<void>[] {
    const existing = this.channels.get(channelKey(target.path, target.recursive));
    if (existing) {
      existing.targets.add(target);
      return [];
    }

    if (target.recursive && target.staticFolder) {
      const enclosing = this.findEnclosingChannel(target.path);
      if (enclosing) {
        enclosing.targets.add(target);
        return [];
      }
    }

    const channel = this.openChannel(target.path, target.recursive);
    channel.targets.add(target);
    return target.recursive && target.staticFolder ? this.absorbNestedChannels(channel) : [];
  }

  private async detach(target: WatchTarget): Promise<void> {
    for (const [key, channel] of this.channels) {
      if (!channel.targets.delete(target)) {
        continue;
      }
      if (channel.targets.size === 0) {
        this.channels.delete(key);
        await this.closeChannel(channel);
      }
      return;
    }
  }

  private findEnclosingChannel(directory: string): Channel | undefined {
    for (const channel of this.channels.values()) {
      if (channel.recursive && channel.path !== directory && isWithin(channel.path, directory)) {
        return channel;
      }
    }
    return undefined;
  }

  private absorbNestedChannels(outer: Channel): Promise<void>[] {
    const closures: Promise<void>[] = [];
    for (const [key, channel] of this.channels) {
      if (channel === outer || !channel.recursive || !isWithin(outer.path, channel.path)) {
        continue;
      }
      if (![...channel.targets].every((target) => target.staticFolder)) {
        continue;
      }
      for (const target of channel.targets) {
        outer.targets.add(target);
      }
      this.channels.delete(key);
      closures.push(this.closeChannel(channel));
    }
    return closures;
  }

  private openChannel(directory: string, recursive: boolean): Channel {
    const channel: Channel = {
      path: directory,
      recursive,
      targets: new Set(),
      watcher: undefined,
      parentWatcher: undefined,
    };
    channel.watcher = this.startWatcher(channel);

    this.channels.set(channelKey(directory, recursive), channel);
    this.logger.log({
      level: 'debug',
      name: 'stackwatch.sync',
      event: 'watch.observer.opened',
      data: { path: directory, recursive },
    });
    return channel;
  }

  private startWatcher(channel: Channel): FileSystemWatcherHandle {
    const watcher = this.createWatcher(channel.path, {
      ...(channel.recursive ? {} : { depth: 0 }),
      ignored: this.ignored,
    });
    watcher.onAll((eventName, changedPath) => {
      if (channel.watcher !== watcher) {
        return;
      }
      const event = toChangeEvent(channel.path, eventName, changedPath);
      this.dispatch(channel, event);
      if (event.type === 'deleted' && event.isDirectory && event.path === channel.path) {
        this.awaitRecreation(channel);
      }
    });
    watcher.onError((error) => {
      this.reportWatcherError(channel.path, error);
    });
    return watcher;
  }

  private awaitRecreation(channel: Channel): void {
    if (channel.parentWatcher) {
      return;
    }
    const parentDirectory = path.dirname(channel.path);
    const stale = channel.watcher;
    channel.watcher = undefined;
    if (stale) {
      this.closeInBackground(stale, channel.path);
    }

    // Existing entries are reported so a root recreated before the scan is not missed.
    const parentWatcher = this.createWatcher(parentDirectory, {
      depth: 0,
      ignored: this.ignored,
      reportExisting: true,
    });
    channel.parentWatcher = parentWatcher;
    parentWatcher.onAll((eventName, changedPath) => {
      if (
        channel.parentWatcher === parentWatcher &&
        eventName === 'addDir' &&
        path.resolve(parentDirectory, changedPath) === channel.path
      ) {
        this.restoreChannel(channel);
      }
    });
    parentWatcher.onError((error) => {
      this.reportWatcherError(parentDirectory, error);
    });
    this.logger.log({
      level: 'debug',
      name: 'stackwatch.sync',
      event: 'watch.observer.root-removed',
      data: { path: channel.path },
    });
  }

  private restoreChannel(channel: Channel): void {
    const parentWatcher = channel.parentWatcher;
    channel.parentWatcher = undefined;
    if (parentWatcher) {
      this.closeInBackground(parentWatcher, path.dirname(channel.path));
    }
    channel.watcher = this.startWatcher(channel);
    this.logger.log({
      level: 'debug',
      name: 'stackwatch.sync',
      event: 'watch.observer.root-restored',
      data: { path: channel.path },
    });
    this.dispatch(channel, { type: 'created', path: channel.path, isDirectory: true });
  }

  private async closeChannel(channel: Channel): Promise<void> {
    const watchers = [channel.watcher, channel.parentWatcher];
    channel.watcher = undefined;
    channel.parentWatcher = undefined;
    await Promise.all(
      watchers.map((watcher) => (watcher ? this.closeWatcher(watcher, channel.path) : undefined)),
    );
  }

  private closeInBackground(watcher: FileSystemWatcherHandle, directory: string): void {
    const closing = this.closeWatcher(watcher, directory).finally(() => {
      this.pendingClosures.delete(closing);
    });
    this.pendingClosures.add(closing);
  }

  private async closeWatcher(watcher: FileSystemWatcherHandle, directory: string): Promise<void> {
    try {
      await watcher.close();
    } catch (error) {
      this.logger.log({
        level: 'warn',
        name: 'stackwatch.sync',
        event: 'watch.observer.close-failed',
        data: { path: directory, error: serialiseError(error) },
      });
    }
  }

  private reportWatcherError(directory: string, error: unknown): void {
    this.logger.log({
      level: 'error',
      name: 'stackwatch.sync',
      event: 'watch.observer.error',
      data: { path: directory, error: serialiseError(error) },
    });
  }

  private dispatch(channel: Channel, event: FileChangeEvent): void {
    for (const target of [...channel.targets]) {
      const callback = selectCallback(target, event);
      if (callback) {
        this.invoke(callback, event);
      }
    }
  }

  private invoke(callback: ChangeCallback, event: FileChangeEvent): void {
    try {
      callback(event);
    } catch (error) {
      this.logger.log({
        level: 'error',
        name: 'stackwatch.sync',
        event: 'watch.callback.failed',
        data: { path: event.path, error: serialiseError(error) },
      });
    }
  }
}

function selectCallback(target: WatchTarget, event: FileChangeEvent): ChangeCallback | undefined {
  if (target.matchRule.kind === 'exact-file') {
    return !event.isDirectory && matchesRule(target.matchRule, event.path)
      ? target.onEvent
      : undefined;
  }

  if (event.isDirectory && event.path === target.path) {
    if (event.type === 'created') {
      return target.onCreate ?? target.onEvent;
    }
    if (event.type === 'deleted') {
      return target.onDelete ?? target.onEvent;
    }
  }
  return matchesRule(target.matchRule, event.path) ? target.onEvent : undefined;
}

function toChangeEvent(
  directory: string,
  eventName: RawWatchEvent,
  changedPath: string,
): FileChangeEvent {
  const mapping = EVENT_MAP[eventName];
  return {
    type: mapping.type,
    path: path.resolve(directory, changedPath),
    isDirectory: mapping.isDirectory,
  };
}

function channelKey(directory: string, recursive: boolean): string {
  return `${recursive ? 'tree' : 'dir'}:${directory}`;
}

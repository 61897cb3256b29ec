import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ChokidarPathObserver,
  createDirectoryTarget,
  type ChangeCallback,
  type FileChangeEvent,
} from '../src/index.js';

const WAIT = { timeout: 8000, interval: 250 };

describe('observing a code directory with chokidar', () => {
  let workspace: string;
  let sourceDirectory: string;
  let observer: ChokidarPathObserver;
  let events: FileChangeEvent[];

  beforeEach(async () => {
    workspace = await realpath(await mkdtemp(path.join(tmpdir(), 'stackwatch-lifecycle-')));
    sourceDirectory = path.join(workspace, 'src');
    await mkdir(sourceDirectory);
    observer = new ChokidarPathObserver();
    events = [];
  });

  afterEach(async () => {
    await observer.close();
    await rm(workspace, { recursive: true, force: true });
  });

  // Writes until the file is reported, since a fresh watcher may still be scanning.
  async function writeUntilReported(file: string): Promise<void> {
    let revision = 0;
    await vi.waitFor(async () => {
      revision += 1;
      await writeFile(file, `export const revision = ${revision};\n`, 'utf8');
      expect(events.some((event) => event.path === file)).toBe(true);
    }, WAIT);
  }

  it('keeps reporting after the directory is deleted and created again', async () => {
    const record: ChangeCallback = (event) => {
      if (event) {
        events.push(event);
      }
    };
    observer.register([
      createDirectoryTarget(sourceDirectory, { onEvent: record, onCreate: record, onDelete: record }),
    ]);

    await writeUntilReported(path.join(sourceDirectory, 'a.js'));

    await rm(sourceDirectory, { recursive: true, force: true });
    await vi.waitFor(() => {
      expect(events).toContainEqual({ type: 'deleted', path: sourceDirectory, isDirectory: true });
    }, WAIT);

    await mkdir(sourceDirectory);
    await vi.waitFor(() => {
      expect(events).toContainEqual({ type: 'created', path: sourceDirectory, isDirectory: true });
    }, WAIT);

    await writeUntilReported(path.join(sourceDirectory, 'b.js'));
    expect(observer.watchedPaths()).toEqual([sourceDirectory]);
  }, 30_000);
});

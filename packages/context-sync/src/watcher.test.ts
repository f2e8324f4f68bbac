import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createMemoryLogger, type TrackedFile } from '@ctxmirror/core';
import { ContextWatcher, type ContextWatcherOptions } from './watcher.js';
import type { ChangeEvent } from './types.js';

// ── chokidar stand-in ───────────────────────────────────────────────

interface FakeWatcher extends EventEmitter {
  paths: readonly string[];
  closed: boolean;
  close(): Promise<void>;
}

const fake = vi.hoisted(() => {
  const watchers: FakeWatcher[] = [];
  return { watchers, failNextWatch: false };
});

vi.mock('chokidar', async () => {
  const { EventEmitter } = await import('node:events');
  class Watcher extends EventEmitter implements FakeWatcher {
    closed = false;
    constructor(public paths: readonly string[]) {
      super();
    }
    async close(): Promise<void> {
      this.closed = true;
    }
  }
  return {
    watch: (paths: readonly string[]) => {
      if (fake.failNextWatch) {
        fake.failNextWatch = false;
        throw new Error('EMFILE: too many open files');
      }
      const watcher = new Watcher(paths);
      fake.watchers.push(watcher);
      return watcher;
    },
  };
});

function latestWatcher(): FakeWatcher {
  const watcher = fake.watchers.at(-1);
  if (!watcher) throw new Error('chokidar.watch() was not called');
  return watcher;
}

// ── Tests ───────────────────────────────────────────────────────────

describe('ContextWatcher', () => {
  let dir: string;
  let docPath: string;
  let trackedFiles: TrackedFile[];
  let events: ChangeEvent[];
  let watcher: ContextWatcher;

  function createWatcher(overrides: Partial<ContextWatcherOptions> = {}): ContextWatcher {
    return new ContextWatcher({
      trackedFiles,
      mergedDocumentPath: docPath,
      onEvent: (event) => events.push(event),
      logger: createMemoryLogger(),
      restartDelayMs: 1,
      ...overrides,
    });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ctxmirror-watcher-'));
    docPath = path.join(dir, '.cursorrules');
    trackedFiles = ['architecture', 'tasks'].map((key) => ({
      path: path.join(dir, '.ctxmirror', `${key}.md`),
      componentKey: key,
    }));
    events = [];
    fake.watchers.length = 0;
    fake.failNextWatch = false;
  });

  afterEach(async () => {
    vi.useRealTimers();
    await watcher.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing placeholders and watches every file', async () => {
    watcher = createWatcher();
    await watcher.start();

    expect(fs.readFileSync(trackedFiles[0].path, 'utf-8')).toBe('');
    expect(fs.readFileSync(trackedFiles[1].path, 'utf-8')).toBe('');
    expect(fs.readFileSync(docPath, 'utf-8')).toBe('{}');
    expect(latestWatcher().paths).toEqual([trackedFiles[0].path, trackedFiles[1].path, docPath]);
    expect(watcher.isWatching).toBe(true);
  });

  it('does not overwrite existing files', async () => {
    fs.mkdirSync(path.join(dir, '.ctxmirror'));
    fs.writeFileSync(trackedFiles[1].path, 'keep me');
    watcher = createWatcher();
    await watcher.start();

    expect(fs.readFileSync(trackedFiles[1].path, 'utf-8')).toBe('keep me');
  });

  it('skips a placeholder that cannot be created and still watches', async () => {
    fs.writeFileSync(path.join(dir, 'blocker'), '');
    trackedFiles = [
      { path: path.join(dir, 'blocker', 'architecture.md'), componentKey: 'architecture' },
      trackedFiles[1],
    ];
    const logger = createMemoryLogger();
    watcher = createWatcher({ logger });

    await watcher.start();

    expect(watcher.isWatching).toBe(true);
    expect(fs.readFileSync(trackedFiles[1].path, 'utf-8')).toBe('');
    expect(fs.readFileSync(docPath, 'utf-8')).toBe('{}');
    const errors = logger.filter('error');
    expect(errors).toHaveLength(1);
    expect(errors[0]?.data).toMatchObject({ componentKey: 'architecture', code: 'WRITE_FAILED' });
  });

  it('can start again after opening the watch fails', async () => {
    watcher = createWatcher();
    fake.failNextWatch = true;

    await expect(watcher.start()).rejects.toThrow('EMFILE');
    expect(watcher.isWatching).toBe(false);

    await watcher.start();
    expect(watcher.isWatching).toBe(true);
    expect(fake.watchers).toHaveLength(1);
  });

  it('collapses a burst of changes into one event after the quiet period', async () => {
    watcher = createWatcher({ debounceMs: 100 });
    await watcher.start();
    vi.useFakeTimers();
    const handle = latestWatcher();

    for (let i = 0; i < 5; i++) {
      handle.emit('change', trackedFiles[1].path);
      vi.advanceTimersByTime(30);
    }
    expect(events).toHaveLength(0);
    vi.advanceTimersByTime(100);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      path: trackedFiles[1].path,
      kind: 'modified',
      target: 'source',
      componentKey: 'tasks',
    });
  });

  it('debounces each kind separately', async () => {
    watcher = createWatcher({ debounceMs: 50 });
    await watcher.start();
    vi.useFakeTimers();
    const handle = latestWatcher();

    handle.emit('unlink', trackedFiles[0].path);
    handle.emit('add', trackedFiles[0].path);
    handle.emit('change', docPath);
    vi.advanceTimersByTime(50);

    expect(events.map((e) => [e.kind, e.target])).toEqual([
      ['deleted', 'source'],
      ['created', 'source'],
      ['modified', 'merged'],
    ]);
    expect(events[2].componentKey).toBeUndefined();
  });

  it('drops ignored paths but never the merged document', async () => {
    watcher = createWatcher({ debounceMs: 10, ignorePatterns: ['*.md', '.cursorrules'] });
    await watcher.start();
    vi.useFakeTimers();
    const handle = latestWatcher();

    handle.emit('change', trackedFiles[0].path);
    handle.emit('change', docPath);
    vi.advanceTimersByTime(10);

    expect(events.map((e) => e.target)).toEqual(['merged']);
  });

  it('cancels pending events on stop', async () => {
    watcher = createWatcher({ debounceMs: 50 });
    await watcher.start();
    vi.useFakeTimers();
    const handle = latestWatcher();

    handle.emit('change', docPath);
    expect(watcher.pendingCount).toBe(1);
    await watcher.stop();
    vi.advanceTimersByTime(100);

    expect(events).toHaveLength(0);
    expect(handle.closed).toBe(true);
    expect(watcher.isWatching).toBe(false);
  });

  it('re-establishes the watch after an error', async () => {
    watcher = createWatcher();
    await watcher.start();
    const first = latestWatcher();

    first.emit('error', new Error('EMFILE: too many open files'));

    await vi.waitFor(() => {
      expect(fake.watchers).toHaveLength(2);
    });
    expect(first.closed).toBe(true);
    expect(watcher.isWatching).toBe(true);
  });

  it('gives up after the maximum number of restarts', async () => {
    watcher = createWatcher({ maxRestarts: 1 });
    await watcher.start();

    latestWatcher().emit('error', new Error('ENOSPC'));
    await vi.waitFor(() => {
      expect(fake.watchers).toHaveLength(2);
    });
    latestWatcher().emit('error', new Error('ENOSPC'));

    await vi.waitFor(() => {
      expect(watcher.isWatching).toBe(false);
    });
    expect(fake.watchers).toHaveLength(2);
  });
});

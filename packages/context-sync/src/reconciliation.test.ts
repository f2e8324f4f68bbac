import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SyncError, createMemoryLogger, type TrackedFile } from '@ctxmirror/core';
import { BridgeQueue } from './bridge-queue.js';
import { ReconciliationEngine } from './reconciliation.js';
import { UpdateSerializer } from './update-serializer.js';
import type { ChangeEvent, UpdateOutcome } from './types.js';

const KEYS = ['architecture', 'progress', 'tasks'];

describe('ReconciliationEngine', () => {
  let dir: string;
  let docPath: string;
  let trackedFiles: TrackedFile[];
  let serializer: UpdateSerializer;
  let queue: BridgeQueue<ChangeEvent>;
  let reconciler: ReconciliationEngine;

  function sourcePath(key: string): string {
    return path.join(dir, '.ctxmirror', `${key}.md`);
  }

  function readDoc(): unknown {
    return JSON.parse(fs.readFileSync(docPath, 'utf-8'));
  }

  function sourceEvent(key: string, kind: ChangeEvent['kind'] = 'modified'): ChangeEvent {
    return { path: sourcePath(key), kind, target: 'source', componentKey: key, observedAt: Date.now() };
  }

  function mergedEvent(): ChangeEvent {
    return { path: docPath, kind: 'modified', target: 'merged', observedAt: Date.now() };
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ctxmirror-reconcile-'));
    docPath = path.join(dir, '.cursorrules');
    fs.mkdirSync(path.join(dir, '.ctxmirror'));
    trackedFiles = KEYS.map((key) => {
      fs.writeFileSync(sourcePath(key), '');
      return { path: sourcePath(key), componentKey: key };
    });

    const logger = createMemoryLogger();
    serializer = new UpdateSerializer({ mergedDocumentPath: docPath, componentKeys: KEYS, logger });
    queue = new BridgeQueue<ChangeEvent>();
    reconciler = new ReconciliationEngine({
      trackedFiles,
      mergedDocumentPath: docPath,
      serializer,
      queue,
      logger,
      retryDelayMs: 1,
    });
    await serializer.loadSnapshot();
  });

  afterEach(async () => {
    queue.close();
    await reconciler.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('syncAll', () => {
    it('writes every empty component into the merged document', async () => {
      const report = await reconciler.syncAll();

      expect(report).toEqual({ synced: ['architecture', 'progress', 'tasks'], failed: [] });
      expect(readDoc()).toEqual({ architecture: '', progress: '', tasks: '' });
    });

    it('retries a failed component once', async () => {
      const failure: UpdateOutcome = {
        ok: false,
        componentKey: 'architecture',
        reason: 'write_failed',
        error: new SyncError('disk busy', 'WRITE_FAILED', 'architecture'),
      };
      const enqueue = vi.spyOn(serializer, 'enqueue').mockResolvedValueOnce(failure);

      const report = await reconciler.syncAll();

      expect(report.synced).toEqual(['architecture', 'progress', 'tasks']);
      expect(enqueue).toHaveBeenCalledTimes(4);
    });

    it('reports a component that fails twice without blocking the rest', async () => {
      const original = serializer.enqueue.bind(serializer);
      vi.spyOn(serializer, 'enqueue').mockImplementation(async (key, content) =>
        key === 'progress'
          ? {
              ok: false,
              componentKey: key,
              reason: 'write_failed',
              error: new SyncError('disk busy', 'WRITE_FAILED', key),
            }
          : original(key, content)
      );

      const report = await reconciler.syncAll();

      expect(report).toEqual({
        synced: ['architecture', 'tasks'],
        failed: [{ componentKey: 'progress', reason: 'write_failed' }],
      });
      expect(readDoc()).toEqual({ architecture: '', tasks: '' });
    });
  });

  describe('source events', () => {
    it('pushes an edited source into the merged document', async () => {
      fs.writeFileSync(sourcePath('tasks'), 'buy milk');

      await reconciler.handle(sourceEvent('tasks'));

      expect(readDoc()).toEqual({ tasks: 'buy milk' });
    });

    it('recreates a deleted source empty and clears its component', async () => {
      fs.writeFileSync(sourcePath('progress'), 'halfway');
      await reconciler.handle(sourceEvent('progress'));
      fs.rmSync(sourcePath('progress'));

      await reconciler.handle(sourceEvent('progress', 'deleted'));

      expect(fs.readFileSync(sourcePath('progress'), 'utf-8')).toBe('');
      expect(readDoc()).toEqual({ progress: '' });
    });

    it('processes events from the queue once started', async () => {
      reconciler.start();
      fs.writeFileSync(sourcePath('architecture'), '# Plan');
      queue.push(sourceEvent('architecture'));

      await vi.waitFor(() => {
        expect(readDoc()).toEqual({ architecture: '# Plan' });
      });
    });
  });

  describe('merged document events', () => {
    it('writes an external edit back to the source file', async () => {
      fs.writeFileSync(docPath, '{"tasks":"edited in the IDE"}');

      await reconciler.handle(mergedEvent());

      expect(fs.readFileSync(sourcePath('tasks'), 'utf-8')).toBe('edited in the IDE');
      expect(serializer.snapshot().components).toEqual({ tasks: 'edited in the IDE' });
    });

    it('skips the echo of its own source write', async () => {
      fs.writeFileSync(docPath, '{"tasks":"from the IDE"}');
      await reconciler.handle(mergedEvent());
      const enqueue = vi.spyOn(serializer, 'enqueue');

      await reconciler.handle(sourceEvent('tasks'));

      expect(enqueue).not.toHaveBeenCalled();
    });

    it('leaves a corrupt document to the integrity monitor', async () => {
      fs.writeFileSync(docPath, '{"tasks":');

      await reconciler.handle(mergedEvent());

      expect(fs.readFileSync(sourcePath('tasks'), 'utf-8')).toBe('');
      expect(fs.readFileSync(docPath, 'utf-8')).toBe('{"tasks":');
    });

    it('re-diffs a deferred component after its update settles', async () => {
      fs.writeFileSync(docPath, '{"progress":"hand edit"}');

      const handled = reconciler.handle(mergedEvent());
      const update = serializer.enqueue('progress', 'programmatic');
      await handled;
      await update;

      await vi.waitFor(() => {
        expect(queue.size).toBe(1);
      });
      expect(await queue.next()).toMatchObject({ value: { target: 'merged', path: docPath } });
      expect(fs.readFileSync(sourcePath('progress'), 'utf-8')).toBe('');
    });
  });
});

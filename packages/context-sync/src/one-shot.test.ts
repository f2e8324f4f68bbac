import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createMemoryLogger, type PathSet } from '@ctxmirror/core';
import { backupPathFor } from './atomic-write.js';
import { inspect, repairOnce, restoreFromBackup, syncOnce } from './one-shot.js';

describe('one-shot operations', () => {
  let dir: string;
  let pathSet: PathSet;

  function sourcePath(key: string): string {
    return path.join(dir, '.ctxmirror', `${key}.md`);
  }

  function readDoc(): unknown {
    return JSON.parse(fs.readFileSync(pathSet.mergedDocumentPath, 'utf-8'));
  }

  function options() {
    return { pathSet, logger: createMemoryLogger() };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ctxmirror-oneshot-'));
    fs.mkdirSync(path.join(dir, '.ctxmirror'));
    pathSet = {
      projectRoot: dir,
      dataDir: path.join(dir, '.ctxmirror'),
      ide: 'windsurf',
      trackedFiles: ['architecture', 'tasks'].map((key) => ({
        path: sourcePath(key),
        componentKey: key,
      })),
      mergedDocumentPath: path.join(dir, '.windsurfrules'),
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('syncOnce writes every source into a new merged document', async () => {
    fs.writeFileSync(sourcePath('architecture'), 'hexagonal');

    const report = await syncOnce(options());

    expect(report).toEqual({ synced: ['architecture', 'tasks'], failed: [] });
    expect(readDoc()).toEqual({ architecture: 'hexagonal', tasks: '' });
  });

  it('repairOnce rebuilds a corrupt document from the sources', async () => {
    fs.writeFileSync(sourcePath('architecture'), 'a');
    fs.writeFileSync(sourcePath('tasks'), 't');
    fs.writeFileSync(pathSet.mergedDocumentPath, '{"architecture":"a","ta');

    const result = await repairOnce(options());

    expect(result.snapshot).toBe('reset');
    expect(result.report.failed).toEqual([]);
    expect(readDoc()).toEqual({ architecture: 'a', tasks: 't' });
  });

  it('restoreFromBackup puts the backup in place and updates the sources', async () => {
    fs.writeFileSync(sourcePath('tasks'), 'new');
    fs.writeFileSync(pathSet.mergedDocumentPath, '{"tasks":"new"}');
    fs.writeFileSync(backupPathFor(pathSet.mergedDocumentPath), '{"tasks":"old"}');

    const result = await restoreFromBackup(options());

    expect(result).toEqual({ restored: true, applied: ['tasks'], failed: [] });
    expect(readDoc()).toEqual({ tasks: 'old' });
    expect(fs.readFileSync(sourcePath('tasks'), 'utf-8')).toBe('old');
  });

  it('restoreFromBackup reports a missing backup', async () => {
    expect(await restoreFromBackup(options())).toEqual({ restored: false, applied: [], failed: [] });
  });

  it('inspect describes sources and the merged document', async () => {
    fs.writeFileSync(sourcePath('architecture'), 'same');
    fs.writeFileSync(pathSet.mergedDocumentPath, '{"architecture":"same","tasks":"only here"}');

    const inspection = await inspect(pathSet);

    expect(inspection.mergedDocument).toEqual({
      path: pathSet.mergedDocumentPath,
      exists: true,
      valid: true,
    });
    expect(inspection.backupExists).toBe(false);
    expect(inspection.components).toEqual([
      { componentKey: 'architecture', path: sourcePath('architecture'), exists: true, bytes: 4, inSync: true },
      { componentKey: 'tasks', path: sourcePath('tasks'), exists: false, bytes: 0, inSync: false },
    ]);
  });

  it('inspect reports why the merged document is invalid', async () => {
    fs.writeFileSync(pathSet.mergedDocumentPath, '[]');

    const inspection = await inspect(pathSet);

    expect(inspection.mergedDocument).toMatchObject({
      valid: false,
      reason: 'expected a JSON object, found an array',
    });
  });
});

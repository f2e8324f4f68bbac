/**
 * Operations that run once without watching: a full sync, a repair, and a
 * read-only inspection for status output.
 */

import * as fs from 'node:fs';
import {
  getDefaultConfig,
  type ComponentKey,
  type LogSink,
  type PathSet,
  type SyncSettings,
} from '@ctxmirror/core';
import { backupPathFor, readTextFile, writeFileAtomic } from './atomic-write.js';
import { BridgeQueue } from './bridge-queue.js';
import { parseMergedDocument } from './merged-document.js';
import { ReconciliationEngine } from './reconciliation.js';
import { UpdateSerializer, type SnapshotSource } from './update-serializer.js';
import type { ChangeEvent, SyncReport } from './types.js';

export interface OneShotOptions {
  pathSet: PathSet;
  logger: LogSink;
  settings?: Partial<SyncSettings>;
}

export interface RepairResult {
  snapshot: SnapshotSource;
  report: SyncReport;
}

export interface BackupRestoreResult {
  restored: boolean;
  /** Components written from the backup into their source files */
  applied: ComponentKey[];
  failed: ComponentKey[];
}

export interface ComponentInspection {
  componentKey: ComponentKey;
  path: string;
  exists: boolean;
  bytes: number;
  /** Source content equals the merged document's value */
  inSync: boolean;
}

export interface Inspection {
  mergedDocument: { path: string; exists: boolean; valid: boolean; reason?: string };
  backupExists: boolean;
  components: ComponentInspection[];
}

function createPipeline(options: OneShotOptions): {
  serializer: UpdateSerializer;
  reconciler: ReconciliationEngine;
} {
  const settings = { ...getDefaultConfig().sync, ...options.settings };
  const componentKeys = options.pathSet.trackedFiles.map((tracked) => tracked.componentKey);
  const serializer = new UpdateSerializer({
    mergedDocumentPath: options.pathSet.mergedDocumentPath,
    componentKeys,
    logger: options.logger,
    timeoutMs: settings.updateTimeoutMs,
    backup: settings.backup,
  });
  const reconciler = new ReconciliationEngine({
    trackedFiles: options.pathSet.trackedFiles,
    mergedDocumentPath: options.pathSet.mergedDocumentPath,
    serializer,
    queue: new BridgeQueue<ChangeEvent>(),
    logger: options.logger,
    retryDelayMs: settings.retryDelayMs,
  });
  return { serializer, reconciler };
}

/** Load the merged document and push every source file into it */
export async function syncOnce(options: OneShotOptions): Promise<SyncReport> {
  const { serializer, reconciler } = createPipeline(options);
  try {
    await serializer.loadSnapshot();
    return await reconciler.syncAll();
  } finally {
    serializer.close();
  }
}

/**
 * Recover the merged document (from its backup when corrupt, else reset to
 * empty) and rebuild it from the source files.
 */
export async function repairOnce(options: OneShotOptions): Promise<RepairResult> {
  const { serializer, reconciler } = createPipeline(options);
  try {
    const snapshot = await serializer.loadSnapshot();
    const report = await reconciler.syncAll();
    return { snapshot, report };
  } finally {
    serializer.close();
  }
}

/**
 * Put the `.old` backup back in place and write its components into the
 * source files, so both sides hold the backed-up state.
 */
export async function restoreFromBackup(options: OneShotOptions): Promise<BackupRestoreResult> {
  const { serializer } = createPipeline(options);
  const pathsByKey = new Map(
    options.pathSet.trackedFiles.map((tracked) => [tracked.componentKey, tracked.path])
  );

  try {
    if (!(await serializer.restoreBackup())) {
      return { restored: false, applied: [], failed: [] };
    }
    const result = await serializer.reconcileExternal(async (componentKey, content) => {
      const sourcePath = pathsByKey.get(componentKey);
      if (sourcePath) await writeFileAtomic(sourcePath, content);
    });
    return { restored: true, applied: result.applied, failed: result.failed };
  } finally {
    serializer.close();
  }
}

/** Read-only view of every tracked file and the merged document */
export async function inspect(pathSet: PathSet): Promise<Inspection> {
  const componentKeys = pathSet.trackedFiles.map((tracked) => tracked.componentKey);
  const raw = await readTextFile(pathSet.mergedDocumentPath);
  const parsed = raw === null ? null : parseMergedDocument(raw, componentKeys);

  const components: ComponentInspection[] = [];
  for (const tracked of pathSet.trackedFiles) {
    const content = await readTextFile(tracked.path);
    const merged = parsed?.ok ? parsed.document.components[tracked.componentKey] : undefined;
    components.push({
      componentKey: tracked.componentKey,
      path: tracked.path,
      exists: content !== null,
      bytes: content === null ? 0 : Buffer.byteLength(content, 'utf-8'),
      inSync: content !== null && merged === content,
    });
  }

  return {
    mergedDocument: {
      path: pathSet.mergedDocumentPath,
      exists: raw !== null,
      valid: parsed?.ok ?? false,
      ...(parsed && !parsed.ok ? { reason: parsed.reason } : {}),
    },
    backupExists: fs.existsSync(backupPathFor(pathSet.mergedDocumentPath)),
    components,
  };
}

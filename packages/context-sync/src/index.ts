/**
 * @ctxmirror/context-sync - Mirror component documents into one merged
 * context file and mirror edits of that file back.
 *
 * Pieces, leaves first:
 * - ContextWatcher: debounced chokidar notifications → ChangeEvents
 * - BridgeQueue: hand-off from watcher callbacks to the reconcile loop
 * - UpdateSerializer: the single, serial writer of the merged document
 * - ReconciliationEngine: source edits → merged, merged edits → sources
 * - IntegrityMonitor: periodic parse check and repair from snapshot
 * - SyncEngine: start/stop facade over all of the above
 */

// ─── Sync Engine ──────────────────────────────────────────────────

export { SyncEngine } from './sync-engine.js';
export type { SyncEngineOptions } from './sync-engine.js';
export {
  syncOnce,
  repairOnce,
  restoreFromBackup,
  inspect,
  type OneShotOptions,
  type RepairResult,
  type BackupRestoreResult,
  type Inspection,
  type ComponentInspection,
} from './one-shot.js';

// ─── Components ───────────────────────────────────────────────────

export { ContextWatcher, type ContextWatcherOptions } from './watcher.js';
export { BridgeQueue } from './bridge-queue.js';
export {
  UpdateSerializer,
  type UpdateSerializerOptions,
  type SnapshotSource,
  type SourceWriter,
} from './update-serializer.js';
export { ReconciliationEngine, type ReconciliationEngineOptions } from './reconciliation.js';
export {
  IntegrityMonitor,
  type IntegrityMonitorOptions,
  type IntegrityStatus,
} from './integrity-monitor.js';

// ─── Merged Document ──────────────────────────────────────────────

export {
  parseMergedDocument,
  serializeMergedDocument,
  emptyDocument,
  cloneDocument,
  withComponent,
  diffComponents,
  type MergedDocument,
  type ParseResult,
} from './merged-document.js';

// ─── Files & Archives ─────────────────────────────────────────────

export {
  writeFileAtomic,
  readTextFile,
  ensureFile,
  backupPathFor,
  type AtomicWriteOptions,
} from './atomic-write.js';
export {
  storeContext,
  listContexts,
  restoreContext,
  contextRoot,
  extractTitle,
  type StoredContext,
  type ArchivedContext,
  type RestoreResult,
} from './archive.js';

// ─── Types ────────────────────────────────────────────────────────

export type {
  ChangeEvent,
  ChangeKind,
  ChangeTarget,
  UpdateOutcome,
  UpdateFailureReason,
  SyncReport,
  ExternalSyncResult,
  SyncFailureRecord,
  SyncEngineStatus,
} from './types.js';

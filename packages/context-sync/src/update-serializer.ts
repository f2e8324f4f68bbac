/**
 * UpdateSerializer - the only writer of the merged document.
 *
 * Responsibilities:
 * - Accepts "set component X to content Y" requests and runs them strictly
 *   one at a time, in arrival order, behind a single promise-chain mutex
 * - Read-modify-writes the document with temp file + rename
 * - Settles every request exactly once: verified success, failure, or timeout
 * - Holds the in-memory snapshot (last document it wrote) and the set of
 *   external edits to other components it carried over while writing
 */

import {
  SyncError,
  now,
  toSyncError,
  type ComponentKey,
  type LogSink,
} from '@ctxmirror/core';
import { backupPathFor, readTextFile, writeFileAtomic } from './atomic-write.js';
import {
  cloneDocument,
  diffComponents,
  emptyDocument,
  parseMergedDocument,
  serializeMergedDocument,
  withComponent,
  type MergedDocument,
} from './merged-document.js';
import type {
  ExternalSyncResult,
  SyncFailureRecord,
  UpdateFailureReason,
  UpdateOutcome,
} from './types.js';

// ─── Types ────────────────────────────────────────────────────────

export interface UpdateSerializerOptions {
  mergedDocumentPath: string;
  componentKeys: readonly ComponentKey[];
  logger: LogSink;
  /** Bounded wait per request (default 5000 ms) */
  timeoutMs?: number;
  /** Keep `<merged document>.old` before each replace */
  backup?: boolean;
}

/** How `loadSnapshot()` found the merged document */
export type SnapshotSource = 'loaded' | 'created' | 'recovered_from_backup' | 'reset';

/** Writes a component's content to its source file */
export type SourceWriter = (componentKey: ComponentKey, content: string) => Promise<void>;

interface PendingUpdate {
  componentKey: ComponentKey;
  content: string;
  enqueuedAt: number;
  settled: boolean;
  timer: ReturnType<typeof setTimeout> | null;
  resolve: (outcome: UpdateOutcome) => void;
}

const CATEGORY = 'serializer';
const DEFAULT_TIMEOUT_MS = 5000;
const MAX_FAILURE_RECORDS = 50;
/** Rewrites allowed when the file keeps changing under a write */
const MAX_WRITE_ROUNDS = 3;

// ─── UpdateSerializer Class ───────────────────────────────────────

export class UpdateSerializer {
  private readonly mergedDocumentPath: string;
  private readonly componentKeys: readonly ComponentKey[];
  private readonly logger: LogSink;
  private readonly timeoutMs: number;
  private readonly backup: boolean;

  private current: MergedDocument = emptyDocument();
  private lockTail: Promise<void> = Promise.resolve();
  private readonly pendingCounts = new Map<ComponentKey, number>();
  private readonly settleWaiters = new Map<ComponentKey, Array<() => void>>();
  private readonly unsettled = new Set<PendingUpdate>();
  private readonly externalChanges = new Map<ComponentKey, string>();
  private writing = false;
  private repairRequested = false;
  private closed = false;
  private lastUpdate: { componentKey: ComponentKey; at: string } | null = null;
  private failures: SyncFailureRecord[] = [];

  constructor(options: UpdateSerializerOptions) {
    this.mergedDocumentPath = options.mergedDocumentPath;
    this.componentKeys = options.componentKeys;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.backup = options.backup ?? false;
  }

  // ── Snapshot ────────────────────────────────────────────────────

  /** Copy of the last document this serializer wrote (or loaded) */
  snapshot(): MergedDocument {
    return cloneDocument(this.current);
  }

  /**
   * Load the snapshot from disk. A missing document is created empty; a
   * corrupt one is replaced by its `.old` backup when that parses, otherwise
   * by an empty document.
   */
  async loadSnapshot(): Promise<SnapshotSource> {
    return this.withLock(async () => {
      const raw = await readTextFile(this.mergedDocumentPath);
      if (raw === null) {
        this.current = emptyDocument();
        await this.writeDocument(this.current, false);
        this.logger.info(CATEGORY, 'Created empty merged document', {
          path: this.mergedDocumentPath,
        });
        return 'created';
      }

      const parsed = parseMergedDocument(raw, this.componentKeys);
      if (parsed.ok) {
        this.current = parsed.document;
        return 'loaded';
      }

      this.logger.warn(CATEGORY, 'Merged document is corrupt at load', {
        path: this.mergedDocumentPath,
        reason: parsed.reason,
      });

      const backupRaw = await readTextFile(backupPathFor(this.mergedDocumentPath));
      const backup = backupRaw === null ? null : parseMergedDocument(backupRaw, this.componentKeys);
      if (backup?.ok) {
        this.current = backup.document;
        await this.writeDocument(this.current, false);
        this.logger.warn(CATEGORY, 'Restored merged document from backup', {
          backup: backupPathFor(this.mergedDocumentPath),
        });
        return 'recovered_from_backup';
      }

      this.current = emptyDocument();
      await this.writeDocument(this.current, false);
      this.logger.error(CATEGORY, 'No usable backup, merged document reset to empty', {
        path: this.mergedDocumentPath,
      });
      return 'reset';
    });
  }

  // ── Updates ─────────────────────────────────────────────────────

  /**
   * Set one component. Resolves once the write is verified, or with a failure
   * outcome (never rejects). A request that times out is dropped, not retried.
   */
  enqueue(componentKey: ComponentKey, content: string): Promise<UpdateOutcome> {
    if (!this.componentKeys.includes(componentKey)) {
      return Promise.resolve(
        this.failure(
          componentKey,
          'unknown_component',
          new SyncError(`Unknown component "${componentKey}"`, 'UNKNOWN_COMPONENT', componentKey)
        )
      );
    }
    if (this.closed) {
      return Promise.resolve(this.shutdownFailure(componentKey));
    }

    // A programmatic update supersedes an external edit not yet pulled to the source
    this.externalChanges.delete(componentKey);

    return new Promise<UpdateOutcome>((resolve) => {
      const update: PendingUpdate = {
        componentKey,
        content,
        enqueuedAt: Date.now(),
        settled: false,
        timer: null,
        resolve,
      };
      this.unsettled.add(update);
      this.adjustPending(componentKey, 1);

      update.timer = setTimeout(() => {
        this.settleFailure(
          update,
          'timeout',
          new SyncError(
            `Timed out after ${this.timeoutMs}ms waiting for update of "${componentKey}"`,
            'TIMEOUT',
            componentKey
          )
        );
      }, this.timeoutMs);

      void this.withLock(() => this.apply(update))
        .catch((error: unknown) => {
          this.settleFailure(update, 'write_failed', toSyncError(error, 'WRITE_FAILED', componentKey));
        })
        .finally(() => this.adjustPending(componentKey, -1));
    });
  }

  /** True while any queued or running update targets `componentKey` */
  isPending(componentKey: ComponentKey): boolean {
    return (this.pendingCounts.get(componentKey) ?? 0) > 0;
  }

  pendingKeys(): ComponentKey[] {
    return [...this.pendingCounts.keys()];
  }

  /** True only between the start and end of an actual document write */
  get isWriting(): boolean {
    return this.writing;
  }

  /** Resolves once no update targets `componentKey` */
  whenSettled(componentKey: ComponentKey): Promise<void> {
    if (!this.isPending(componentKey)) return Promise.resolve();
    return new Promise((resolve) => {
      const waiters = this.settleWaiters.get(componentKey) ?? [];
      waiters.push(resolve);
      this.settleWaiters.set(componentKey, waiters);
    });
  }

  // ── External edits ──────────────────────────────────────────────

  /**
   * Pull external edits back into source files. Edits are components whose
   * on-disk value differs from the snapshot, plus edits carried over by
   * earlier writes. Components with a pending update are skipped (the update
   * wins). The snapshot takes a value only after its source write succeeds.
   */
  async reconcileExternal(writeSource: SourceWriter): Promise<ExternalSyncResult> {
    return this.withLock(async () => {
      const result: ExternalSyncResult = { applied: [], deferred: [], failed: [], corrupt: false };
      const changes = new Map(this.externalChanges);

      const raw = await readTextFile(this.mergedDocumentPath);
      if (raw !== null) {
        const parsed = parseMergedDocument(raw, this.componentKeys);
        if (parsed.ok) {
          for (const key of diffComponents(this.current, parsed.document, this.componentKeys)) {
            changes.set(key, parsed.document.components[key]);
          }
          this.current = { ...this.current, extras: { ...parsed.document.extras } };
        } else {
          result.corrupt = true;
        }
      }

      for (const [componentKey, content] of changes) {
        if (this.isPending(componentKey)) {
          this.externalChanges.delete(componentKey);
          result.deferred.push(componentKey);
          continue;
        }
        try {
          await writeSource(componentKey, content);
          this.current = withComponent(this.current, componentKey, content);
          this.externalChanges.delete(componentKey);
          result.applied.push(componentKey);
        } catch (error) {
          this.externalChanges.set(componentKey, content);
          result.failed.push(componentKey);
          this.recordFailure(componentKey, 'write_failed', toSyncError(error, 'WRITE_FAILED', componentKey));
        }
      }

      if (result.applied.length > 0 || result.deferred.length > 0) {
        this.logger.info(CATEGORY, 'Reconciled external edits', {
          applied: result.applied,
          deferred: result.deferred,
        });
      }
      return result;
    });
  }

  /** Component keys carried over from disk and not yet written to their sources */
  heldExternalKeys(): ComponentKey[] {
    return [...this.externalChanges.keys()];
  }

  // ── Integrity ───────────────────────────────────────────────────

  /**
   * Rewrite the merged document from the snapshot. Without `force`, a
   * document that still parses is left alone. Returns true if it rewrote.
   */
  async restore(options: { force?: boolean } = {}): Promise<boolean> {
    return this.withLock(async () => {
      if (!options.force) {
        const raw = await readTextFile(this.mergedDocumentPath);
        if (raw !== null && parseMergedDocument(raw, this.componentKeys).ok) {
          return false;
        }
      }
      await this.writeDocument(this.current, false);
      this.repairRequested = false;
      this.logger.warn(CATEGORY, 'Merged document rewritten from in-memory snapshot', {
        path: this.mergedDocumentPath,
        components: Object.keys(this.current.components),
      });
      return true;
    });
  }

  /**
   * Replace the merged document with its `.old` backup. The snapshot is left
   * as it was, so a following `reconcileExternal` pulls the restored values
   * into the source files. Returns false when there is no usable backup.
   */
  async restoreBackup(): Promise<boolean> {
    return this.withLock(async () => {
      const backupPath = backupPathFor(this.mergedDocumentPath);
      const raw = await readTextFile(backupPath);
      const parsed = raw === null ? null : parseMergedDocument(raw, this.componentKeys);
      if (!parsed?.ok) {
        this.logger.warn(CATEGORY, 'No usable backup to restore', { backup: backupPath });
        return false;
      }
      await this.writeDocument(parsed.document, false);
      this.logger.info(CATEGORY, 'Merged document replaced by backup', { backup: backupPath });
      return true;
    });
  }

  /** Returns and clears the flag set by a failed verification */
  consumeRepairRequest(): boolean {
    const requested = this.repairRequested;
    this.repairRequested = false;
    return requested;
  }

  // ── Shutdown ────────────────────────────────────────────────────

  /**
   * Wait for queued updates to finish, up to `graceMs`.
   * Returns false when the grace period ran out first.
   */
  async drain(graceMs: number): Promise<boolean> {
    const idle = this.withLock(async () => undefined).then(() => true);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    try {
      return await Promise.race([idle, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Refuse new updates and fail every unsettled one with `shutdown` */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const remaining = [...this.unsettled];
    for (const update of remaining) {
      this.settleFailure(update, 'shutdown', this.shutdownError(update.componentKey));
    }
    if (remaining.length > 0) {
      this.logger.warn(CATEGORY, 'Force-failed unsettled updates at shutdown', {
        count: remaining.length,
      });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ── Status ──────────────────────────────────────────────────────

  get lastUpdateRecord(): { componentKey: ComponentKey; at: string } | null {
    return this.lastUpdate;
  }

  /** Most recent failures, oldest first */
  recentFailures(): SyncFailureRecord[] {
    return [...this.failures];
  }

  // ── Internals ───────────────────────────────────────────────────

  private async apply(update: PendingUpdate): Promise<void> {
    const { componentKey, content } = update;

    if (update.settled) {
      this.logger.debug(CATEGORY, 'Dropping update that already timed out', { componentKey });
      return;
    }
    if (this.closed) {
      this.settleFailure(update, 'shutdown', this.shutdownError(componentKey));
      return;
    }

    this.writing = true;
    try {
      const { document: base, fromDisk, raw } = await this.readCurrent();
      this.carryOverExternalEdits(base, componentKey);

      let next = withComponent(base, componentKey, content);
      let expected = raw;
      for (let round = 1; ; round++) {
        const text = serializeMergedDocument(next, this.componentKeys);
        const replaced = await writeFileAtomic(this.mergedDocumentPath, text, {
          backup: this.backup && fromDisk && round === 1,
          capturePrevious: true,
        });
        if (replaced === null || replaced === expected) break;

        // Someone wrote the file between our read and our rename
        const recovered = this.recoverOverwrittenEdits(replaced, next, componentKey);
        if (!recovered) break;
        if (round >= MAX_WRITE_ROUNDS) {
          this.logger.warn(CATEGORY, 'Merged document kept changing during write, edits held for reconcile', {
            componentKey,
            held: [...this.externalChanges.keys()],
          });
          break;
        }
        next = recovered;
        expected = text;
      }
      this.current = next;
      this.lastUpdate = { componentKey, at: now() };

      const readBack = await this.readComponent(componentKey);
      if (readBack !== content) {
        this.repairRequested = true;
        this.settleFailure(
          update,
          'verification_failed',
          new SyncError(
            `Verification failed for "${componentKey}": written content did not read back`,
            'VERIFICATION_FAILED',
            componentKey
          )
        );
        return;
      }

      this.logger.debug(CATEGORY, 'Update written', {
        componentKey,
        bytes: Buffer.byteLength(content, 'utf-8'),
      });
      this.settle(update, {
        ok: true,
        componentKey,
        durationMs: Date.now() - update.enqueuedAt,
      });
    } catch (error) {
      this.settleFailure(update, 'write_failed', toSyncError(error, 'WRITE_FAILED', componentKey));
    } finally {
      this.writing = false;
    }
  }

  /** The on-disk document, or the snapshot when the file is missing or corrupt */
  private async readCurrent(): Promise<{
    document: MergedDocument;
    fromDisk: boolean;
    raw: string | null;
  }> {
    const raw = await readTextFile(this.mergedDocumentPath);
    if (raw === null) {
      return { document: cloneDocument(this.current), fromDisk: false, raw };
    }
    const parsed = parseMergedDocument(raw, this.componentKeys);
    if (!parsed.ok) {
      this.logger.warn(CATEGORY, 'Merged document unreadable, writing over it from snapshot', {
        reason: parsed.reason,
      });
      return { document: cloneDocument(this.current), fromDisk: false, raw };
    }
    return { document: parsed.document, fromDisk: true, raw };
  }

  /**
   * Merge edits found in the file a write just replaced into `written`.
   * Returns the document to write again, or null when nothing was lost.
   */
  private recoverOverwrittenEdits(
    replacedRaw: string,
    written: MergedDocument,
    target: ComponentKey
  ): MergedDocument | null {
    const parsed = parseMergedDocument(replacedRaw, this.componentKeys);
    if (!parsed.ok) return null;
    const replaced = parsed.document;

    const lostKeys = diffComponents(written, replaced, this.componentKeys).filter(
      (key) => key !== target
    );
    const extrasChanged = JSON.stringify(replaced.extras) !== JSON.stringify(written.extras);
    if (lostKeys.length === 0 && !extrasChanged) return null;

    let recovered: MergedDocument = {
      components: { ...written.components },
      extras: { ...written.extras, ...replaced.extras },
    };
    for (const key of lostKeys) {
      const value = replaced.components[key];
      recovered = withComponent(recovered, key, value);
      if (!this.isPending(key)) this.externalChanges.set(key, value);
    }
    this.logger.info(CATEGORY, 'Recovered external edit that landed during a write', {
      componentKey: target,
      recovered: lostKeys,
    });
    return recovered;
  }

  /**
   * Keep external edits to other components: they stay in the document being
   * written and are held until pulled back into their source files.
   */
  private carryOverExternalEdits(base: MergedDocument, target: ComponentKey): void {
    for (const key of diffComponents(this.current, base, this.componentKeys)) {
      if (key === target || this.isPending(key)) continue;
      this.externalChanges.set(key, base.components[key]);
      this.logger.info(CATEGORY, 'Preserving external edit while writing another component', {
        componentKey: key,
        writing: target,
      });
    }
  }

  private async readComponent(componentKey: ComponentKey): Promise<string | null> {
    const raw = await readTextFile(this.mergedDocumentPath);
    if (raw === null) return null;
    const parsed = parseMergedDocument(raw, this.componentKeys);
    if (!parsed.ok) return null;
    return parsed.document.components[componentKey] ?? null;
  }

  private async writeDocument(document: MergedDocument, backup: boolean): Promise<void> {
    await writeFileAtomic(
      this.mergedDocumentPath,
      serializeMergedDocument(document, this.componentKeys),
      { backup }
    );
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lockTail.then(task);
    this.lockTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private adjustPending(componentKey: ComponentKey, delta: number): void {
    const count = (this.pendingCounts.get(componentKey) ?? 0) + delta;
    if (count > 0) {
      this.pendingCounts.set(componentKey, count);
      return;
    }
    this.pendingCounts.delete(componentKey);
    const waiters = this.settleWaiters.get(componentKey) ?? [];
    this.settleWaiters.delete(componentKey);
    for (const resolve of waiters) resolve();
  }

  private settle(update: PendingUpdate, outcome: UpdateOutcome): void {
    if (update.settled) return;
    update.settled = true;
    if (update.timer) clearTimeout(update.timer);
    this.unsettled.delete(update);
    update.resolve(outcome);
  }

  private settleFailure(update: PendingUpdate, reason: UpdateFailureReason, error: SyncError): void {
    if (update.settled) return;
    this.settle(update, this.failure(update.componentKey, reason, error));
  }

  private failure(
    componentKey: ComponentKey,
    reason: UpdateFailureReason,
    error: SyncError
  ): UpdateOutcome {
    this.recordFailure(componentKey, reason, error);
    return { ok: false, componentKey, reason, error };
  }

  private recordFailure(componentKey: ComponentKey, reason: string, error: SyncError): void {
    this.logger.error(CATEGORY, error.message, { componentKey, reason, code: error.code });
    this.failures.push({ componentKey, reason, message: error.message, at: now() });
    if (this.failures.length > MAX_FAILURE_RECORDS) {
      this.failures.splice(0, this.failures.length - MAX_FAILURE_RECORDS);
    }
  }

  private shutdownError(componentKey: ComponentKey): SyncError {
    return new SyncError(`Update of "${componentKey}" cancelled by shutdown`, 'SHUTDOWN', componentKey);
  }

  private shutdownFailure(componentKey: ComponentKey): UpdateOutcome {
    return this.failure(componentKey, 'shutdown', this.shutdownError(componentKey));
  }
}

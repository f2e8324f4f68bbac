/**
 * ReconciliationEngine - decides what every ChangeEvent means.
 *
 * - Source file changed: read it and enqueue its content
 * - Source file deleted: recreate it empty and enqueue ''
 * - Merged document changed: pull components that differ from the snapshot
 *   back into their source files, deferring any with a pending update
 *
 * Events for one component are handled in arrival order; different components
 * proceed independently. The engine's own source writes are remembered by
 * content hash so their echo does not travel back into the merged document.
 */

import {
  hash,
  sleep,
  toSyncError,
  type ComponentKey,
  type LogSink,
  type TrackedFile,
} from '@ctxmirror/core';
import { ensureFile, readTextFile, writeFileAtomic } from './atomic-write.js';
import type { BridgeQueue } from './bridge-queue.js';
import type { UpdateSerializer } from './update-serializer.js';
import type { ChangeEvent, SyncReport, UpdateOutcome } from './types.js';

// ─── Types ────────────────────────────────────────────────────────

export interface ReconciliationEngineOptions {
  trackedFiles: readonly TrackedFile[];
  mergedDocumentPath: string;
  serializer: UpdateSerializer;
  queue: BridgeQueue<ChangeEvent>;
  logger: LogSink;
  /** Wait before the single `syncAll` retry (default 200 ms) */
  retryDelayMs?: number;
  /** How long an own source write suppresses its echo (default 2000 ms) */
  echoWindowMs?: number;
}

type SyncAttempt = { ok: true } | { ok: false; reason: string };

const CATEGORY = 'reconcile';
const MERGED_CHAIN = '\0merged';
const DEFAULT_RETRY_DELAY_MS = 200;
const DEFAULT_ECHO_WINDOW_MS = 2000;

// ─── ReconciliationEngine Class ───────────────────────────────────

export class ReconciliationEngine {
  private readonly trackedFiles: readonly TrackedFile[];
  private readonly byKey = new Map<ComponentKey, TrackedFile>();
  private readonly mergedDocumentPath: string;
  private readonly serializer: UpdateSerializer;
  private readonly queue: BridgeQueue<ChangeEvent>;
  private readonly logger: LogSink;
  private readonly retryDelayMs: number;
  private readonly echoWindowMs: number;

  private loop: Promise<void> | null = null;
  private readonly chains = new Map<string, Promise<void>>();
  private readonly recentWrites = new Map<string, { digest: string; expiresAt: number }>();
  private readonly deferred = new Set<ComponentKey>();

  constructor(options: ReconciliationEngineOptions) {
    this.trackedFiles = options.trackedFiles;
    for (const tracked of options.trackedFiles) {
      this.byKey.set(tracked.componentKey, tracked);
    }
    this.mergedDocumentPath = options.mergedDocumentPath;
    this.serializer = options.serializer;
    this.queue = options.queue;
    this.logger = options.logger;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.echoWindowMs = options.echoWindowMs ?? DEFAULT_ECHO_WINDOW_MS;
  }

  // ── Lifecycle ───────────────────────────────────────────────────

  /** Start consuming the queue. The loop ends when the queue is closed. */
  start(): void {
    if (this.loop) return;
    this.loop = this.consume();
  }

  /** Wait for the loop to end (close the queue first) and in-flight handlers to finish */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.loop = null;
    if (loop) await loop;
    await Promise.all([...this.chains.values()]);
    this.chains.clear();
    this.deferred.clear();
  }

  private async consume(): Promise<void> {
    for await (const event of this.queue) {
      this.dispatch(event);
    }
  }

  private dispatch(event: ChangeEvent): void {
    const chainKey = event.target === 'merged' ? MERGED_CHAIN : (event.componentKey ?? event.path);
    const previous = this.chains.get(chainKey) ?? Promise.resolve();
    const next = previous
      .then(() => this.handle(event))
      .catch((error: unknown) => {
        this.logger.error(CATEGORY, `Failed to handle ${event.kind} of ${event.path}`, {
          error: toSyncError(error, 'WRITE_FAILED').message,
        });
      });
    this.chains.set(chainKey, next);
  }

  /** Handle one event; exposed so callers without a running loop can reuse the policy */
  async handle(event: ChangeEvent): Promise<void> {
    if (event.target === 'merged') {
      await this.reconcileMerged();
    } else {
      await this.handleSource(event);
    }
  }

  // ── Source → merged ─────────────────────────────────────────────

  private async handleSource(event: ChangeEvent): Promise<void> {
    const tracked = event.componentKey === undefined ? undefined : this.byKey.get(event.componentKey);
    if (!tracked) {
      this.logger.warn(CATEGORY, 'Event for an untracked path', { path: event.path });
      return;
    }

    let content = event.kind === 'deleted' ? null : await readTextFile(tracked.path);
    if (content === null) {
      this.rememberWrite(tracked.path, '');
      if (await ensureFile(tracked.path, '')) {
        this.logger.info(CATEGORY, 'Recreated deleted source as empty placeholder', {
          componentKey: tracked.componentKey,
        });
      }
      content = '';
    } else if (this.isEcho(tracked.path, content)) {
      this.logger.debug(CATEGORY, 'Skipping echo of own write', { componentKey: tracked.componentKey });
      return;
    }

    const outcome = await this.serializer.enqueue(tracked.componentKey, content);
    this.logOutcome(outcome);
  }

  // ── Merged → sources ────────────────────────────────────────────

  private async reconcileMerged(): Promise<void> {
    const result = await this.serializer.reconcileExternal((componentKey, content) =>
      this.writeSource(componentKey, content)
    );

    if (result.corrupt) {
      this.logger.debug(CATEGORY, 'Merged document unparsable, leaving it to the integrity monitor');
    }
    for (const componentKey of result.deferred) {
      this.scheduleRediff(componentKey);
    }
  }

  private async writeSource(componentKey: ComponentKey, content: string): Promise<void> {
    const tracked = this.byKey.get(componentKey);
    if (!tracked) return;
    this.rememberWrite(tracked.path, content);
    await writeFileAtomic(tracked.path, content);
    this.logger.info(CATEGORY, 'Applied external edit to source file', {
      componentKey,
      path: tracked.path,
    });
  }

  /** Re-diff the merged document once the update holding `componentKey` resolves */
  private scheduleRediff(componentKey: ComponentKey): void {
    if (this.deferred.has(componentKey)) return;
    this.deferred.add(componentKey);
    this.logger.debug(CATEGORY, 'External edit deferred behind pending update', { componentKey });

    void this.serializer.whenSettled(componentKey).then(() => {
      this.deferred.delete(componentKey);
      this.queue.push({
        path: this.mergedDocumentPath,
        kind: 'modified',
        target: 'merged',
        observedAt: Date.now(),
      });
    });
  }

  // ── Echo suppression ────────────────────────────────────────────

  private rememberWrite(filePath: string, content: string): void {
    this.recentWrites.set(filePath, {
      digest: hash(content),
      expiresAt: Date.now() + this.echoWindowMs,
    });
  }

  private isEcho(filePath: string, content: string): boolean {
    const recent = this.recentWrites.get(filePath);
    if (!recent) return false;
    if (recent.expiresAt < Date.now()) {
      this.recentWrites.delete(filePath);
      return false;
    }
    return recent.digest === hash(content);
  }

  // ── Full sync ───────────────────────────────────────────────────

  /**
   * Push every source file into the merged document, in tracking order.
   * A failed component is retried once after `retryDelayMs`; it never
   * blocks the components after it.
   */
  async syncAll(): Promise<SyncReport> {
    const report: SyncReport = { synced: [], failed: [] };

    for (const tracked of this.trackedFiles) {
      let attempt = await this.syncOne(tracked);
      if (!attempt.ok) {
        this.logger.warn(CATEGORY, `Sync of "${tracked.componentKey}" failed, retrying once`, {
          reason: attempt.reason,
          delayMs: this.retryDelayMs,
        });
        await sleep(this.retryDelayMs);
        attempt = await this.syncOne(tracked);
      }

      if (attempt.ok) {
        report.synced.push(tracked.componentKey);
      } else {
        report.failed.push({ componentKey: tracked.componentKey, reason: attempt.reason });
      }
    }

    this.logger.info(CATEGORY, 'Full sync finished', {
      synced: report.synced.length,
      failed: report.failed.length,
    });
    return report;
  }

  private async syncOne(tracked: TrackedFile): Promise<SyncAttempt> {
    let content: string;
    try {
      content = (await readTextFile(tracked.path)) ?? '';
    } catch (error) {
      this.logger.error(CATEGORY, toSyncError(error, 'READ_FAILED', tracked.componentKey).message, {
        componentKey: tracked.componentKey,
      });
      return { ok: false, reason: 'read_failed' };
    }

    const outcome = await this.serializer.enqueue(tracked.componentKey, content);
    return outcome.ok ? { ok: true } : { ok: false, reason: outcome.reason };
  }

  private logOutcome(outcome: UpdateOutcome): void {
    if (outcome.ok) {
      this.logger.info(CATEGORY, 'Component synced to merged document', {
        componentKey: outcome.componentKey,
        durationMs: outcome.durationMs,
      });
    } else {
      this.logger.warn(CATEGORY, 'Component update failed', {
        componentKey: outcome.componentKey,
        reason: outcome.reason,
      });
    }
  }
}

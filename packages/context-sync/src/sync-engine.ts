/**
 * SyncEngine - Keeps the component documents and the merged context file in
 * step for as long as it runs.
 *
 * Responsibilities:
 * - Wires watcher → bridge queue → reconciliation → update serializer
 * - Runs the integrity monitor beside them
 * - `start()` runs a full sync and returns its report; `stop()` drains
 *   in-flight updates within a grace period
 * - Both are idempotent
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  SyncError,
  getDefaultConfig,
  type ComponentKey,
  type LogSink,
  type PathSet,
  type SyncSettings,
} from '@ctxmirror/core';
import { BridgeQueue } from './bridge-queue.js';
import { IntegrityMonitor, type IntegrityStatus } from './integrity-monitor.js';
import { ReconciliationEngine } from './reconciliation.js';
import { UpdateSerializer } from './update-serializer.js';
import { ContextWatcher } from './watcher.js';
import type { ChangeEvent, SyncEngineStatus, SyncReport, UpdateOutcome } from './types.js';

// ─── Types ────────────────────────────────────────────────────────

/** Options for creating a SyncEngine */
export interface SyncEngineOptions {
  pathSet: PathSet;
  logger: LogSink;
  /** Overrides for the defaults in `.ctxmirror.yml` */
  settings?: Partial<SyncSettings>;
}

/** One generation of engine components; rebuilt when a stopped engine restarts */
interface EngineParts {
  serializer: UpdateSerializer;
  queue: BridgeQueue<ChangeEvent>;
  watcher: ContextWatcher;
  reconciler: ReconciliationEngine;
  monitor: IntegrityMonitor;
}

const CATEGORY = 'engine';

// ─── SyncEngine Class ─────────────────────────────────────────────

export class SyncEngine {
  private readonly pathSet: PathSet;
  private readonly logger: LogSink;
  private readonly settings: SyncSettings;
  private readonly componentKeys: ComponentKey[];
  private parts: EngineParts;

  private running = false;
  private starting: Promise<SyncReport> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: SyncEngineOptions) {
    this.pathSet = options.pathSet;
    this.logger = options.logger;
    this.settings = { ...getDefaultConfig().sync, ...options.settings };
    this.componentKeys = options.pathSet.trackedFiles.map((tracked) => tracked.componentKey);
    this.parts = this.createParts();
  }

  // ── Lifecycle ───────────────────────────────────────────────────

  /**
   * Start watching and run a full sync. Rejects only when the merged
   * document's directory cannot be prepared or its snapshot cannot be loaded.
   */
  async start(): Promise<SyncReport> {
    if (this.starting) return this.starting;
    if (this.running) return { synced: [], failed: [] };

    this.starting = this.doStart().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async doStart(): Promise<SyncReport> {
    if (this.stopping) await this.stopping;

    if (this.parts.serializer.isClosed) {
      this.parts = this.createParts();
    }

    const mergedDir = path.dirname(this.pathSet.mergedDocumentPath);
    try {
      await fs.promises.mkdir(mergedDir, { recursive: true });
      const source = await this.parts.serializer.loadSnapshot();
      this.logger.info(CATEGORY, 'Snapshot loaded', { source });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(CATEGORY, 'Engine failed to start', { error: message });
      throw new SyncError(`Cannot prepare merged document: ${message}`, 'STARTUP_FAILED', undefined, {
        cause: error,
      });
    }

    const { watcher, reconciler, monitor } = this.parts;
    await watcher.start();
    reconciler.start();
    monitor.start();
    this.running = true;

    this.logger.info(CATEGORY, 'Sync engine started', {
      mergedDocument: this.pathSet.mergedDocumentPath,
      components: this.componentKeys,
    });

    return reconciler.syncAll();
  }

  /**
   * Stop the watcher and queue, give in-flight updates the shutdown grace
   * period, then fail whatever is left with `shutdown`.
   */
  async stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.starting) {
      await Promise.allSettled([this.starting]);
    }
    if (!this.running) return;

    this.stopping = this.doStop().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async doStop(): Promise<void> {
    this.running = false;
    const { serializer, queue, watcher, reconciler, monitor } = this.parts;

    await watcher.stop();
    const dropped = queue.close();
    await reconciler.stop();

    const drained = await serializer.drain(this.settings.shutdownGraceMs);
    if (!drained) {
      this.logger.warn(CATEGORY, 'Shutdown grace period elapsed with updates in flight', {
        graceMs: this.settings.shutdownGraceMs,
      });
    }
    serializer.close();
    await monitor.stop();

    this.logger.info(CATEGORY, 'Sync engine stopped', { droppedEvents: dropped });
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Operations ──────────────────────────────────────────────────

  /** Set one component directly (bypassing its source file) */
  update(componentKey: ComponentKey, content: string): Promise<UpdateOutcome> {
    return this.parts.serializer.enqueue(componentKey, content);
  }

  /** Push every source file into the merged document */
  syncAll(): Promise<SyncReport> {
    return this.parts.reconciler.syncAll();
  }

  /** Run one integrity check now */
  checkIntegrity(): Promise<IntegrityStatus> {
    return this.parts.monitor.tick();
  }

  getStatus(): SyncEngineStatus {
    const { serializer, watcher } = this.parts;
    return {
      running: this.running,
      pendingUpdates: serializer.pendingKeys(),
      lastUpdate: serializer.lastUpdateRecord,
      errors: serializer.recentFailures(),
      snapshotKeys: Object.keys(serializer.snapshot().components),
      watching: watcher.isWatching,
    };
  }

  // ── Wiring ──────────────────────────────────────────────────────

  private createParts(): EngineParts {
    const { mergedDocumentPath, trackedFiles } = this.pathSet;
    const serializer = new UpdateSerializer({
      mergedDocumentPath,
      componentKeys: this.componentKeys,
      logger: this.logger,
      timeoutMs: this.settings.updateTimeoutMs,
      backup: this.settings.backup,
    });
    const queue = new BridgeQueue<ChangeEvent>();

    const watcher = new ContextWatcher({
      trackedFiles,
      mergedDocumentPath,
      onEvent: (event) => {
        queue.push(event);
      },
      logger: this.logger,
      debounceMs: this.settings.debounceMs,
      ignorePatterns: this.settings.ignorePatterns,
    });
    const reconciler = new ReconciliationEngine({
      trackedFiles,
      mergedDocumentPath,
      serializer,
      queue,
      logger: this.logger,
      retryDelayMs: this.settings.retryDelayMs,
    });
    const monitor = new IntegrityMonitor({
      mergedDocumentPath,
      componentKeys: this.componentKeys,
      serializer,
      logger: this.logger,
      intervalMs: this.settings.integrityIntervalMs,
    });

    return { serializer, queue, watcher, reconciler, monitor };
  }
}

/**
 * ContextWatcher - turns raw chokidar notifications for the tracked files and
 * the merged document into debounced ChangeEvents.
 *
 * The watcher never reads file content and never touches engine state: each
 * settled event is handed to `onEvent` (the bridge queue's `push`).
 */

import * as path from 'node:path';
import type { FSWatcher } from 'chokidar';
import { minimatch } from 'minimatch';
import { toSyncError, type ComponentKey, type LogSink, type TrackedFile } from '@ctxmirror/core';
import { ensureFile } from './atomic-write.js';
import type { ChangeEvent, ChangeKind } from './types.js';

// ─── Types ────────────────────────────────────────────────────────

export interface ContextWatcherOptions {
  trackedFiles: readonly TrackedFile[];
  mergedDocumentPath: string;
  onEvent: (event: ChangeEvent) => void;
  logger: LogSink;
  /** Quiet period per (path, kind) before an event is emitted (default 100 ms) */
  debounceMs?: number;
  /** minimatch globs for engine-owned artefacts; never applied to the merged document */
  ignorePatterns?: readonly string[];
  maxRestarts?: number;
  restartDelayMs?: number;
}

interface DebounceEntry {
  timer: ReturnType<typeof setTimeout>;
  event: ChangeEvent;
}

const CATEGORY = 'watcher';
const DEFAULT_DEBOUNCE_MS = 100;
const DEFAULT_IGNORE_PATTERNS = ['*.tmp', '*.old'];
const DEFAULT_MAX_RESTARTS = 3;
const DEFAULT_RESTART_DELAY_MS = 1000;

const KIND_BY_CHOKIDAR_EVENT = {
  add: 'created',
  change: 'modified',
  unlink: 'deleted',
} as const satisfies Record<string, ChangeKind>;

// ─── ContextWatcher Class ─────────────────────────────────────────

export class ContextWatcher {
  private readonly trackedByPath = new Map<string, ComponentKey>();
  private readonly mergedDocumentPath: string;
  private readonly onEvent: (event: ChangeEvent) => void;
  private readonly logger: LogSink;
  private readonly debounceMs: number;
  private readonly ignorePatterns: readonly string[];
  private readonly maxRestarts: number;
  private readonly restartDelayMs: number;

  private watcher: FSWatcher | null = null;
  private readonly pending = new Map<string, DebounceEntry>();
  private restartAttempts = 0;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = true;

  constructor(options: ContextWatcherOptions) {
    for (const tracked of options.trackedFiles) {
      this.trackedByPath.set(path.resolve(tracked.path), tracked.componentKey);
    }
    this.mergedDocumentPath = path.resolve(options.mergedDocumentPath);
    this.onEvent = options.onEvent;
    this.logger = options.logger;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.ignorePatterns = options.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS;
    this.maxRestarts = options.maxRestarts ?? DEFAULT_MAX_RESTARTS;
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
  }

  get isWatching(): boolean {
    return this.watcher !== null;
  }

  /** Number of (path, kind) keys waiting for their quiet period to end */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Create missing placeholders (empty sources, `{}` for the merged document)
   * and start watching. Calling it while watching is a no-op.
   */
  async start(): Promise<void> {
    if (!this.stopped) return;
    this.restartAttempts = 0;

    for (const [filePath, componentKey] of this.trackedByPath) {
      if (await this.ensurePlaceholder(filePath, '', componentKey)) {
        this.logger.info(CATEGORY, 'Created empty placeholder', { path: filePath });
      }
    }
    if (await this.ensurePlaceholder(this.mergedDocumentPath, '{}')) {
      this.logger.info(CATEGORY, 'Created empty merged document', { path: this.mergedDocumentPath });
    }

    await this.open();
    this.stopped = false;
  }

  /** A placeholder that cannot be created is logged and skipped */
  private async ensurePlaceholder(
    filePath: string,
    content: string,
    componentKey?: string
  ): Promise<boolean> {
    try {
      return await ensureFile(filePath, content);
    } catch (error) {
      const syncError = toSyncError(error, 'WRITE_FAILED', componentKey);
      this.logger.error(CATEGORY, `Cannot create placeholder: ${syncError.message}`, {
        path: filePath,
        code: syncError.code,
        ...(componentKey ? { componentKey } : {}),
      });
      return false;
    }
  }

  /** Close the watch handle and cancel every pending debounce timer */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
    const dropped = this.pending.size;
    this.pending.clear();

    await this.closeHandle();
    this.logger.info(CATEGORY, 'Watcher stopped', { droppedEvents: dropped });
  }

  // ── Watch handle ────────────────────────────────────────────────

  private async open(): Promise<void> {
    // Loaded lazily so one-shot commands never pay for it
    const { watch } = await import('chokidar');
    const paths = [...this.trackedByPath.keys(), this.mergedDocumentPath];

    const watcher = watch(paths, {
      persistent: true,
      ignoreInitial: true,
    });
    watcher.on('add', (filePath: string) => this.handleRaw(filePath, KIND_BY_CHOKIDAR_EVENT.add));
    watcher.on('change', (filePath: string) => this.handleRaw(filePath, KIND_BY_CHOKIDAR_EVENT.change));
    watcher.on('unlink', (filePath: string) => this.handleRaw(filePath, KIND_BY_CHOKIDAR_EVENT.unlink));
    watcher.on('error', (error: unknown) => this.handleError(error));
    this.watcher = watcher;

    this.logger.info(CATEGORY, 'Watching context files', {
      files: paths.length,
      debounceMs: this.debounceMs,
    });
  }

  private async closeHandle(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }

  // ── Event handling ──────────────────────────────────────────────

  private handleRaw(rawPath: string, kind: ChangeKind): void {
    if (this.stopped) return;

    const filePath = path.resolve(rawPath);
    const isMerged = filePath === this.mergedDocumentPath;
    if (!isMerged && this.isIgnored(filePath)) {
      this.logger.debug(CATEGORY, 'Ignored engine artefact', { path: filePath, kind });
      return;
    }

    const componentKey = this.trackedByPath.get(filePath);
    if (!isMerged && componentKey === undefined) return;

    const event: ChangeEvent = {
      path: filePath,
      kind,
      target: isMerged ? 'merged' : 'source',
      ...(componentKey !== undefined ? { componentKey } : {}),
      observedAt: Date.now(),
    };

    const debounceKey = `${filePath}|${kind}`;
    const existing = this.pending.get(debounceKey);
    if (existing) {
      clearTimeout(existing.timer);
    }
    const timer = setTimeout(() => {
      this.pending.delete(debounceKey);
      this.onEvent(event);
    }, this.debounceMs);
    this.pending.set(debounceKey, { timer, event });
  }

  private isIgnored(filePath: string): boolean {
    return this.ignorePatterns.some((pattern) =>
      minimatch(filePath, pattern, { matchBase: true, dot: true })
    );
  }

  // ── Error recovery ──────────────────────────────────────────────

  private handleError(error: unknown): void {
    const syncError = toSyncError(error, 'WATCH_FAILED');
    this.logger.error(CATEGORY, `Watcher error: ${syncError.message}`, {
      restartAttempts: this.restartAttempts,
    });

    if (this.stopped || this.restartTimer) return;

    if (this.restartAttempts >= this.maxRestarts) {
      this.logger.error(CATEGORY, 'Max restart attempts reached, watcher disabled', {
        maxRestarts: this.maxRestarts,
      });
      this.closeHandle().catch((closeError: unknown) => {
        this.logger.warn(CATEGORY, 'Error closing failed watcher', {
          error: toSyncError(closeError, 'WATCH_FAILED').message,
        });
      });
      return;
    }

    this.restartAttempts++;
    this.logger.info(CATEGORY, `Scheduling restart attempt ${this.restartAttempts}/${this.maxRestarts}`, {
      delayMs: this.restartDelayMs,
    });
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      this.restart().catch((restartError: unknown) => {
        this.handleError(restartError);
      });
    }, this.restartDelayMs);
  }

  private async restart(): Promise<void> {
    await this.closeHandle();
    if (this.stopped) return;
    await this.open();
    this.logger.info(CATEGORY, 'Watcher restarted', { attempt: this.restartAttempts });
  }
}

/**
 * IntegrityMonitor - periodically re-parses the merged document and rewrites
 * it wholesale from the serializer's snapshot when it is missing, corrupt, or
 * flagged by a failed verification.
 */

import { toSyncError, type ComponentKey, type LogSink } from '@ctxmirror/core';
import { readTextFile } from './atomic-write.js';
import { parseMergedDocument } from './merged-document.js';
import type { UpdateSerializer } from './update-serializer.js';

export interface IntegrityMonitorOptions {
  mergedDocumentPath: string;
  componentKeys: readonly ComponentKey[];
  serializer: UpdateSerializer;
  logger: LogSink;
  /** Check period (default 1000 ms) */
  intervalMs?: number;
}

export type IntegrityStatus =
  | { state: 'ok' }
  | { state: 'repaired'; reason: string }
  | { state: 'repair_failed'; reason: string; error: string };

const CATEGORY = 'integrity';
const DEFAULT_INTERVAL_MS = 1000;

export class IntegrityMonitor {
  private readonly mergedDocumentPath: string;
  private readonly componentKeys: readonly ComponentKey[];
  private readonly serializer: UpdateSerializer;
  private readonly logger: LogSink;
  private readonly intervalMs: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<IntegrityStatus> | null = null;

  constructor(options: IntegrityMonitorOptions) {
    this.mergedDocumentPath = options.mergedDocumentPath;
    this.componentKeys = options.componentKeys;
    this.serializer = options.serializer;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      // Skip while the previous check is still running
      if (this.running) return;
      void this.tick();
    }, this.intervalMs);
  }

  /** Clear the timer and wait for a check already in progress */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Run one check now. Never rejects. */
  tick(): Promise<IntegrityStatus> {
    if (this.running) return this.running;
    this.running = this.check().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private async check(): Promise<IntegrityStatus> {
    let reason: string | null = null;

    if (this.serializer.consumeRepairRequest()) {
      reason = 'verification failed after last write';
    } else {
      try {
        const raw = await readTextFile(this.mergedDocumentPath);
        if (raw === null) {
          reason = 'merged document missing';
        } else {
          const parsed = parseMergedDocument(raw, this.componentKeys);
          if (!parsed.ok) reason = parsed.reason;
        }
      } catch (error) {
        reason = toSyncError(error, 'READ_FAILED').message;
      }
    }

    if (reason === null) return { state: 'ok' };

    this.logger.warn(CATEGORY, 'Merged document needs repair', { reason });
    try {
      await this.serializer.restore({ force: true });
      this.logger.info(CATEGORY, 'Merged document restored from snapshot', { reason });
      return { state: 'repaired', reason };
    } catch (error) {
      const message = toSyncError(error, 'WRITE_FAILED').message;
      this.logger.error(CATEGORY, 'Repair failed, will retry on next tick', { reason, error: message });
      return { state: 'repair_failed', reason, error: message };
    }
  }
}

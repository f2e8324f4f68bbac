/**
 * Types passed between the watcher, the reconciler and the update serializer.
 */

import type { ComponentKey, SyncError } from '@ctxmirror/core';

// ─── Change Events ────────────────────────────────────────────────

export type ChangeKind = 'created' | 'modified' | 'deleted';

/** Which side of the mirror a change came from */
export type ChangeTarget = 'source' | 'merged';

/** A debounced filesystem change, consumed once by the reconciler */
export interface ChangeEvent {
  path: string;
  kind: ChangeKind;
  target: ChangeTarget;
  /** Set for source-file events */
  componentKey?: ComponentKey;
  /** Epoch ms of the last raw notification folded into this event */
  observedAt: number;
}

// ─── Update Outcomes ──────────────────────────────────────────────

export type UpdateFailureReason =
  | 'unknown_component'
  | 'write_failed'
  | 'verification_failed'
  | 'timeout'
  | 'shutdown';

export type UpdateOutcome =
  | { ok: true; componentKey: ComponentKey; durationMs: number }
  | {
      ok: false;
      componentKey: ComponentKey;
      reason: UpdateFailureReason;
      error: SyncError;
    };

// ─── Reports ──────────────────────────────────────────────────────

/** Result of a full `syncAll` pass */
export interface SyncReport {
  synced: ComponentKey[];
  failed: Array<{ componentKey: ComponentKey; reason: string }>;
}

/** Result of pulling external merged-document edits back into source files */
export interface ExternalSyncResult {
  /** Components written back to their source files */
  applied: ComponentKey[];
  /** Components skipped because an update targets them; re-diffed once it resolves */
  deferred: ComponentKey[];
  failed: ComponentKey[];
  /** The on-disk document could not be parsed; only edits held from earlier writes were applied */
  corrupt: boolean;
}

/** A failure remembered for status reporting */
export interface SyncFailureRecord {
  componentKey: ComponentKey;
  reason: string;
  message: string;
  at: string;
}

export interface SyncEngineStatus {
  running: boolean;
  pendingUpdates: ComponentKey[];
  lastUpdate: { componentKey: ComponentKey; at: string } | null;
  errors: SyncFailureRecord[];
  snapshotKeys: ComponentKey[];
  watching: boolean;
}

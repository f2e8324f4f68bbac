/**
 * Shared type definitions for ctxmirror.
 * All interfaces and types used across packages are defined here.
 */

// ─── Component Types ───────────────────────────────────────────────

/** Identifier of one component slot, e.g. `architecture` */
export type ComponentKey = string;

/** A source document mirrored into the merged document under `componentKey` */
export interface TrackedFile {
  path: string;
  componentKey: ComponentKey;
}

/** Component declaration as written in `.ctxmirror.yml` */
export interface ComponentDefinition {
  key: ComponentKey;
  /** Path relative to the project root */
  path: string;
}

// ─── Path Types ────────────────────────────────────────────────────

/** IDE flavours that consume a merged context document */
export type IdeFlavor = 'cursor' | 'windsurf';

/** Resolved locations of everything the engine reads and writes */
export interface PathSet {
  projectRoot: string;
  /** `<projectRoot>/.ctxmirror`, home of logs and context archives */
  dataDir: string;
  ide: IdeFlavor;
  /** Ordered; `syncAll` walks components in this order */
  trackedFiles: readonly TrackedFile[];
  mergedDocumentPath: string;
}

// ─── Config Types ──────────────────────────────────────────────────

/** Timing and behaviour knobs of the sync engine */
export interface SyncSettings {
  debounceMs: number;
  updateTimeoutMs: number;
  integrityIntervalMs: number;
  shutdownGraceMs: number;
  retryDelayMs: number;
  /** Copy the previous merged document to `<path>.old` before each replace */
  backup: boolean;
  /** minimatch globs; patterns without a slash match the file's basename */
  ignorePatterns: string[];
}

/** Full configuration loaded from `.ctxmirror.yml` */
export interface CtxMirrorConfig {
  version: number;
  ide: IdeFlavor | 'auto';
  /** Explicit merged-document path, overriding the IDE default */
  mergedDocument: string | null;
  components: ComponentDefinition[];
  sync: SyncSettings;
}

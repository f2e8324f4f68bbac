/**
 * Context archives: named copies of every component kept under
 * `.ctxmirror/context/<name>/<componentKey>.md`, so one project can switch
 * between working contexts.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  SyncError,
  isErrnoException,
  slugify,
  type ComponentKey,
  type PathSet,
  type TrackedFile,
} from '@ctxmirror/core';
import { readTextFile, writeFileAtomic } from './atomic-write.js';

// ─── Types ────────────────────────────────────────────────────────

export interface StoredContext {
  name: string;
  path: string;
  components: ComponentKey[];
}

export interface ArchivedContext extends StoredContext {
  /** ISO time the archive directory was last modified */
  storedAt: string;
}

export interface RestoreResult {
  restored: ComponentKey[];
  /** Tracked components with no file in the archive; left untouched */
  missing: ComponentKey[];
  failed: Array<{ componentKey: ComponentKey; reason: string }>;
}

const CONTEXT_DIR_NAME = 'context';
const TITLE_COMPONENT = 'architecture';
const ARCHIVE_EXTENSION = '.md';

// ─── Helpers ──────────────────────────────────────────────────────

export function contextRoot(pathSet: PathSet): string {
  return path.join(pathSet.dataDir, CONTEXT_DIR_NAME);
}

function archiveFileFor(archiveDir: string, tracked: TrackedFile): string {
  return path.join(archiveDir, `${tracked.componentKey}${ARCHIVE_EXTENSION}`);
}

/** First `# ` heading of the architecture component (or the first component) */
export function extractTitle(content: string): string | null {
  const match = /^#[ \t]+(.+)$/m.exec(content);
  return match ? match[1].trim() : null;
}

async function resolveArchiveName(pathSet: PathSet, name?: string): Promise<string> {
  const explicit = name ? slugify(name) : '';
  if (explicit) return explicit;

  const titleSource =
    pathSet.trackedFiles.find((tracked) => tracked.componentKey === TITLE_COMPONENT) ??
    pathSet.trackedFiles[0];
  if (titleSource) {
    const title = extractTitle((await readTextFile(titleSource.path)) ?? '');
    const fromTitle = title ? slugify(title) : '';
    if (fromTitle) return fromTitle;
  }

  throw new SyncError(
    'Cannot name the context: pass a name or start the architecture document with a "# " heading',
    'NOT_FOUND'
  );
}

// ─── Operations ───────────────────────────────────────────────────

/**
 * Copy every tracked source file into a named archive. An existing archive
 * with the same name is overwritten component by component.
 */
export async function storeContext(pathSet: PathSet, name?: string): Promise<StoredContext> {
  const archiveName = await resolveArchiveName(pathSet, name);
  const archiveDir = path.join(contextRoot(pathSet), archiveName);

  const components: ComponentKey[] = [];
  for (const tracked of pathSet.trackedFiles) {
    const content = (await readTextFile(tracked.path)) ?? '';
    await writeFileAtomic(archiveFileFor(archiveDir, tracked), content);
    components.push(tracked.componentKey);
  }

  return { name: archiveName, path: archiveDir, components };
}

/** Archives under `.ctxmirror/context/`, sorted by name */
export async function listContexts(pathSet: PathSet): Promise<ArchivedContext[]> {
  const root = contextRoot(pathSet);
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return [];
    throw error;
  }

  const archives: ArchivedContext[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const archiveDir = path.join(root, entry.name);
    const files = await fs.promises.readdir(archiveDir);
    const stat = await fs.promises.stat(archiveDir);
    archives.push({
      name: entry.name,
      path: archiveDir,
      components: files
        .filter((file) => file.endsWith(ARCHIVE_EXTENSION))
        .map((file) => file.slice(0, -ARCHIVE_EXTENSION.length))
        .sort(),
      storedAt: stat.mtime.toISOString(),
    });
  }

  return archives.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Write an archive's components back to their source files. A running
 * engine picks the changes up through its watcher; otherwise resync after.
 */
export async function restoreContext(pathSet: PathSet, name: string): Promise<RestoreResult> {
  const archiveDir = path.join(contextRoot(pathSet), slugify(name));
  if (!fs.existsSync(archiveDir)) {
    throw new SyncError(`No stored context named "${name}"`, 'NOT_FOUND');
  }

  const result: RestoreResult = { restored: [], missing: [], failed: [] };
  for (const tracked of pathSet.trackedFiles) {
    const content = await readTextFile(archiveFileFor(archiveDir, tracked));
    if (content === null) {
      result.missing.push(tracked.componentKey);
      continue;
    }

    try {
      await writeFileAtomic(tracked.path, content);
    } catch (error) {
      if (!(error instanceof SyncError)) throw error;
      result.failed.push({ componentKey: tracked.componentKey, reason: 'write_failed' });
      continue;
    }
    result.restored.push(tracked.componentKey);
  }

  return result;
}

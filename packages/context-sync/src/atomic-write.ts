/**
 * File helpers for the engine: atomic replace via temp file + rename, and
 * reads that distinguish "missing" from real I/O failures.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { SyncError, generateId, isErrnoException } from '@ctxmirror/core';

export interface AtomicWriteOptions {
  /** Copy the current target to `<target>.old` before replacing it */
  backup?: boolean;
  /**
   * Return the content the rename replaced, including writes that landed
   * after the caller last read the target. Null when there was no target.
   */
  capturePrevious?: boolean;
}

/** link(2) failures that mean the filesystem has no hard links */
const NO_HARD_LINKS = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'EXDEV', 'EMLINK']);

/** Path of the backup kept beside `targetPath` */
export function backupPathFor(targetPath: string): string {
  return `${targetPath}.old`;
}

/** Temp file beside the target so the rename never crosses filesystems */
function tempPathFor(targetPath: string, label = ''): string {
  return path.join(
    path.dirname(targetPath),
    `${path.basename(targetPath)}.${generateId()}${label}.tmp`
  );
}

/**
 * Replace `targetPath` with `content`. Readers see either the old file or the
 * new one. On failure the target is left as it was and the temp file is removed.
 *
 * With `capturePrevious`, the old file is hard-linked aside just before the
 * rename, so in-place writes to it up to the rename show in the returned text.
 * Without hard-link support it falls back to reading the target first.
 */
export async function writeFileAtomic(
  targetPath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<string | null> {
  const tempPath = tempPathFor(targetPath);
  let stashPath: string | null = null;

  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });

    const handle = await fs.promises.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (options.backup) {
      await copyIfExists(targetPath, backupPathFor(targetPath));
    }

    let previous: string | null = null;
    if (options.capturePrevious) {
      const candidate = tempPathFor(targetPath, '.prev');
      const linked = await linkIfSupported(targetPath, candidate);
      if (linked === 'linked') {
        stashPath = candidate;
      } else if (linked === 'unsupported') {
        previous = await readTextFile(targetPath);
      }
    }

    await fs.promises.rename(tempPath, targetPath);

    if (stashPath) {
      previous = await readTextFile(stashPath);
      await removeTempFile(stashPath);
    }
    return previous;
  } catch (error) {
    if (stashPath) await removeTempFile(stashPath);
    const leftBehind = !(await removeTempFile(tempPath));
    const message = error instanceof Error ? error.message : String(error);
    throw new SyncError(
      `Failed to write ${targetPath}: ${message}` +
        (leftBehind ? ` (temp file ${tempPath} could not be removed)` : ''),
      'WRITE_FAILED',
      undefined,
      { cause: error }
    );
  }
}

/**
 * Read a UTF-8 file. Returns null when it does not exist; other errors
 * (permissions, EISDIR) are raised as READ_FAILED.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SyncError(`Failed to read ${filePath}: ${message}`, 'READ_FAILED', undefined, {
      cause: error,
    });
  }
}

/** Create `filePath` with `content` unless it already exists. Returns true if created. */
export async function ensureFile(filePath: string, content = ''): Promise<boolean> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  try {
    await fs.promises.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

async function copyIfExists(source: string, destination: string): Promise<void> {
  try {
    await fs.promises.copyFile(source, destination);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw error;
  }
}

async function linkIfSupported(
  source: string,
  destination: string
): Promise<'linked' | 'missing' | 'unsupported'> {
  try {
    await fs.promises.link(source, destination);
    return 'linked';
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return 'missing';
    if (isErrnoException(error) && error.code !== undefined && NO_HARD_LINKS.has(error.code)) {
      return 'unsupported';
    }
    throw error;
  }
}

/** Returns false only when the temp file exists and could not be removed */
async function removeTempFile(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === 'ENOENT';
  }
}

/**
 * Shared utility functions used across ctxmirror.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { nanoid } from 'nanoid';

/** Generate a unique ID */
export function generateId(): string {
  return nanoid();
}

/** Get the current ISO timestamp */
export function now(): string {
  return new Date().toISOString();
}

/** Compute SHA-256 hash of a string */
export function hash(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/** Narrow an unknown error to a Node system error carrying `code` */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** Sleep for a given number of milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Turn free text into a filesystem-safe directory name.
 * `"# My Project: v2"` → `my_project_v2`
 */
export function slugify(text: string): string {
  return text
    .replace(/^#+\s*/, '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 64);
}

/**
 * Get the root directory of the project (walks up to find .ctxmirror.yml or .git).
 */
export function findProjectRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  while (dir !== path.dirname(dir)) {
    if (
      fs.existsSync(path.join(dir, '.ctxmirror.yml')) ||
      fs.existsSync(path.join(dir, '.git'))
    ) {
      return dir;
    }
    dir = path.dirname(dir);
  }
  return path.resolve(startDir);
}

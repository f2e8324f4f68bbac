import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { findProjectRoot, hash, isErrnoException, slugify } from './utils.js';

describe('utils', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ctxmirror-utils-'));
    dirs.push(dir);
    return dir;
  }

  it('hashes deterministically', () => {
    expect(hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(hash('abc')).not.toBe(hash('abd'));
  });

  it('slugifies markdown headings', () => {
    expect(slugify('# My Project: v2')).toBe('my_project_v2');
    expect(slugify('  Hello   World!  ')).toBe('hello_world');
    expect(slugify('###')).toBe('');
  });

  it('recognizes errno exceptions', () => {
    let caught: unknown;
    try {
      fs.readFileSync(path.join(tempDir(), 'missing.md'));
    } catch (error) {
      caught = error;
    }
    expect(isErrnoException(caught)).toBe(true);
    expect(isErrnoException(new Error('plain'))).toBe(false);
  });

  it('finds the directory holding .ctxmirror.yml', () => {
    const root = tempDir();
    fs.writeFileSync(path.join(root, '.ctxmirror.yml'), 'version: 1\n');
    const nested = path.join(root, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });

    expect(findProjectRoot(nested)).toBe(root);
  });
});

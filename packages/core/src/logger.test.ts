import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Logger, createMemoryLogger, type LogEntry } from './logger.js';

describe('Logger', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('keeps entries in memory with their data', () => {
    const logger = createMemoryLogger();
    logger.warn('serializer', 'Update timed out', { componentKey: 'tasks' });

    expect(logger.allEntries).toHaveLength(1);
    expect(logger.allEntries[0]).toMatchObject({
      level: 'warn',
      category: 'serializer',
      message: 'Update timed out',
      data: { componentKey: 'tasks' },
    });
    expect(logger.filePath).toBe('');
  });

  it('passes debug entries to onLog only in verbose mode', () => {
    const quiet: LogEntry[] = [];
    const loud: LogEntry[] = [];
    const quietLogger = createMemoryLogger({ onLog: (e) => quiet.push(e) });
    const loudLogger = createMemoryLogger({ verbose: true, onLog: (e) => loud.push(e) });

    for (const logger of [quietLogger, loudLogger]) {
      logger.debug('watcher', 'raw event');
      logger.info('engine', 'started');
    }

    expect(quiet.map((e) => e.message)).toEqual(['started']);
    expect(loud.map((e) => e.message)).toEqual(['raw event', 'started']);
  });

  it('drops the oldest entries beyond maxEntries', () => {
    const logger = createMemoryLogger({ maxEntries: 2 });
    logger.info('a', 'one');
    logger.info('a', 'two');
    logger.info('a', 'three');
    expect(logger.allEntries.map((e) => e.message)).toEqual(['two', 'three']);
  });

  it('filters by level and category', () => {
    const logger = createMemoryLogger();
    logger.debug('watcher', 'noise');
    logger.warn('watcher', 'restarting');
    logger.error('monitor', 'repair failed');

    expect(logger.filter('warn').map((e) => e.message)).toEqual(['restarting', 'repair failed']);
    expect(logger.filter('debug', 'watcher').map((e) => e.message)).toEqual([
      'noise',
      'restarting',
    ]);
  });

  it('writes a session log file under .ctxmirror/logs', () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ctxmirror-logger-'));
    dirs.push(projectDir);

    const logger = new Logger({ projectDir, session: 'watch' });
    expect(path.dirname(logger.filePath)).toBe(path.join(projectDir, '.ctxmirror', 'logs'));
    expect(path.basename(logger.filePath)).toMatch(/^watch-\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.log$/);
    logger.close();
  });
});

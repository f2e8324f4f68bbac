import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  CONFIG_FILENAME,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  writeDefaultConfig,
} from './config.js';
import { ConfigError } from './errors.js';

describe('config', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ctxmirror-config-'));
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('tracks architecture, progress and tasks in that order', () => {
      const config = getDefaultConfig();
      expect(config.components.map((c) => c.key)).toEqual(['architecture', 'progress', 'tasks']);
      expect(config.components[0].path).toBe('.ctxmirror/architecture.md');
    });

    it('applies sync defaults', () => {
      const { sync } = getDefaultConfig();
      expect(sync.debounceMs).toBe(100);
      expect(sync.updateTimeoutMs).toBe(5000);
      expect(sync.integrityIntervalMs).toBe(1000);
      expect(sync.shutdownGraceMs).toBe(2000);
      expect(sync.retryDelayMs).toBe(200);
      expect(sync.backup).toBe(true);
      expect(sync.ignorePatterns).toEqual(['*.tmp', '*.old']);
    });

    it('leaves the IDE to auto-detection', () => {
      const config = getDefaultConfig();
      expect(config.ide).toBe('auto');
      expect(config.mergedDocument).toBeNull();
    });
  });

  describe('loadConfig', () => {
    it('falls back to defaults when no config file exists', () => {
      expect(loadConfig(projectDir)).toEqual(getDefaultConfig());
    });

    it('normalizes snake_case keys', () => {
      fs.writeFileSync(
        path.join(projectDir, CONFIG_FILENAME),
        [
          'ide: windsurf',
          'merged_document: docs/context.json',
          'sync:',
          '  debounce_ms: 250',
          '  update_timeout_ms: 3000',
        ].join('\n')
      );

      const config = loadConfig(projectDir);
      expect(config.ide).toBe('windsurf');
      expect(config.mergedDocument).toBe('docs/context.json');
      expect(config.sync.debounceMs).toBe(250);
      expect(config.sync.updateTimeoutMs).toBe(3000);
      expect(config.sync.integrityIntervalMs).toBe(1000);
    });

    it('round-trips the file written by writeDefaultConfig', () => {
      const configPath = writeDefaultConfig(projectDir);
      expect(configPath).toBe(path.join(projectDir, CONFIG_FILENAME));
      expect(loadConfig(projectDir)).toEqual(getDefaultConfig());
    });

    it('reports YAML syntax errors as ConfigError', () => {
      fs.writeFileSync(path.join(projectDir, CONFIG_FILENAME), 'sync: [unclosed');
      expect(() => loadConfig(projectDir)).toThrow(ConfigError);
    });
  });

  describe('parseConfig', () => {
    it('rejects duplicate component keys', () => {
      expect(() =>
        parseConfig({
          components: [
            { key: 'notes', path: 'a.md' },
            { key: 'notes', path: 'b.md' },
          ],
        })
      ).toThrow(/component keys must be unique/);
    });

    it('rejects component keys that are not identifiers', () => {
      expect(() => parseConfig({ components: [{ key: '1st', path: 'a.md' }] })).toThrow(
        ConfigError
      );
    });

    it('names the offending field in the error message', () => {
      expect(() => parseConfig({ sync: { debounce_ms: -5 } })).toThrow(/sync\.debounceMs/);
    });

    it('treats a null document as empty', () => {
      expect(parseConfig(null)).toEqual(getDefaultConfig());
    });
  });
});

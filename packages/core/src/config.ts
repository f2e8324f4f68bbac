/**
 * YAML configuration loader for .ctxmirror.yml files.
 * Handles loading, validation, and default values.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { CtxMirrorConfig } from './types.js';

export const CONFIG_FILENAME = '.ctxmirror.yml';

const componentSchema = z.object({
  key: z
    .string()
    .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, 'component keys are identifiers (letters, digits, _ and -)'),
  path: z.string().min(1),
});

const DEFAULT_COMPONENTS = [
  { key: 'architecture', path: '.ctxmirror/architecture.md' },
  { key: 'progress', path: '.ctxmirror/progress.md' },
  { key: 'tasks', path: '.ctxmirror/tasks.md' },
];

const configSchema = z.object({
  version: z.number().default(1),
  ide: z.enum(['auto', 'cursor', 'windsurf']).default('auto'),
  mergedDocument: z.string().nullable().default(null),
  components: z
    .array(componentSchema)
    .min(1)
    .default(DEFAULT_COMPONENTS)
    .refine(
      (components) => new Set(components.map((c) => c.key)).size === components.length,
      'component keys must be unique'
    ),
  sync: z
    .object({
      debounceMs: z.number().int().min(0).default(100),
      updateTimeoutMs: z.number().int().min(100).default(5000),
      integrityIntervalMs: z.number().int().min(50).default(1000),
      shutdownGraceMs: z.number().int().min(0).default(2000),
      retryDelayMs: z.number().int().min(0).default(200),
      backup: z.boolean().default(true),
      ignorePatterns: z.array(z.string()).default(['*.tmp', '*.old']),
    })
    .default({}),
});

/** Default configuration when no .ctxmirror.yml is found */
export function getDefaultConfig(): CtxMirrorConfig {
  return configSchema.parse({});
}

/**
 * Validate an already-parsed config object (snake_case or camelCase keys).
 */
export function parseConfig(raw: unknown, configPath = CONFIG_FILENAME): CtxMirrorConfig {
  const result = configSchema.safeParse(normalizeKeys(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${path.basename(configPath)}: ${issues}`, configPath, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Load and validate a .ctxmirror.yml config file.
 * Falls back to defaults if the file doesn't exist.
 */
export function loadConfig(projectDir: string): CtxMirrorConfig {
  const configPath = path.join(projectDir, CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${CONFIG_FILENAME}: ${message}`, configPath, {
      cause: error,
    });
  }

  return parseConfig(parsed, configPath);
}

/**
 * Write a default .ctxmirror.yml config file to the project directory.
 */
export function writeDefaultConfig(projectDir: string): string {
  const configPath = path.join(projectDir, CONFIG_FILENAME);
  const defaultYaml = `version: 1

# Which assistant reads the merged document.
# auto picks from the IDE_ENV environment variable (windsurf or cursor),
# falling back to cursor.
ide: auto

# Uncomment to write the merged document somewhere other than the IDE default
# (.cursorrules for cursor, .windsurfrules for windsurf).
# merged_document: .cursorrules

# Documents mirrored into the merged document, in sync order.
components:
  - key: architecture
    path: .ctxmirror/architecture.md
  - key: progress
    path: .ctxmirror/progress.md
  - key: tasks
    path: .ctxmirror/tasks.md

sync:
  debounce_ms: 100           # collapse bursts of filesystem events
  update_timeout_ms: 5000    # how long a single update may wait for its write
  integrity_interval_ms: 1000
  shutdown_grace_ms: 2000
  retry_delay_ms: 200        # delay before the single startup retry
  backup: true               # keep <merged document>.old
  ignore_patterns:
    - "*.tmp"
    - "*.old"
`;

  fs.writeFileSync(configPath, defaultYaml, 'utf-8');
  return configPath;
}

/** Recursively convert snake_case keys to camelCase */
function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}

/**
 * Path resolution: turns a project root and its config into the fixed set of
 * tracked documents and the merged-document location the engine works on.
 */

import * as path from 'node:path';
import { CONFIG_FILENAME } from './config.js';
import { ConfigError } from './errors.js';
import type { CtxMirrorConfig, IdeFlavor, PathSet, TrackedFile } from './types.js';

export const DATA_DIR_NAME = '.ctxmirror';

/** Default merged-document filename per IDE flavour */
const MERGED_DOCUMENT_FILES: Record<IdeFlavor, string> = {
  cursor: '.cursorrules',
  windsurf: '.windsurfrules',
};

/**
 * Pick the IDE flavour. An explicit config value wins; `auto` reads IDE_ENV,
 * where anything starting with "w" means windsurf and "c" means cursor.
 */
export function resolveIdeFlavor(
  configured: CtxMirrorConfig['ide'],
  env: NodeJS.ProcessEnv = process.env
): IdeFlavor {
  if (configured !== 'auto') return configured;
  const ideEnv = (env.IDE_ENV ?? '').trim().toLowerCase();
  if (ideEnv.startsWith('w')) return 'windsurf';
  return 'cursor';
}

/** Build the PathSet for a project */
export function resolvePathSet(
  projectRoot: string,
  config: CtxMirrorConfig,
  env: NodeJS.ProcessEnv = process.env
): PathSet {
  const root = path.resolve(projectRoot);
  const ide = resolveIdeFlavor(config.ide, env);

  const trackedFiles: TrackedFile[] = config.components.map((component) => ({
    componentKey: component.key,
    path: path.resolve(root, component.path),
  }));

  const mergedDocumentPath = path.resolve(
    root,
    config.mergedDocument ?? MERGED_DOCUMENT_FILES[ide]
  );

  const seen = new Set<string>([mergedDocumentPath]);
  for (const file of trackedFiles) {
    if (seen.has(file.path)) {
      throw new ConfigError(
        `Component "${file.componentKey}" resolves to a path already in use: ${file.path}`,
        path.join(root, CONFIG_FILENAME)
      );
    }
    seen.add(file.path);
  }

  return {
    projectRoot: root,
    dataDir: path.join(root, DATA_DIR_NAME),
    ide,
    trackedFiles,
    mergedDocumentPath,
  };
}

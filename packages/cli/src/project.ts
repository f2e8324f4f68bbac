/**
 * Shared setup for commands: locate the project, load its config, resolve
 * paths and start the session logger.
 */

import chalk from 'chalk';
import * as path from 'node:path';
import {
  findProjectRoot,
  getFailureReason,
  initLogger,
  loadConfig,
  resolvePathSet,
  SyncError,
  type CtxMirrorConfig,
  type LogEntry,
  type Logger,
  type PathSet,
} from '@ctxmirror/core';

export interface CommonOptions {
  path: string;
  verbose?: boolean;
}

export interface Project {
  projectRoot: string;
  config: CtxMirrorConfig;
  pathSet: PathSet;
  logger: Logger;
}

/**
 * Load everything a command needs. `onLog` receives entries in addition to
 * the verbose console echo.
 */
export function openProject(
  options: CommonOptions,
  session: string,
  onLog?: (entry: LogEntry) => void
): Project {
  const projectRoot = findProjectRoot(path.resolve(options.path));
  const config = loadConfig(projectRoot);
  const pathSet = resolvePathSet(projectRoot, config, process.env);
  const verbose = options.verbose ?? false;

  const logger = initLogger({
    projectDir: projectRoot,
    session,
    verbose,
    onLog: (entry) => {
      if (verbose) verboseConsoleHandler(entry);
      onLog?.(entry);
    },
  });

  return { projectRoot, config, pathSet, logger };
}

/** Path relative to the project root, for display */
export function displayPath(project: Pick<Project, 'projectRoot'>, filePath: string): string {
  return path.relative(project.projectRoot, filePath) || '.';
}

/** One-line description of a failure for console output */
export function errorMessage(error: unknown): string {
  if (error instanceof SyncError) return `${getFailureReason(error)}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

/**
 * Console handler for --verbose mode.
 * Formats log entries for real-time console display.
 */
export function verboseConsoleHandler(entry: LogEntry): void {
  const levelColors: Record<string, (s: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
  };
  const colorFn = levelColors[entry.level] ?? chalk.white;
  const prefix = colorFn(`  [${entry.level.toUpperCase()}]`);
  const cat = chalk.gray(`[${entry.category}]`);

  let line = `${prefix} ${cat} ${entry.message}`;
  if (entry.data) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
      .join(' ');
    line += chalk.gray(` ${dataStr}`);
  }

  // stderr keeps --json output on stdout clean
  process.stderr.write(line + '\n');
}

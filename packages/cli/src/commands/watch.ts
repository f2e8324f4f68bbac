/**
 * `ctxmirror watch` command.
 * Runs the sync engine until SIGINT/SIGTERM, printing each mirrored change.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { SyncEngine } from '@ctxmirror/context-sync';
import type { LogEntry } from '@ctxmirror/core';
import { displayPath, errorMessage, openProject } from '../project.js';

/** Engine log lines worth a console line in non-verbose mode */
const ANNOUNCED_MESSAGES = new Set([
  'Component synced to merged document',
  'Applied external edit to source file',
  'Merged document restored from snapshot',
  'Component update failed',
]);

function announce(entry: LogEntry): void {
  if (!ANNOUNCED_MESSAGES.has(entry.message) && entry.level !== 'error') return;

  const timestamp = new Date(entry.timestamp).toLocaleTimeString();
  const key = typeof entry.data?.componentKey === 'string' ? ` ${entry.data.componentKey}` : '';
  const line = `  [${timestamp}] ${entry.message}${key}`;
  if (entry.level === 'error' || entry.level === 'warn') {
    console.error(chalk.red(line));
  } else {
    console.log(chalk.green(line));
  }
}

export function registerWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Keep component documents and the merged document in sync')
    .option('--path <dir>', 'Project directory', '.')
    .option('--debounce <ms>', 'Debounce interval in milliseconds')
    .option('--verbose', 'Show detailed logs')
    .action(async (options: { path: string; debounce?: string; verbose?: boolean }) => {
      const spinner = ora('Starting sync engine...');

      try {
        const project = openProject(options, 'watch', options.verbose ? undefined : announce);
        const { pathSet, config, logger } = project;
        const debounceMs = options.debounce
          ? parseInt(options.debounce, 10) || config.sync.debounceMs
          : config.sync.debounceMs;

        console.log(chalk.bold('\n  ctxmirror watch mode\n'));
        console.log(chalk.gray(`  Merged:   ${displayPath(project, pathSet.mergedDocumentPath)}`));
        for (const tracked of pathSet.trackedFiles) {
          console.log(
            chalk.gray(`  ${`${tracked.componentKey}:`.padEnd(10)}${displayPath(project, tracked.path)}`)
          );
        }
        console.log(chalk.gray(`  Debounce: ${debounceMs}ms`));
        console.log('');
        spinner.start();

        const engine = new SyncEngine({
          pathSet,
          logger,
          settings: { ...config.sync, debounceMs },
        });
        const report = await engine.start();

        for (const failure of report.failed) {
          console.error(chalk.yellow(`  Initial sync failed for ${failure.componentKey}: ${failure.reason}`));
        }
        spinner.succeed(
          `Synced ${report.synced.length} component(s); watching for changes (press Ctrl+C to stop)`
        );
        console.log('');

        let stopping = false;
        const shutdown = (): void => {
          if (stopping) return;
          stopping = true;
          console.log(chalk.gray('\n  Stopping sync engine...'));
          engine
            .stop()
            .then(() => {
              logger.close();
              process.exit(0);
            })
            .catch((error: unknown) => {
              const message = errorMessage(error);
              console.error(chalk.red(`  Shutdown failed: ${message}`));
              process.exit(1);
            });
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);

        // Keep the event loop alive until a signal arrives
        await new Promise<void>(() => {
          // never resolves
        });
      } catch (error: unknown) {
        spinner.fail('Failed to start sync engine');
        const message = errorMessage(error);
        console.error(chalk.red(`\n  ${message}\n`));
        process.exit(1);
      }
    });
}

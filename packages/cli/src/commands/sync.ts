/**
 * `ctxmirror sync` command.
 * Pushes every component document into the merged document once and
 * reports the outcome per component.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { syncOnce } from '@ctxmirror/context-sync';
import { displayPath, errorMessage, openProject } from '../project.js';

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Write every component document into the merged document once')
    .option('--path <dir>', 'Project directory', '.')
    .option('--json', 'Output the sync report as JSON')
    .option('--verbose', 'Show detailed logs')
    .action(async (options: { path: string; json?: boolean; verbose?: boolean }) => {
      const spinner = ora('Syncing components...');
      let exitCode = 0;

      try {
        const project = openProject(options, 'sync');
        const { pathSet, config, logger } = project;
        if (!options.json) spinner.start();

        const report = await syncOnce({ pathSet, logger, settings: config.sync });
        logger.close();

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          const target = displayPath(project, pathSet.mergedDocumentPath);
          if (report.failed.length === 0) {
            spinner.succeed(`Synced ${report.synced.length} component(s) into ${chalk.bold(target)}`);
          } else {
            spinner.warn(
              `Synced ${report.synced.length}, failed ${report.failed.length} component(s) into ${chalk.bold(target)}`
            );
          }
          for (const key of report.synced) {
            console.log(chalk.green(`  ✓ ${key}`));
          }
          for (const failure of report.failed) {
            console.log(chalk.red(`  ✗ ${failure.componentKey}: ${failure.reason}`));
          }
          console.log('');
        }

        if (report.failed.length > 0) exitCode = 1;
      } catch (error: unknown) {
        spinner.fail('Sync failed');
        const message = errorMessage(error);
        console.error(chalk.red(`\n  ${message}\n`));
        exitCode = 1;
      }

      if (exitCode !== 0) process.exit(exitCode);
    });
}

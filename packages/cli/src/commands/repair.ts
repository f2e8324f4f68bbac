/**
 * `ctxmirror repair` command.
 * Rebuilds the merged document from the source files, or with
 * `--from-backup` puts the `.old` copy back and writes it to the sources.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { repairOnce, restoreFromBackup } from '@ctxmirror/context-sync';
import { displayPath, errorMessage, openProject } from '../project.js';

const SNAPSHOT_LABELS = {
  loaded: 'merged document was readable',
  created: 'merged document was missing and has been created',
  recovered_from_backup: 'merged document was corrupt, recovered from backup',
  reset: 'merged document was corrupt with no usable backup, reset to empty',
} as const;

export function registerRepairCommand(program: Command): void {
  program
    .command('repair')
    .description('Repair the merged document')
    .option('--path <dir>', 'Project directory', '.')
    .option('--from-backup', 'Restore the backup copy and write it into the source files')
    .option('--verbose', 'Show detailed logs')
    .action(async (options: { path: string; fromBackup?: boolean; verbose?: boolean }) => {
      const spinner = ora('Repairing merged document...').start();

      try {
        const project = openProject(options, 'repair');
        const { pathSet, config, logger } = project;
        const target = displayPath(project, pathSet.mergedDocumentPath);

        if (options.fromBackup) {
          const result = await restoreFromBackup({ pathSet, logger, settings: config.sync });
          logger.close();
          if (!result.restored) {
            spinner.fail(`No usable backup of ${target}`);
            process.exit(1);
          }
          spinner.succeed(`Restored ${target} from backup`);
          for (const key of result.applied) console.log(chalk.green(`  ✓ ${key}`));
          for (const key of result.failed) console.log(chalk.red(`  ✗ ${key}`));
          console.log('');
          if (result.failed.length > 0) process.exit(1);
          return;
        }

        const { snapshot, report } = await repairOnce({ pathSet, logger, settings: config.sync });
        logger.close();

        if (report.failed.length === 0) {
          spinner.succeed(`Rebuilt ${target} from ${report.synced.length} component(s)`);
        } else {
          spinner.warn(`Rebuilt ${target}, ${report.failed.length} component(s) failed`);
        }
        console.log(chalk.gray(`  ${SNAPSHOT_LABELS[snapshot]}`));
        for (const failure of report.failed) {
          console.log(chalk.red(`  ✗ ${failure.componentKey}: ${failure.reason}`));
        }
        console.log('');
        if (report.failed.length > 0) process.exit(1);
      } catch (error: unknown) {
        spinner.fail('Repair failed');
        const message = errorMessage(error);
        console.error(chalk.red(`\n  ${message}\n`));
        process.exit(1);
      }
    });
}

/**
 * `ctxmirror context` command group.
 * Store the current component documents under a name, list stored
 * contexts, and restore one into the working set.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  listContexts,
  restoreContext,
  storeContext,
  syncOnce,
} from '@ctxmirror/context-sync';
import { displayPath, errorMessage, openProject } from '../project.js';

function fail(error: unknown): never {
  const message = errorMessage(error);
  console.error(chalk.red(`\n  ${message}\n`));
  process.exit(1);
}

export function registerContextCommand(program: Command): void {
  const context = program
    .command('context')
    .description('Store, list and restore named snapshots of the component documents');

  context
    .command('store [name]')
    .description('Archive the component documents (name defaults to the architecture title)')
    .option('--path <dir>', 'Project directory', '.')
    .action(async (name: string | undefined, options: { path: string }) => {
      try {
        const project = openProject(options, 'context');
        const stored = await storeContext(project.pathSet, name);
        project.logger.info('context', 'Stored context', { name: stored.name });
        project.logger.close();
        console.log(
          chalk.green(
            `\n  Stored "${stored.name}" (${stored.components.join(', ')}) in ${displayPath(project, stored.path)}\n`
          )
        );
      } catch (error: unknown) {
        fail(error);
      }
    });

  context
    .command('list')
    .description('List stored contexts')
    .option('--path <dir>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: { path: string; json?: boolean }) => {
      try {
        const project = openProject(options, 'context');
        const contexts = await listContexts(project.pathSet);
        project.logger.close();

        if (options.json) {
          console.log(JSON.stringify(contexts, null, 2));
          return;
        }
        if (contexts.length === 0) {
          console.log(chalk.gray('\n  No stored contexts.\n'));
          return;
        }
        console.log(chalk.bold('\n  Stored contexts\n'));
        for (const stored of contexts) {
          const when = new Date(stored.storedAt).toLocaleString();
          console.log(`  ${chalk.bold(stored.name.padEnd(30))} ${chalk.gray(when)}  ${stored.components.join(', ')}`);
        }
        console.log('');
      } catch (error: unknown) {
        fail(error);
      }
    });

  context
    .command('restore <name>')
    .description('Copy a stored context over the component documents and resync')
    .option('--path <dir>', 'Project directory', '.')
    .option('--verbose', 'Show detailed logs')
    .action(async (name: string, options: { path: string; verbose?: boolean }) => {
      const spinner = ora(`Restoring "${name}"...`).start();
      try {
        const project = openProject(options, 'context');
        const { pathSet, config, logger } = project;

        const result = await restoreContext(pathSet, name);
        const report = await syncOnce({ pathSet, logger, settings: config.sync });
        logger.close();

        const failures = result.failed.length + report.failed.length;
        if (failures === 0) {
          spinner.succeed(`Restored ${result.restored.length} component(s) from "${name}"`);
        } else {
          spinner.warn(`Restored "${name}" with ${failures} failure(s)`);
        }
        for (const key of result.missing) {
          console.log(chalk.gray(`  - ${key} (not in archive, left as is)`));
        }
        for (const failure of result.failed) {
          console.log(chalk.red(`  ✗ ${failure.componentKey}: ${failure.reason}`));
        }
        for (const failure of report.failed) {
          console.log(chalk.red(`  ✗ ${failure.componentKey}: ${failure.reason}`));
        }
        console.log('');
        if (failures > 0) process.exit(1);
      } catch (error: unknown) {
        spinner.fail('Restore failed');
        fail(error);
      }
    });
}

/**
 * `ctxmirror status` command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { inspect } from '@ctxmirror/context-sync';
import { displayPath, errorMessage, openProject } from '../project.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show whether each component matches the merged document')
    .option('--path <dir>', 'Project directory', '.')
    .option('--json', 'Output status as JSON')
    .action(async (options: { path: string; json?: boolean }) => {
      try {
        const project = openProject(options, 'status');
        const { pathSet, logger } = project;
        const inspection = await inspect(pathSet);
        logger.close();

        if (options.json) {
          console.log(JSON.stringify({ ide: pathSet.ide, ...inspection }, null, 2));
          return;
        }

        const merged = inspection.mergedDocument;
        const mergedState = !merged.exists
          ? chalk.yellow('missing')
          : merged.valid
            ? chalk.green('valid')
            : chalk.red(`corrupt (${merged.reason ?? 'unknown'})`);

        console.log(chalk.bold('\n  ctxmirror status\n'));
        console.log(`  Merged document: ${displayPath(project, merged.path)} ${mergedState}`);
        console.log(`  IDE:             ${pathSet.ide}`);
        console.log(`  Backup:          ${inspection.backupExists ? 'present' : chalk.gray('none')}`);
        console.log('');

        for (const component of inspection.components) {
          const state = !component.exists
            ? chalk.yellow('missing')
            : component.inSync
              ? chalk.green('in sync')
              : chalk.yellow('out of sync');
          console.log(
            `  ${component.componentKey.padEnd(14)} ${displayPath(project, component.path).padEnd(28)} ${String(component.bytes).padStart(7)} B  ${state}`
          );
        }
        console.log('');
      } catch (error: unknown) {
        const message = errorMessage(error);
        console.error(chalk.red(`\n  ${message}\n`));
        process.exit(1);
      }
    });
}

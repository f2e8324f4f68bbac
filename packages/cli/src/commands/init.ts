/**
 * `ctxmirror init` command.
 *
 * Writes a default .ctxmirror.yml, creates the component documents and an
 * empty merged document for the detected IDE.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  CONFIG_FILENAME,
  loadConfig,
  resolvePathSet,
  writeDefaultConfig,
} from '@ctxmirror/core';
import { ensureFile } from '@ctxmirror/context-sync';
import { displayPath, errorMessage } from '../project.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Set up ctxmirror in the current project')
    .option('--path <dir>', 'Project directory', '.')
    .option('--force', `Overwrite an existing ${CONFIG_FILENAME}`)
    .action(async (options: { path: string; force?: boolean }) => {
      const projectRoot = path.resolve(options.path);
      const project = { projectRoot };

      console.log(chalk.bold('\n  ctxmirror setup\n'));

      const spinner = ora('Writing configuration...').start();
      try {
        const configPath = path.join(projectRoot, CONFIG_FILENAME);
        if (fs.existsSync(configPath) && !options.force) {
          spinner.info(`${CONFIG_FILENAME} already exists (use --force to overwrite)`);
        } else {
          writeDefaultConfig(projectRoot);
          spinner.succeed(`Wrote ${CONFIG_FILENAME}`);
        }

        const pathSet = resolvePathSet(projectRoot, loadConfig(projectRoot), process.env);
        const created: string[] = [];
        for (const tracked of pathSet.trackedFiles) {
          if (await ensureFile(tracked.path, '')) created.push(tracked.path);
        }
        if (await ensureFile(pathSet.mergedDocumentPath, '{}')) {
          created.push(pathSet.mergedDocumentPath);
        }

        for (const file of created) {
          console.log(chalk.green(`  + ${displayPath(project, file)}`));
        }
        console.log(
          chalk.gray(
            `\n  Merged document: ${displayPath(project, pathSet.mergedDocumentPath)} (${pathSet.ide})`
          )
        );
        console.log(chalk.gray('  Next: run `ctxmirror watch` to keep everything in sync.\n'));
      } catch (error: unknown) {
        spinner.fail('Setup failed');
        const message = errorMessage(error);
        console.error(chalk.red(`\n  ${message}\n`));
        process.exit(1);
      }
    });
}

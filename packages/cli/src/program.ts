/**
 * Builds the ctxmirror command tree.
 */

import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerWatchCommand } from './commands/watch.js';
import { registerStatusCommand } from './commands/status.js';
import { registerRepairCommand } from './commands/repair.js';
import { registerContextCommand } from './commands/context.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ctxmirror')
    .version(CLI_VERSION)
    .description(
      'Keep per-topic context documents and an IDE rules file mirrored in both directions'
    );

  registerInitCommand(program);
  registerSyncCommand(program);
  registerWatchCommand(program);
  registerStatusCommand(program);
  registerRepairCommand(program);
  registerContextCommand(program);

  return program;
}

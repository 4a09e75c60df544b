/**
 * Program - the `windmill` command tree
 */

import { Command } from 'commander';
import { getLoggingConfig } from '@windmill/utils';
import { CommandContext } from './core/command-context.js';
import { registerExperimentCommands } from './commands/experiments.js';
import { registerWorkUnitCommands } from './commands/work-units.js';
import { registerSignalCommands } from './commands/signals.js';
import { registerArtifactCommands } from './commands/artifacts.js';

export const CLI_VERSION = '0.3.0';

export function createProgram(ctx: CommandContext = new CommandContext()): Command {
  const program = new Command();

  program
    .name('windmill')
    .description('Track experiments on the Windmill service')
    .version(CLI_VERSION)
    // Reject a bad LOG_LEVEL before any command runs
    .hook('preAction', () => {
      getLoggingConfig();
    });

  registerExperimentCommands(program, ctx);
  registerWorkUnitCommands(program, ctx);
  registerSignalCommands(program, ctx);
  registerArtifactCommands(program, ctx);

  return program;
}

/**
 * Experiment Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import type { CommandContext } from '../core/command-context.js';
import { createExperimentSchema } from '../command-defs/experiments.js';
import { createExperimentHandler } from '../handlers/experiments/create-experiment.js';

/**
 * Register experiment commands
 */
export function registerExperimentCommands(program: Command, ctx: CommandContext): void {
  const experimentCmd = program.command('experiment').description('Create experiments');

  const createCmd = experimentCmd
    .command('create <name>')
    .description('Create an experiment and print its work units')
    .option('--tag <tag...>', 'Tag the experiment (repeatable)')
    .option('--parameters <json>', 'JSON array with one parameter object per work unit')
    .option('--format <format>', 'Output format (json|table)', 'json');

  defineCommand(createCmd, ctx, {
    schema: createExperimentSchema,
    handler: createExperimentHandler,
    argsToOpts: (args, rawOpts) => ({
      ...rawOpts,
      name: args[0],
    }),
  });
}

/**
 * Signal Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import type { CommandContext } from '../core/command-context.js';
import { checkSignalSchema, updateSignalSchema } from '../command-defs/signals.js';
import { updateSignalHandler, type SignalAction } from '../handlers/signals/update-signal.js';
import { checkSignalHandler } from '../handlers/signals/check-signal.js';
import { workUnitOptions } from './work-units.js';

const MUTATIONS: Array<[SignalAction, string]> = [
  ['register', 'Register a signal for a work unit'],
  ['activate', 'Raise a signal'],
  ['deactivate', 'Lower a signal'],
];

/**
 * Register signal commands
 */
export function registerSignalCommands(program: Command, ctx: CommandContext): void {
  const signalCmd = program.command('signal').description('Manage work unit signals');

  for (const [action, description] of MUTATIONS) {
    defineCommand(
      workUnitOptions(signalCmd.command(action).description(description)).option(
        '--signal <name>',
        'Signal name'
      ),
      ctx,
      { schema: updateSignalSchema, handler: updateSignalHandler(action) }
    );
  }

  defineCommand(
    workUnitOptions(signalCmd.command('check').description('Print whether a signal is active'))
      .option('--signal <name>', 'Signal name')
      .option('--clear', 'Deactivate the signal as part of the check'),
    ctx,
    { schema: checkSignalSchema, handler: checkSignalHandler }
  );
}

/**
 * Work Unit Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import type { CommandContext } from '../core/command-context.js';
import {
  addDiaryEntrySchema,
  completeWorkUnitSchema,
  getParametersSchema,
  recordMeasurementsSchema,
  verifyWorkUnitSchema,
} from '../command-defs/work-units.js';
import { verifyWorkUnitHandler } from '../handlers/work-units/verify-work-unit.js';
import { getParametersHandler } from '../handlers/work-units/get-parameters.js';
import { addDiaryEntryHandler } from '../handlers/work-units/add-diary-entry.js';
import { recordMeasurementsHandler } from '../handlers/work-units/record-measurements.js';
import { completeWorkUnitHandler } from '../handlers/work-units/complete-work-unit.js';

/**
 * Add the options that identify a work unit
 */
export function workUnitOptions(cmd: Command): Command {
  return cmd
    .option('--xid <xid>', 'Experiment id')
    .option('--wid <wid>', 'Work unit id')
    .option('--format <format>', 'Output format (json|table)', 'json');
}

/**
 * Register work unit commands
 */
export function registerWorkUnitCommands(program: Command, ctx: CommandContext): void {
  const workUnitCmd = program.command('work-unit').description('Inspect and update work units');

  defineCommand(
    workUnitOptions(workUnitCmd.command('verify').description('Check that a work unit exists')),
    ctx,
    { schema: verifyWorkUnitSchema, handler: verifyWorkUnitHandler }
  );

  defineCommand(
    workUnitOptions(
      workUnitCmd.command('parameters').description('Print the parameters assigned to a work unit')
    ),
    ctx,
    { schema: getParametersSchema, handler: getParametersHandler }
  );

  defineCommand(
    workUnitOptions(
      workUnitCmd.command('diary').description("Add an entry to the experiment's diary")
    ).option('--entry <text>', 'Diary entry'),
    ctx,
    { schema: addDiaryEntrySchema, handler: addDiaryEntryHandler }
  );

  defineCommand(
    workUnitOptions(workUnitCmd.command('measure').description('Record measurements')).option(
      '--measurements <json>',
      'Measurements as JSON'
    ),
    ctx,
    { schema: recordMeasurementsSchema, handler: recordMeasurementsHandler }
  );

  defineCommand(
    workUnitOptions(workUnitCmd.command('complete').description('Mark a work unit complete')),
    ctx,
    { schema: completeWorkUnitSchema, handler: completeWorkUnitHandler }
  );
}

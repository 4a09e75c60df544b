/**
 * Create Experiment Handler
 */

import type { CommandContext } from '../../core/command-context.js';
import type { CreateExperimentArgs } from '../../command-defs/experiments.js';

export async function createExperimentHandler(args: CreateExperimentArgs, ctx: CommandContext) {
  const workUnits = await ctx.client().createExperimentWorkUnits(args.name, {
    tags: args.tag,
    parameters: args.parameters,
  });

  return workUnits.map(({ xid, wid }) => ({ xid, wid }));
}

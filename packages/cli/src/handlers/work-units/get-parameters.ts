/**
 * Get Work Unit Parameters Handler
 */

import type { CommandContext } from '../../core/command-context.js';
import type { WorkUnitRefArgs } from '../../command-defs/work-units.js';

export async function getParametersHandler(args: WorkUnitRefArgs, ctx: CommandContext) {
  const workUnit = await ctx.workUnit(args.xid, args.wid);
  return workUnit.getParameters();
}

/**
 * Verify Work Unit Handler
 *
 * Rejects with WorkUnitNotFoundError when the server does not know the work unit.
 */

import type { CommandContext } from '../../core/command-context.js';
import type { WorkUnitRefArgs } from '../../command-defs/work-units.js';

export async function verifyWorkUnitHandler(args: WorkUnitRefArgs, ctx: CommandContext) {
  const workUnit = await ctx.client().getWorkUnit(args.xid, args.wid);
  return { xid: workUnit.xid, wid: workUnit.wid, exists: true };
}

import type { CommandContext } from '../../core/command-context.js';
import type { WorkUnitRefArgs } from '../../command-defs/work-units.js';

export async function completeWorkUnitHandler(args: WorkUnitRefArgs, ctx: CommandContext) {
  const workUnit = await ctx.workUnit(args.xid, args.wid);
  await workUnit.complete();
  return { ok: true, xid: args.xid, wid: args.wid };
}

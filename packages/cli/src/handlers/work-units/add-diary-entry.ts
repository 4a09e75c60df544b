import type { CommandContext } from '../../core/command-context.js';
import type { AddDiaryEntryArgs } from '../../command-defs/work-units.js';

export async function addDiaryEntryHandler(args: AddDiaryEntryArgs, ctx: CommandContext) {
  const workUnit = await ctx.workUnit(args.xid, args.wid);
  await workUnit.addDiaryEntry(args.entry);
  return { ok: true, xid: args.xid, wid: args.wid };
}

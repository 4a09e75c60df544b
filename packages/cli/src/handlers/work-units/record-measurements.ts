import type { CommandContext } from '../../core/command-context.js';
import type { RecordMeasurementsArgs } from '../../command-defs/work-units.js';

export async function recordMeasurementsHandler(args: RecordMeasurementsArgs, ctx: CommandContext) {
  const workUnit = await ctx.workUnit(args.xid, args.wid);
  await workUnit.recordMeasurements(args.measurements);
  return { ok: true, xid: args.xid, wid: args.wid };
}

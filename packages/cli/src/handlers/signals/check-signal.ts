/**
 * Check Signal Handler
 *
 * With `clear`, the server resets the signal in the same request.
 */

import type { CommandContext } from '../../core/command-context.js';
import type { CheckSignalArgs } from '../../command-defs/signals.js';

export async function checkSignalHandler(args: CheckSignalArgs, ctx: CommandContext) {
  const workUnit = await ctx.workUnit(args.xid, args.wid);
  const active = await workUnit.checkSignalActive(args.signal, args.clear);
  return { signal: args.signal, active };
}

/**
 * Signal Mutation Handlers
 *
 * register, activate and deactivate share one request shape.
 */

import type { WorkUnit } from '@windmill/client';
import type { CommandContext } from '../../core/command-context.js';
import type { UpdateSignalArgs } from '../../command-defs/signals.js';

export type SignalAction = 'register' | 'activate' | 'deactivate';

function send(workUnit: WorkUnit, action: SignalAction, signal: string): Promise<void> {
  switch (action) {
    case 'register':
      return workUnit.registerSignal(signal);
    case 'activate':
      return workUnit.activateSignal(signal);
    case 'deactivate':
      return workUnit.deactivateSignal(signal);
  }
}

export function updateSignalHandler(action: SignalAction) {
  return async (args: UpdateSignalArgs, ctx: CommandContext) => {
    const workUnit = await ctx.workUnit(args.xid, args.wid);
    await send(workUnit, action, args.signal);
    return { ok: true, action, xid: args.xid, wid: args.wid, signal: args.signal };
  };
}

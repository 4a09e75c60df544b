/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: schema validation, handler invocation, output formatting
 *   and error reporting
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import { parseArguments } from './argument-parser.js';
import { formatOutput } from './output-formatter.js';
import { reportCliError } from './error-handler.js';
import type { CommandContext } from './command-context.js';
import type { BaseCommandArgs, CommandHandler } from '../types/index.js';

export interface DefineCommandArgs<TArgs extends BaseCommandArgs> {
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  handler: CommandHandler<TArgs>;
  // Merge Commander arguments into options before validation
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
}

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Validates with the command's zod schema
 * - Runs the handler and prints its result in the requested format
 *
 * Failures never escape the action: they are reported and set the exit code.
 */
export function defineCommand<TArgs extends BaseCommandArgs>(
  cmd: Command,
  ctx: CommandContext,
  args: DefineCommandArgs<TArgs>
): Command {
  cmd.action(async (...commanderArgs: unknown[]) => {
    try {
      const rawOpts: Record<string, unknown> = cmd.opts();
      const merged = args.argsToOpts ? args.argsToOpts(commanderArgs, rawOpts) : rawOpts;
      const validated = parseArguments(args.schema, merged);

      const result = await args.handler(validated, ctx);
      ctx.write(`${formatOutput(result, validated.format)}\n`);
    } catch (error) {
      reportCliError(error, ctx, { command: cmd.name() });
    }
  });

  return cmd;
}

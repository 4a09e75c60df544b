/**
 * CLI-specific type definitions
 */

import type { CommandContext } from '../core/command-context.js';

/**
 * Output format for command results
 */
export type OutputFormat = 'json' | 'table';

/**
 * Options every command accepts
 */
export interface BaseCommandArgs {
  format: OutputFormat;
}

/**
 * Command handler: validated arguments in, printable result out
 */
export type CommandHandler<TArgs extends BaseCommandArgs, TResult = unknown> = (
  args: TArgs,
  ctx: CommandContext
) => Promise<TResult>;

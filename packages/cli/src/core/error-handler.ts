/**
 * Error Handler - one line on stderr, details in the log
 */

import { handleError } from '@windmill/utils';
import type { CommandContext } from './command-context.js';

/**
 * Report a failed command and mark the process as failed
 */
export function reportCliError(
  error: unknown,
  ctx: CommandContext,
  context?: Record<string, unknown>
): void {
  const { message } = handleError(error, context);
  ctx.writeError(`Error: ${message}\n`);
  process.exitCode = 1;
}

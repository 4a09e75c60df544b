/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@windmill/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawArgs: Record<string, unknown>
): T {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  // Format Zod errors into user-friendly messages
  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Option value holding JSON text, decoded and then checked against `schema`
 */
export function jsonArgument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        return JSON.parse(text);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected valid JSON', fatal: true });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

import { z } from 'zod';

export const formatSchema = z.enum(['json', 'table']).default('json');

/**
 * Options naming one work unit; `--wid` arrives from commander as text
 */
export const workUnitRefSchema = z.object({
  xid: z.string().min(1),
  wid: z.coerce.number().int().nonnegative(),
  format: formatSchema,
});

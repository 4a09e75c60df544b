/**
 * Signal Command Definitions
 */

import { z } from 'zod';
import { workUnitRefSchema } from './shared.js';

export const updateSignalSchema = workUnitRefSchema.extend({
  signal: z.string().min(1),
});

export const checkSignalSchema = updateSignalSchema.extend({
  clear: z.boolean().default(false),
});

export type UpdateSignalArgs = z.infer<typeof updateSignalSchema>;
export type CheckSignalArgs = z.infer<typeof checkSignalSchema>;

/**
 * Experiment Command Definitions
 */

import { z } from 'zod';
import { jsonArgument } from '../core/argument-parser.js';
import { formatSchema } from './shared.js';

/**
 * Create experiment schema
 */
export const createExperimentSchema = z.object({
  name: z.string().min(1),
  tag: z.array(z.string().min(1)).default([]),
  parameters: jsonArgument(z.array(z.record(z.unknown()))).optional(),
  format: formatSchema,
});

export type CreateExperimentArgs = z.infer<typeof createExperimentSchema>;

/**
 * Work Unit Command Definitions
 */

import { z } from 'zod';
import { jsonArgument } from '../core/argument-parser.js';
import { workUnitRefSchema } from './shared.js';

export const verifyWorkUnitSchema = workUnitRefSchema;
export const getParametersSchema = workUnitRefSchema;
export const completeWorkUnitSchema = workUnitRefSchema;

export const addDiaryEntrySchema = workUnitRefSchema.extend({
  entry: z.string().min(1),
});

/**
 * Measurements are forwarded as decoded, without further checks
 */
export const recordMeasurementsSchema = workUnitRefSchema.extend({
  measurements: jsonArgument(z.unknown()),
});

export type WorkUnitRefArgs = z.infer<typeof workUnitRefSchema>;
export type AddDiaryEntryArgs = z.infer<typeof addDiaryEntrySchema>;
export type RecordMeasurementsArgs = z.infer<typeof recordMeasurementsSchema>;

/**
 * Artifact Command Definitions
 */

import { z } from 'zod';
import { workUnitRefSchema } from './shared.js';

export const uploadArtifactSchema = workUnitRefSchema.extend({
  filename: z.string().min(1),
  path: z.string().min(1),
});

export type UploadArtifactArgs = z.infer<typeof uploadArtifactSchema>;

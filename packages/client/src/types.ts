import type { AxiosInstance } from 'axios';
import { z } from 'zod';

export interface WindmillClientOptions {
  /** API key sent with every request. Falls back to WINDMILLAI_API_KEY. */
  apiKey?: string;
  /** Service base URL. Falls back to WINDMILLAI_ENDPOINT, then the public host. */
  endpoint?: string;
  /** Request timeout in milliseconds. No timeout when omitted. */
  timeout?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

export interface CreateExperimentOptions {
  tags?: string[];
  /** One parameter object per work unit to create. */
  parameters?: Array<Record<string, unknown>>;
}

export interface GetWorkUnitOptions {
  /** Ask the server whether the work unit exists first (default true). */
  verifyExists?: boolean;
}

export type ArtifactContents = string | Uint8Array;

export interface CreateExperimentRequest {
  api_key?: string;
  name: string;
  tags?: string[];
  parameters?: Array<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

export const workUnitDescriptorSchema = z.object({
  xid: z.string(),
  wid: z.number().int(),
});

export const createExperimentResponseSchema = z.object({
  work_units: z.array(workUnitDescriptorSchema),
});

export const verifyWorkUnitResponseSchema = z.object({
  exists: z.boolean(),
});

/**
 * Any JSON object. Checked in place rather than rebuilt, so the mapping comes
 * back exactly as decoded, `__proto__` keys included.
 */
export const workUnitParametersSchema = z.custom<Record<string, unknown>>(
  (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
  'Expected an object'
);

export const checkSignalResponseSchema = z.object({
  active: z.boolean(),
});

export type WorkUnitDescriptor = z.infer<typeof workUnitDescriptorSchema>;
export type CreateExperimentResponse = z.infer<typeof createExperimentResponseSchema>;
export type WorkUnitParameters = z.infer<typeof workUnitParametersSchema>;

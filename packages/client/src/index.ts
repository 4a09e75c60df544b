/**
 * @windmill/client - Windmill experiment-tracking client
 *
 * Public API exports
 */

export { WindmillClient } from './windmill-client.js';
export { WorkUnit } from './work-unit.js';
export { BaseApiClient, API_PREFIX } from './base-client.js';
export type { BaseApiClientConfig, QueryParams, ResponseSchema } from './base-client.js';
export { WindmillClientError, WorkUnitNotFoundError, WINDMILL_API_NAME } from './errors.js';
export { createDirectoryArchive } from './archive.js';

export {
  createExperimentResponseSchema,
  verifyWorkUnitResponseSchema,
  workUnitParametersSchema,
  checkSignalResponseSchema,
} from './types.js';
export type {
  WindmillClientOptions,
  CreateExperimentOptions,
  CreateExperimentRequest,
  GetWorkUnitOptions,
  ArtifactContents,
  WorkUnitDescriptor,
  CreateExperimentResponse,
  WorkUnitParameters,
} from './types.js';

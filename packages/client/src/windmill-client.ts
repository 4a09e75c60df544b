import { createLogger, getWindmillConfig } from '@windmill/utils';
import { BaseApiClient } from './base-client.js';
import { WorkUnitNotFoundError } from './errors.js';
import { WorkUnit } from './work-unit.js';
import {
  createExperimentResponseSchema,
  verifyWorkUnitResponseSchema,
  type CreateExperimentOptions,
  type CreateExperimentRequest,
  type GetWorkUnitOptions,
  type WindmillClientOptions,
} from './types.js';

const logger = createLogger('client');

/**
 * Entry point to the Windmill service: creates experiments and hands out work
 * unit handles.
 *
 * ```ts
 * const client = new WindmillClient({ apiKey: 'test-key' });
 * const workUnit = await client.createExperiment('lr sweep');
 * ```
 */
export class WindmillClient extends BaseApiClient {
  readonly apiKey?: string;

  constructor(options: WindmillClientOptions = {}) {
    const config = getWindmillConfig(options);
    super({
      endpoint: config.endpoint,
      timeout: options.timeout,
      axiosInstance: options.axiosInstance,
    });

    this.apiKey = config.apiKey;
  }

  /**
   * Create an experiment.
   *
   * Resolves to a single WorkUnit when the server created exactly one, and to
   * an array in server order otherwise. Use
   * {@link WindmillClient.createExperimentWorkUnits} for an array every time.
   */
  async createExperiment(
    name: string,
    options: CreateExperimentOptions = {}
  ): Promise<WorkUnit | WorkUnit[]> {
    const workUnits = await this.createExperimentWorkUnits(name, options);
    return workUnits.length === 1 ? workUnits[0] : workUnits;
  }

  /**
   * Create an experiment and return all of its work units.
   */
  async createExperimentWorkUnits(
    name: string,
    options: CreateExperimentOptions = {}
  ): Promise<WorkUnit[]> {
    const request: CreateExperimentRequest = { api_key: this.apiKey, name };
    if (options.tags && options.tags.length > 0) {
      request.tags = options.tags;
    }
    if (options.parameters && options.parameters.length > 0) {
      request.parameters = options.parameters;
    }

    const response = await this.post('create_experiment', request, createExperimentResponseSchema);
    logger.debug('Experiment created', {
      name,
      xid: response.work_units[0]?.xid,
      workUnits: response.work_units.length,
    });

    return response.work_units.map(({ xid, wid }) => this.workUnit(xid, wid));
  }

  /**
   * Get a handle on an existing work unit.
   *
   * With `verifyExists` (the default) the server is asked first; otherwise no
   * request is made and the handle may point at nothing.
   */
  async getWorkUnit(
    xid: string,
    wid: number,
    { verifyExists = true }: GetWorkUnitOptions = {}
  ): Promise<WorkUnit> {
    if (verifyExists) {
      const response = await this.get(
        'verify_work_unit_exists',
        { api_key: this.apiKey, xid, wid },
        verifyWorkUnitResponseSchema
      );
      if (!response.exists) {
        throw new WorkUnitNotFoundError(xid, wid);
      }
    }
    return this.workUnit(xid, wid);
  }

  private workUnit(xid: string, wid: number): WorkUnit {
    return new WorkUnit(xid, wid, {
      apiKey: this.apiKey,
      endpoint: this.endpoint,
      timeout: this.timeout,
      axiosInstance: this.axiosInstance,
    });
  }
}

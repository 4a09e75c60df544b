/**
 * Tests for windmill-client.ts
 *
 * Tests cover:
 * - Credential and endpoint resolution
 * - Experiment creation (single and multiple work units, tags, parameters)
 * - Work unit lookup with and without verification
 * - Error responses
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { winstonLogger } from '@windmill/utils';
import { WindmillClient } from '../../src/windmill-client.js';
import { WorkUnit } from '../../src/work-unit.js';
import { WindmillClientError, WorkUnitNotFoundError } from '../../src/errors.js';
import { createMockAxios, respond, type MockAxios } from '../helpers/mock-axios.js';

describe('WindmillClient', () => {
  let mockAxios: MockAxios;

  beforeEach(() => {
    mockAxios = createMockAxios();
    vi.stubEnv('WINDMILLAI_API_KEY', '');
    vi.stubEnv('WINDMILLAI_ENDPOINT', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('Initialization', () => {
    it('should store explicit credentials verbatim and ignore the environment', () => {
      vi.stubEnv('WINDMILLAI_API_KEY', 'env-key');
      vi.stubEnv('WINDMILLAI_ENDPOINT', 'https://env.example.com');

      const client = new WindmillClient({ apiKey: 'key', endpoint: 'endpoint' });

      expect(client.apiKey).toBe('key');
      expect(client.endpoint).toBe('endpoint');
    });

    it('should fall back to the environment at construction time', () => {
      vi.stubEnv('WINDMILLAI_API_KEY', 'env-key');
      vi.stubEnv('WINDMILLAI_ENDPOINT', 'https://env.example.com');

      const client = new WindmillClient();

      expect(client.apiKey).toBe('env-key');
      expect(client.endpoint).toBe('https://env.example.com');
    });

    it('should use the public endpoint and no key when nothing is configured', () => {
      const client = new WindmillClient();

      expect(client.apiKey).toBeUndefined();
      expect(client.endpoint).toBe('https://www.windmillai.com');
    });

    it('should use injected axios instance', () => {
      const client = new WindmillClient({ axiosInstance: mockAxios.instance });

      expect(client.getAxiosInstance()).toBe(mockAxios.instance);
    });
  });

  describe('createExperiment', () => {
    let client: WindmillClient;

    beforeEach(() => {
      client = new WindmillClient({
        apiKey: 'key',
        endpoint: 'endpoint',
        axiosInstance: mockAxios.instance,
      });
    });

    it('should send only the key and name for a basic experiment', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { work_units: [{ xid: 'asdf', wid: 25 }] }));

      const result = await client.createExperiment('some experiment');

      expect(mockAxios.request).toHaveBeenCalledTimes(1);
      expect(mockAxios.config().method).toBe('POST');
      expect(mockAxios.config().url).toBe('endpoint/api/v0/create_experiment');
      expect(mockAxios.config().data).toStrictEqual({ api_key: 'key', name: 'some experiment' });

      expect(result).toBeInstanceOf(WorkUnit);
      if (!(result instanceof WorkUnit)) return;
      expect(result.xid).toBe('asdf');
      expect(result.wid).toBe(25);
      expect(result.apiKey).toBe('key');
      expect(result.endpoint).toBe('endpoint');
    });

    it('should send tags when given', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { work_units: [{ xid: 'asdf', wid: 25 }] }));

      await client.createExperiment('some experiment', { tags: ['some', 'tags'] });

      expect(mockAxios.config().data).toStrictEqual({
        api_key: 'key',
        name: 'some experiment',
        tags: ['some', 'tags'],
      });
    });

    it('should omit empty tags and parameters', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { work_units: [{ xid: 'asdf', wid: 25 }] }));

      await client.createExperiment('some experiment', { tags: [], parameters: [] });

      expect(mockAxios.config().data).toStrictEqual({ api_key: 'key', name: 'some experiment' });
    });

    it('should return work units in server order when several are created', async () => {
      mockAxios.request.mockResolvedValue(
        respond(200, {
          work_units: [
            { xid: 'asdf', wid: 1 },
            { xid: 'asdf', wid: 2 },
            { xid: 'asdf', wid: 3 },
          ],
        })
      );

      const result = await client.createExperiment('some experiment', {
        parameters: [{}, {}, {}],
      });

      expect(mockAxios.config().data).toStrictEqual({
        api_key: 'key',
        name: 'some experiment',
        parameters: [{}, {}, {}],
      });
      expect(Array.isArray(result)).toBe(true);
      if (!Array.isArray(result)) return;
      expect(result.map((wu) => wu.wid)).toEqual([1, 2, 3]);
      for (const wu of result) {
        expect(wu.xid).toBe('asdf');
        expect(wu.apiKey).toBe('key');
        expect(wu.endpoint).toBe('endpoint');
      }
    });

    it('should share the transport with created work units', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { work_units: [{ xid: 'asdf', wid: 25 }] }));

      const [workUnit] = await client.createExperimentWorkUnits('some experiment');

      expect(workUnit?.getAxiosInstance()).toBe(mockAxios.instance);
    });

    it('should always return an array from createExperimentWorkUnits', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { work_units: [{ xid: 'asdf', wid: 25 }] }));

      const result = await client.createExperimentWorkUnits('some experiment');

      expect(result).toHaveLength(1);
      expect(result[0]?.wid).toBe(25);
    });

    it('should raise the response body on failure', async () => {
      mockAxios.request.mockResolvedValue(respond(400, 'experiment name is required'));

      await expect(client.createExperiment('')).rejects.toThrow(WindmillClientError);
      await expect(client.createExperiment('')).rejects.toThrow('experiment name is required');
    });

    it('should reject a response without work units', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { xid: 'asdf', wid: 25 }));

      await expect(client.createExperiment('some experiment')).rejects.toThrow(
        'Malformed response from create_experiment: work_units: Required'
      );
    });

    it('should log creation at debug level only', async () => {
      const info = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);
      const debug = vi.spyOn(winstonLogger, 'debug').mockImplementation(() => winstonLogger);
      mockAxios.request.mockResolvedValue(respond(200, { work_units: [{ xid: 'asdf', wid: 25 }] }));

      await client.createExperiment('some experiment');

      expect(info).not.toHaveBeenCalled();
      expect(debug).toHaveBeenCalledWith('Experiment created', {
        namespace: 'client',
        name: 'some experiment',
        xid: 'asdf',
        workUnits: 1,
      });
    });
  });

  describe('getWorkUnit', () => {
    let client: WindmillClient;

    beforeEach(() => {
      client = new WindmillClient({
        apiKey: 'key',
        endpoint: 'endpoint',
        axiosInstance: mockAxios.instance,
      });
    });

    it('should not call the server when verification is skipped', async () => {
      const wu = await client.getWorkUnit('xid', 123, { verifyExists: false });

      expect(mockAxios.request).not.toHaveBeenCalled();
      expect(wu.xid).toBe('xid');
      expect(wu.wid).toBe(123);
      expect(wu.apiKey).toBe('key');
      expect(wu.endpoint).toBe('endpoint');
    });

    it('should verify the work unit exists by default', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { exists: true }));

      const wu = await client.getWorkUnit('some xid', 123);

      expect(mockAxios.request).toHaveBeenCalledTimes(1);
      expect(mockAxios.config().method).toBe('GET');
      expect(mockAxios.config().url).toBe('endpoint/api/v0/verify_work_unit_exists');
      expect(mockAxios.config().params).toStrictEqual({ api_key: 'key', xid: 'some xid', wid: 123 });
      expect(wu.xid).toBe('some xid');
      expect(wu.wid).toBe(123);
    });

    it('should raise when the work unit does not exist', async () => {
      mockAxios.request.mockResolvedValue(respond(200, { exists: false }));

      const lookup = client.getWorkUnit('some xid', 123);

      await expect(lookup).rejects.toBeInstanceOf(WorkUnitNotFoundError);
      await expect(lookup).rejects.toBeInstanceOf(WindmillClientError);
      await expect(lookup).rejects.toThrow("Work unit 123 of experiment 'some xid' does not exist");
    });

    it('should raise the response body when verification fails', async () => {
      mockAxios.request.mockResolvedValue(respond(403, 'invalid api key'));

      await expect(client.getWorkUnit('some xid', 123)).rejects.toMatchObject({
        message: 'invalid api key',
        apiStatusCode: 403,
      });
    });

    it('should hand work units the resolved key without reading the environment again', async () => {
      const keyless = new WindmillClient({ endpoint: 'endpoint', axiosInstance: mockAxios.instance });
      vi.stubEnv('WINDMILLAI_API_KEY', 'late-key');

      const wu = await keyless.getWorkUnit('xid', 1, { verifyExists: false });

      expect(keyless.apiKey).toBeUndefined();
      expect(wu.apiKey).toBeUndefined();
    });
  });
});

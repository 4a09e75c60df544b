import { readFile } from 'fs/promises';
import { createLogger, getWindmillConfig, warnDeprecated } from '@windmill/utils';
import { BaseApiClient } from './base-client.js';
import { createDirectoryArchive } from './archive.js';
import {
  checkSignalResponseSchema,
  workUnitParametersSchema,
  type ArtifactContents,
  type WindmillClientOptions,
  type WorkUnitParameters,
} from './types.js';

const logger = createLogger('client');

type SignalAction = 'register_signal' | 'activate_signal' | 'deactivate_signal';

/**
 * Handle on one run (work unit) of an experiment, identified by `(xid, wid)`.
 *
 * Holds no server state: every method is a fresh request, and nothing stops
 * calls after `complete()`.
 */
export class WorkUnit extends BaseApiClient {
  readonly xid: string;
  readonly wid: number;
  readonly apiKey?: string;

  constructor(xid: string, wid: number, options: WindmillClientOptions = {}) {
    const config = getWindmillConfig(options);
    super({
      endpoint: config.endpoint,
      timeout: options.timeout,
      axiosInstance: options.axiosInstance,
    });

    this.xid = xid;
    this.wid = wid;
    this.apiKey = config.apiKey;
  }

  private identity(): { api_key?: string; xid: string; wid: number } {
    return { api_key: this.apiKey, xid: this.xid, wid: this.wid };
  }

  /**
   * Parameters assigned to this work unit when the experiment was created.
   */
  async getParameters(): Promise<WorkUnitParameters> {
    return this.get('get_work_unit_parameters', this.identity(), workUnitParametersSchema);
  }

  /**
   * Append a free-text note to the experiment's diary.
   */
  async addDiaryEntry(entry: string): Promise<void> {
    await this.post('add_diary_entry', { api_key: this.apiKey, xid: this.xid, entry });
  }

  /**
   * Push measurements, typically a map of metric name to value. The shape is
   * not checked locally.
   */
  async recordMeasurements(measurements: unknown): Promise<void> {
    await this.post('add_measurements', { ...this.identity(), measurements });
  }

  /**
   * Mark the work unit finished. Calling it again resends the request.
   */
  async complete(): Promise<void> {
    await this.post('complete_experiment', this.identity());
    logger.debug('Work unit completed', { xid: this.xid, wid: this.wid });
  }

  /**
   * @deprecated Use {@link WorkUnit.complete}.
   */
  async completeExperiment(): Promise<void> {
    warnDeprecated('WorkUnit.completeExperiment', 'WorkUnit.complete');
    await this.complete();
  }

  // -- Signals ---------------------------------------------------------------

  /**
   * Add a signal to this work unit. New signals start inactive.
   */
  async registerSignal(signal: string): Promise<void> {
    await this.updateSignal('register_signal', signal);
  }

  async activateSignal(signal: string): Promise<void> {
    await this.updateSignal('activate_signal', signal);
  }

  async deactivateSignal(signal: string): Promise<void> {
    await this.updateSignal('deactivate_signal', signal);
  }

  /**
   * Read a signal. With `deactivate`, the server also clears it in the same
   * request, so a set signal is observed exactly once.
   */
  async checkSignalActive(signal: string, deactivate: boolean = false): Promise<boolean> {
    const response = await this.get(
      'check_signal_active',
      { ...this.identity(), signal, clear: deactivate },
      checkSignalResponseSchema
    );
    return response.active;
  }

  private async updateSignal(action: SignalAction, signal: string): Promise<void> {
    await this.post(action, { ...this.identity(), signal });
  }

  // -- Artifacts -------------------------------------------------------------

  /**
   * Upload raw contents as an artifact stored under `filename`.
   */
  async createArtifact(filename: string, contents: ArtifactContents): Promise<void> {
    const meta = { ...this.identity(), filename };

    const form = new FormData();
    form.append('meta', new Blob([JSON.stringify(meta)], { type: 'application/json' }), 'meta');
    form.append('contents', new Blob([contents], { type: 'application/octet-stream' }), filename);

    await this.postMultipart('create_artifact?upload-type=multipart', form);
    logger.debug('Artifact uploaded', { xid: this.xid, wid: this.wid, filename });
  }

  /**
   * Upload a local file. The whole file is read into memory first.
   */
  async createArtifactFromFile(filename: string, localPath: string): Promise<void> {
    const contents = await readFile(localPath);
    await this.createArtifact(filename, contents);
  }

  /**
   * Upload a local directory as a gzip-compressed tar archive built in memory.
   */
  async createArtifactFromDirectory(filename: string, localDirectory: string): Promise<void> {
    const archive = await createDirectoryArchive(localDirectory);
    await this.createArtifact(filename, archive);
  }
}

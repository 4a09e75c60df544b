/**
 * Command Context - Lazy client creation
 *
 * Handlers never construct a WindmillClient themselves; they ask the context,
 * which builds one from configuration on first use.
 */

import { WindmillClient, type WindmillClientOptions, type WorkUnit } from '@windmill/client';
import { ConfigurationError } from '@windmill/utils';

export type OutputWriter = (text: string) => void;

/**
 * Options for creating a CommandContext with overrides
 * Useful for testing
 */
export interface CommandContextOptions {
  /**
   * Use this client instead of building one from configuration
   */
  clientOverride?: WindmillClient;
  /**
   * Passed to the WindmillClient constructor
   */
  clientOptions?: WindmillClientOptions;
  stdout?: OutputWriter;
  stderr?: OutputWriter;
}

export class CommandContext {
  private _client?: WindmillClient;
  private readonly stdout: OutputWriter;
  private readonly stderr: OutputWriter;

  constructor(private readonly options: CommandContextOptions = {}) {
    this.stdout = options.stdout ?? ((text) => process.stdout.write(text));
    this.stderr = options.stderr ?? ((text) => process.stderr.write(text));
  }

  client(): WindmillClient {
    if (!this._client) {
      this._client = this.options.clientOverride ?? this.createClient();
    }
    return this._client;
  }

  /**
   * Handle on a work unit without asking the server whether it exists
   */
  async workUnit(xid: string, wid: number): Promise<WorkUnit> {
    return this.client().getWorkUnit(xid, wid, { verifyExists: false });
  }

  write(text: string): void {
    this.stdout(text);
  }

  writeError(text: string): void {
    this.stderr(text);
  }

  private createClient(): WindmillClient {
    const client = new WindmillClient(this.options.clientOptions);
    if (client.apiKey === undefined) {
      throw new ConfigurationError('WINDMILLAI_API_KEY is not set', 'WINDMILLAI_API_KEY');
    }
    return client;
  }
}

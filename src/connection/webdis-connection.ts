import type { RawCommand } from '../command/index.js';
import { ConnectionError, ParametersError } from '../errors/index.js';
import type { ConnectionParameters } from '../parameters/index.js';
import { AbstractConnection } from './abstract-connection.js';

/**
 * Connection bridged over HTTP, one `GET /<COMMAND>/<arg>/...` request per command.
 *
 * There is no persistent transport: `connect()` only replays the connect
 * commands as requests.
 */
export class WebdisConnection extends AbstractConnection {
  constructor(parameters: ConnectionParameters) {
    super(parameters);

    if (parameters.scheme !== 'http') {
      throw new ParametersError(`Invalid scheme for an HTTP connection: ${parameters.scheme}`);
    }
  }

  get baseUrl(): string {
    return `http://${this.parameters.host}:${this.parameters.port}`;
  }

  protected async open(): Promise<void> {}

  protected async close(): Promise<void> {}

  protected async write(command: RawCommand): Promise<void> {
    const url = `${this.baseUrl}/${command.tokens.map(encodeURIComponent).join('/')}`;

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.parameters.timeout * 1000) });
    } catch (error) {
      throw new ConnectionError(`Request for ${command.id} to ${this} failed`, this.parameters, error);
    }

    // Drain the body so the underlying socket can be reused.
    await response.text();

    if (!response.ok) {
      throw new ConnectionError(
        `Request for ${command.id} to ${this} failed with HTTP ${response.status}`,
        this.parameters,
      );
    }
  }
}

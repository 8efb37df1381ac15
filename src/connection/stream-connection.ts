import { createConnection, type Socket } from 'node:net';
import type { RawCommand } from '../command/index.js';
import { ConnectionError, ParametersError } from '../errors/index.js';
import type { ConnectionParameters } from '../parameters/index.js';
import { AbstractConnection } from './abstract-connection.js';

const STREAM_SCHEMES = ['tcp', 'unix'];

/**
 * Stream socket connection over TCP or a UNIX domain socket.
 *
 * @example
 * ```typescript
 * const connection = new StreamConnection(ConnectionParameters.create('unix:/var/run/kv.sock'));
 * await connection.connect();
 * ```
 */
export class StreamConnection extends AbstractConnection {
  private socket?: Socket;

  constructor(parameters: ConnectionParameters) {
    super(parameters);

    if (!STREAM_SCHEMES.includes(parameters.scheme)) {
      throw new ParametersError(`Invalid scheme for a stream connection: ${parameters.scheme}`);
    }
    if (parameters.scheme === 'unix' && parameters.path === undefined) {
      throw new ParametersError('A unix connection requires a socket path');
    }
  }

  protected open(): Promise<void> {
    const { host, port, path, timeout } = this.parameters;

    return new Promise((resolve, reject) => {
      const socket = path !== undefined && this.parameters.scheme === 'unix'
        ? createConnection({ path })
        : createConnection({ host, port });

      const fail = (error: Error): void => {
        socket.destroy();
        reject(new ConnectionError(`Error while connecting to ${this}: ${error.message}`, this.parameters, error));
      };

      socket.setTimeout(timeout * 1000, () => fail(new Error('connection timed out')));
      socket.once('error', fail);
      socket.once('connect', () => {
        socket.setTimeout(0);
        socket.off('error', fail);
        socket.setNoDelay(true);
        // Errors after connect close the socket; the next write reports them.
        socket.on('error', () => socket.destroy());
        socket.once('close', () => {
          if (this.socket === socket) {
            this.socket = undefined;
          }
        });

        this.socket = socket;
        resolve();
      });
    });
  }

  protected close(): Promise<void> {
    const socket = this.socket;
    this.socket = undefined;

    if (socket === undefined || socket.destroyed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  protected write(command: RawCommand): Promise<void> {
    const socket = this.socket;

    if (socket === undefined || socket.destroyed) {
      return Promise.reject(new ConnectionError(`Connection to ${this} is closed`, this.parameters));
    }

    return new Promise((resolve, reject) => {
      socket.write(command.serialize(), (error) => {
        if (error) {
          reject(new ConnectionError(`Error while writing ${command.id} to ${this}`, this.parameters, error));
        } else {
          resolve();
        }
      });
    });
  }

  override isConnected(): boolean {
    return super.isConnected() && this.socket !== undefined && !this.socket.destroyed;
  }
}

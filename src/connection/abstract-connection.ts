import type { RawCommand } from '../command/index.js';
import type { ConnectionParameters } from '../parameters/index.js';
import type { Connection } from './types.js';

/**
 * Base class for single connections.
 *
 * Owns the parameters and the connect-command queue. Subclasses only open and
 * close their transport and write a command on it; `connect()` writes every
 * queued command, in order, as soon as the transport is up.
 */
export abstract class AbstractConnection implements Connection {
  private readonly initCommands: RawCommand[] = [];
  private connected = false;
  private connecting?: Promise<void>;

  constructor(protected readonly parameters: ConnectionParameters) {}

  /**
   * Opens the underlying transport.
   */
  protected abstract open(): Promise<void>;

  /**
   * Closes the underlying transport.
   */
  protected abstract close(): Promise<void>;

  /**
   * Sends a single command over an open transport.
   */
  protected abstract write(command: RawCommand): Promise<void>;

  async connect(): Promise<void> {
    // A transport can drop on its own, so ask the subclass rather than the flag.
    if (this.isConnected()) {
      return;
    }

    // Overlapping calls share one attempt instead of each opening a transport.
    this.connecting ??= this.establish().finally(() => {
      this.connecting = undefined;
    });

    await this.connecting;
  }

  private async establish(): Promise<void> {
    await this.open();
    this.connected = true;

    try {
      for (const command of this.initCommands) {
        await this.write(command);
      }
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    this.connected = false;
    await this.close();
  }

  isConnected(): boolean {
    return this.connected;
  }

  getParameters(): ConnectionParameters {
    return this.parameters;
  }

  addConnectCommand(command: RawCommand): void {
    this.initCommands.push(command);
  }

  /**
   * Commands sent on every (re)connect, in the order they were added.
   */
  get connectCommands(): readonly RawCommand[] {
    return [...this.initCommands];
  }

  toString(): string {
    const { path, host, port } = this.parameters;

    return path ?? `${host}:${port}`;
  }
}

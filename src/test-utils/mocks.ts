import { type Mock, vi } from 'vitest';
import type { RawCommand } from '../command/index.js';
import { AbstractConnection, type AggregateConnection, type Connection } from '../connection/index.js';
import type { ConnectionParameters } from '../parameters/index.js';
import { createParameters } from './factories.js';

export interface MockConnection extends Connection {
  /** Commands passed to `addConnectCommand`, in order. */
  readonly commands: RawCommand[];
}

/**
 * Creates a mock Connection whose methods are spies.
 *
 * @example
 * ```typescript
 * const connection = createMockConnection(createParameters({ host: 'node-1' }));
 * factory.aggregate(group, [connection]);
 * ```
 */
export function createMockConnection(parameters: ConnectionParameters = createParameters()): MockConnection {
  const commands: RawCommand[] = [];
  let connected = false;

  return {
    commands,
    connect: vi.fn(async () => {
      connected = true;
    }),
    disconnect: vi.fn(async () => {
      connected = false;
    }),
    isConnected: vi.fn(() => connected),
    getParameters: vi.fn(() => parameters),
    addConnectCommand: vi.fn((command: RawCommand) => {
      commands.push(command);
    }),
  };
}

export interface MockAggregateConnection extends AggregateConnection {
  add: Mock<(connection: Connection) => void>;
  /** Connections passed to `add`, in order. */
  readonly added: Connection[];
}

export function createMockAggregate(): MockAggregateConnection {
  const added: Connection[] = [];

  return {
    added,
    add: vi.fn((connection: Connection) => {
      added.push(connection);
    }),
  };
}

/**
 * In-memory connection recording what it would send over its transport.
 * Commands whose id matches `rejectCommand` fail to write.
 */
export class RecordingConnection extends AbstractConnection {
  readonly written: string[] = [];
  opened = 0;
  closed = 0;
  rejectCommand?: string;

  protected async open(): Promise<void> {
    this.opened += 1;
  }

  protected async close(): Promise<void> {
    this.closed += 1;
  }

  protected async write(command: RawCommand): Promise<void> {
    if (command.id === this.rejectCommand) {
      throw new Error(`${command.id} rejected`);
    }

    this.written.push(command.toString());
  }
}

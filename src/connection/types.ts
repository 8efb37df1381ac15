import type { RawCommand } from '../command/index.js';
import type { ConnectionParameters } from '../parameters/index.js';

/**
 * A single endpoint's session. Connections open their transport lazily:
 * nothing touches the network until `connect()` is called.
 */
export interface Connection {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  getParameters(): ConnectionParameters;
  /**
   * Queues a command sent right after the transport connects, before any
   * user-issued command.
   */
  addConnectCommand(command: RawCommand): void;
}

/**
 * A composite owning several single connections, e.g. a multi-node grouping.
 */
export interface AggregateConnection {
  add(connection: Connection): void;
}

/**
 * Constructor of a connection class. Registering one with the factory gets the
 * implicit AUTH / SELECT wiring applied to every instance it builds.
 */
export type ConnectionClass = new (parameters: ConnectionParameters) => Connection;

const CONNECTION_METHODS = [
  'connect',
  'disconnect',
  'isConnected',
  'getParameters',
  'addConnectCommand',
] as const;

function hasMethods(value: object, methods: readonly string[]): boolean {
  return methods.every((method) => typeof Reflect.get(value, method) === 'function');
}

export function isConnection(value: unknown): value is Connection {
  return typeof value === 'object' && value !== null && hasMethods(value, CONNECTION_METHODS);
}

export function isAggregateConnection(value: unknown): value is AggregateConnection {
  return typeof value === 'object' && value !== null && hasMethods(value, ['add']);
}

/**
 * Checks that a constructor's prototype carries every Connection method, so its
 * instances satisfy the interface without having to build one.
 */
export function isConnectionClass(value: unknown): value is ConnectionClass {
  if (typeof value !== 'function') {
    return false;
  }

  const prototype: unknown = value.prototype;

  return typeof prototype === 'object' && prototype !== null && hasMethods(prototype, CONNECTION_METHODS);
}

import { isConnectionParameters } from '../parameters/index.js';
import type { AggregateConnection, Connection } from './types.js';

/**
 * Identifier of a connection inside a group: its `alias` option when set,
 * otherwise the socket path or `host:port`. Connections whose parameters are
 * not normalized parameters fall back to their string form.
 */
export function connectionId(connection: Connection): string {
  const parameters = connection.getParameters();

  if (!isConnectionParameters(parameters)) {
    return String(connection);
  }

  const alias = parameters.get('alias');

  if (typeof alias === 'string') {
    return alias;
  }

  return parameters.path ?? `${parameters.host}:${parameters.port}`;
}

/**
 * Plain multi-node grouping. Keeps connections in insertion order and owns them:
 * connecting or disconnecting the group does so for every member.
 */
export class ConnectionGroup implements AggregateConnection, Iterable<Connection> {
  private readonly connections: Connection[] = [];

  add(connection: Connection): void {
    this.connections.push(connection);
  }

  remove(connection: Connection): boolean {
    const index = this.connections.indexOf(connection);

    if (index === -1) {
      return false;
    }

    this.connections.splice(index, 1);
    return true;
  }

  getConnectionById(id: string): Connection | undefined {
    return this.connections.find((connection) => connectionId(connection) === id);
  }

  get count(): number {
    return this.connections.length;
  }

  async connect(): Promise<void> {
    await Promise.all(this.connections.map((connection) => connection.connect()));
  }

  async disconnect(): Promise<void> {
    await Promise.all(this.connections.map((connection) => connection.disconnect()));
  }

  isConnected(): boolean {
    return this.connections.some((connection) => connection.isConnected());
  }

  toArray(): Connection[] {
    return [...this.connections];
  }

  [Symbol.iterator](): Iterator<Connection> {
    return this.toArray()[Symbol.iterator]();
  }
}

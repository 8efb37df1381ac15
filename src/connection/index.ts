/**
 * Connection interfaces and built-in connection classes.
 */

export { AbstractConnection } from './abstract-connection.js';
export { ConnectionGroup, connectionId } from './connection-group.js';
export { StreamConnection } from './stream-connection.js';
export {
  type AggregateConnection,
  type Connection,
  type ConnectionClass,
  isAggregateConnection,
  isConnection,
  isConnectionClass,
} from './types.js';
export { WebdisConnection } from './webdis-connection.js';

/**
 * kv-connection-factory
 *
 * Connection factory for a key-value store client: turns connection
 * parameters into connection objects and composes them into multi-node
 * aggregates.
 *
 * Features:
 * - Scheme registry with connection classes and lazy initializer functions
 * - Implicit AUTH / SELECT setup queued on connections built from classes
 * - Built-in `tcp`, `unix` (stream socket) and `http` (HTTP-bridged) schemes
 * - Typed errors for unknown schemes, invalid initializers and broken contracts
 *
 * @example
 * Basic usage:
 * ```typescript
 * import { createConnectionFactory, ConnectionGroup } from 'kv-connection-factory';
 *
 * const factory = createConnectionFactory();
 *
 * const connection = factory.create('tcp://:test-secret@127.0.0.1:6379?database=2');
 * await connection.connect(); // sends AUTH, then SELECT
 *
 * const group = new ConnectionGroup();
 * factory.aggregate(group, ['tcp://10.0.0.1:6379', 'tcp://10.0.0.2:6379']);
 * ```
 *
 * @packageDocumentation
 */

// ===== COMMANDS =====
export { authCommand, RawCommand, selectCommand } from './command/index.js';
// ===== CONNECTIONS =====
export {
  AbstractConnection,
  type AggregateConnection,
  type Connection,
  type ConnectionClass,
  ConnectionGroup,
  connectionId,
  isAggregateConnection,
  isConnection,
  isConnectionClass,
  StreamConnection,
  WebdisConnection,
} from './connection/index.js';
// ===== ERRORS =====
export {
  ConnectionError,
  ConnectionFactoryError,
  ContractViolationError,
  InvalidInitializerError,
  ParametersError,
  UnknownSchemeError,
} from './errors/index.js';
// ===== FACTORY =====
export {
  checkInitializer,
  classInitializer,
  ConnectionFactory,
  type ConnectionFactoryConfig,
  type ConnectionFactoryInterface,
  createConnectionFactory,
  DEFAULT_SCHEMES,
  type Initializer,
  type LazyInitializer,
  lazyInitializer,
  type ParametersLike,
  prepareConnection,
} from './factory/index.js';
// ===== LOGGING =====
export { createLogger, type FactoryLogEvent, type FactoryLogger, type LogLevel } from './logging/index.js';
// ===== PARAMETERS =====
export {
  ConnectionParameters,
  isConnectionParameters,
  normalizeParameters,
  type ParametersInput,
  parseUri,
} from './parameters/index.js';

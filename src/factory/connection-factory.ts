import {
  type AggregateConnection,
  type Connection,
  isConnection,
  StreamConnection,
  WebdisConnection,
} from '../connection/index.js';
import { ContractViolationError, UnknownSchemeError } from '../errors/index.js';
import { createLogger, type FactoryLogger, type LogLevel } from '../logging/index.js';
import { ConnectionParameters, isConnectionParameters } from '../parameters/index.js';
import { checkInitializer, classInitializer, type Initializer } from './initializer.js';
import { prepareConnection } from './prepare-connection.js';
import type { ConnectionFactoryInterface, ParametersLike } from './types.js';

/**
 * Configuration options for a connection factory.
 */
export interface ConnectionFactoryConfig {
  /**
   * Additional schemes, or replacements for the built-in ones. Each entry goes
   * through `define()` and is validated the same way.
   */
  schemes?: Record<string, Initializer>;

  /**
   * Which log levels to enable.
   *
   * - 'define': Log scheme definitions and removals
   * - 'create': Log every connection built
   * - 'error': Log failed definitions and failed creations
   *
   * @default ['error']
   */
  logLevels?: LogLevel[];

  /**
   * Custom logger function to replace the default console-based logger.
   *
   * @example
   * ```typescript
   * import pino from 'pino';
   * const logger = pino();
   *
   * const factory = createConnectionFactory({
   *   customLogger: (event) => {
   *     if (event.level === 'error') {
   *       logger.error({ err: event.error, scheme: event.scheme }, 'Connection factory error');
   *     }
   *   },
   * });
   * ```
   */
  customLogger?: FactoryLogger;
}

/**
 * Schemes every factory starts with.
 */
export const DEFAULT_SCHEMES: Readonly<Record<string, Initializer>> = {
  tcp: classInitializer(StreamConnection),
  unix: classInitializer(StreamConnection),
  http: classInitializer(WebdisConnection),
};

/**
 * Standard factory for connections to key-value nodes.
 *
 * Each instance owns its own scheme map, so factories with different scheme
 * sets can coexist. Defining schemes is expected to happen during setup;
 * nothing here guards the map against concurrent changes.
 */
export class ConnectionFactory implements ConnectionFactoryInterface {
  private readonly schemes = new Map<string, Initializer>();
  private readonly log: FactoryLogger;

  constructor(config: ConnectionFactoryConfig = {}) {
    this.log = config.customLogger ?? createLogger(config.logLevels ?? ['error']);

    for (const [scheme, initializer] of Object.entries(DEFAULT_SCHEMES)) {
      this.schemes.set(scheme, initializer);
    }

    for (const [scheme, initializer] of Object.entries(config.schemes ?? {})) {
      this.define(scheme, initializer);
    }
  }

  /**
   * Registers the initializer for a scheme, replacing any previous one.
   *
   * @throws {InvalidInitializerError} When the initializer is rejected
   */
  define(scheme: string, initializer: Initializer): void {
    let checked: Initializer;
    try {
      checked = checkInitializer(scheme, initializer);
    } catch (error) {
      this.log({ level: 'error', scheme, error });
      throw error;
    }

    this.schemes.set(scheme, checked);
    this.log({ level: 'define', action: 'define', scheme, kind: checked.kind });
  }

  /**
   * Removes the initializer for a scheme. Does nothing when none is registered.
   */
  undefine(scheme: string): void {
    if (this.schemes.delete(scheme)) {
      this.log({ level: 'define', action: 'undefine', scheme });
    }
  }

  isDefined(scheme: string): boolean {
    return this.schemes.has(scheme);
  }

  getSchemes(): string[] {
    return [...this.schemes.keys()];
  }

  /**
   * Builds a connection for the given parameters without connecting it.
   *
   * Connections from class initializers get AUTH / SELECT queued as connect
   * commands when the parameters carry a password / database index.
   * Connections from lazy initializers are left untouched.
   *
   * @throws {ParametersError} When the parameters cannot be normalized
   * @throws {UnknownSchemeError} When no initializer is registered for the scheme
   * @throws {ContractViolationError} When the initializer returns something
   * that does not implement the Connection interface
   *
   * @example
   * ```typescript
   * const connection = factory.create('tcp://10.0.0.5:6379?password=test-secret&database=2');
   * // connect commands: AUTH test-secret, SELECT 2
   * ```
   */
  create(parameters: ParametersLike): Connection {
    const normalized = isConnectionParameters(parameters)
      ? parameters
      : ConnectionParameters.create(parameters);
    const { scheme } = normalized;

    try {
      const initializer = this.schemes.get(scheme);

      if (initializer === undefined) {
        throw new UnknownSchemeError(scheme);
      }

      const connection: unknown =
        initializer.kind === 'lazy'
          ? initializer.initialize(normalized, this)
          : new initializer.connection(normalized);

      if (!isConnection(connection)) {
        throw new ContractViolationError(scheme);
      }

      if (initializer.kind === 'class') {
        this.prepareConnection(connection);
      }

      this.log({ level: 'create', scheme, kind: initializer.kind, connection });

      return connection;
    } catch (error) {
      this.log({ level: 'error', scheme, error });
      throw error;
    }
  }

  /**
   * Adds each entry to the aggregate in order, building connections for the
   * entries that are not connections yet.
   *
   * Not atomic: when an entry fails to build, the connections added before it
   * stay in the aggregate.
   */
  aggregate(connection: AggregateConnection, entries: ReadonlyArray<Connection | ParametersLike>): void {
    for (const entry of entries) {
      connection.add(isConnection(entry) ? entry : this.create(entry));
    }
  }

  /**
   * Prepares a connection built from a class initializer.
   */
  protected prepareConnection(connection: Connection): void {
    prepareConnection(connection);
  }
}

/**
 * Creates a connection factory with the built-in schemes (`tcp`, `unix`, `http`)
 * plus any schemes from the configuration.
 *
 * @example
 * ```typescript
 * const factory = createConnectionFactory({
 *   schemes: {
 *     // Same as tcp, on the replica port unless one is given
 *     replica: lazyInitializer((parameters, factory) =>
 *       factory.create({ ...parameters.toJSON(), scheme: 'tcp', port: parameters.port === 6379 ? 6380 : parameters.port }),
 *     ),
 *   },
 *   logLevels: ['create', 'error'],
 * });
 * ```
 */
export function createConnectionFactory(config: ConnectionFactoryConfig = {}): ConnectionFactory {
  return new ConnectionFactory(config);
}

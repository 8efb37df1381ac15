import type { AggregateConnection, Connection } from '../connection/index.js';
import type { ConnectionParameters, ParametersInput } from '../parameters/index.js';
import type { Initializer } from './initializer.js';

/**
 * Anything `create()` accepts: normalized parameters, a plain parameter
 * object or a connection URI.
 */
export type ParametersLike = string | ParametersInput | ConnectionParameters;

/**
 * Builds connections from parameters and composes them into aggregates.
 * Lazy initializers receive the factory through this interface.
 */
export interface ConnectionFactoryInterface {
  define(scheme: string, initializer: Initializer): void;
  undefine(scheme: string): void;
  create(parameters: ParametersLike): Connection;
  aggregate(connection: AggregateConnection, entries: ReadonlyArray<Connection | ParametersLike>): void;
}

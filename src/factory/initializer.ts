import { type Connection, type ConnectionClass, isConnectionClass } from '../connection/index.js';
import { InvalidInitializerError } from '../errors/index.js';
import type { ConnectionParameters } from '../parameters/index.js';
import type { ConnectionFactoryInterface } from './types.js';

/**
 * Function building a connection on demand. It receives the factory so it can
 * build sub-connections, e.g. to assemble a composite from several nodes.
 *
 * Connections from lazy initializers are returned as they are: the factory
 * does not queue AUTH / SELECT on them, the initializer wires whatever setup
 * it needs.
 */
export type LazyInitializer = (
  parameters: ConnectionParameters,
  factory: ConnectionFactoryInterface,
) => Connection;

export type Initializer =
  | { readonly kind: 'class'; readonly connection: ConnectionClass }
  | { readonly kind: 'lazy'; readonly initialize: LazyInitializer };

export function classInitializer(connection: ConnectionClass): Initializer {
  return { kind: 'class', connection };
}

export function lazyInitializer(initialize: LazyInitializer): Initializer {
  return { kind: 'lazy', initialize };
}

/**
 * Validates an initializer before it is stored.
 *
 * @throws {InvalidInitializerError} When a lazy initializer is not a function,
 * or a class initializer is not a constructor whose prototype implements
 * the Connection interface
 */
export function checkInitializer(scheme: string, initializer: Initializer): Initializer {
  if (typeof initializer !== 'object' || initializer === null) {
    throw new InvalidInitializerError(scheme);
  }

  switch (initializer.kind) {
    case 'lazy':
      if (typeof initializer.initialize === 'function') {
        return initializer;
      }
      break;
    case 'class':
      if (isConnectionClass(initializer.connection)) {
        return initializer;
      }
      break;
  }

  throw new InvalidInitializerError(scheme);
}

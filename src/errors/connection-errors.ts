import type { ConnectionParameters } from '../parameters/index.js';
import { ConnectionFactoryError } from './factory-error.js';

/**
 * Thrown by a connection when its transport fails to open or rejects a request.
 * The factory itself never raises this: connections only touch the network
 * from their own `connect()`.
 */
export class ConnectionError extends ConnectionFactoryError {
  public override readonly name = 'ConnectionError';

  constructor(
    message: string,
    public readonly parameters: ConnectionParameters,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

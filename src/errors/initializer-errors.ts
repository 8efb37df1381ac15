import { ConnectionFactoryError } from './factory-error.js';

/**
 * Thrown by `define()` when the supplied initializer is neither a lazy
 * initializer function nor a class producing connections.
 */
export class InvalidInitializerError extends ConnectionFactoryError {
  public override readonly name = 'InvalidInitializerError';

  constructor(public readonly scheme: string) {
    super(
      `Invalid initializer for scheme "${scheme}": ` +
        'a connection initializer must be a valid connection class or a lazy initializer function',
    );
  }
}

/**
 * Thrown by `create()` when an initializer returns something that does not
 * implement the Connection interface.
 */
export class ContractViolationError extends ConnectionFactoryError {
  public override readonly name = 'ContractViolationError';

  constructor(public readonly scheme: string) {
    super(
      `Initializer for scheme "${scheme}" returned an object that does not implement the Connection interface`,
    );
  }
}

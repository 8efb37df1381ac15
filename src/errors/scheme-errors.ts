import { ConnectionFactoryError } from './factory-error.js';

/**
 * Thrown when no initializer is registered for a scheme.
 */
export class UnknownSchemeError extends ConnectionFactoryError {
  public override readonly name = 'UnknownSchemeError';

  constructor(public readonly scheme: string) {
    super(`Unknown connection scheme: ${scheme}`);
  }
}

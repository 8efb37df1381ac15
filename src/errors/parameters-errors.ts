import { ConnectionFactoryError } from './factory-error.js';

/**
 * Thrown when connection parameters cannot be parsed or validated.
 */
export class ParametersError extends ConnectionFactoryError {
  public override readonly name = 'ParametersError';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

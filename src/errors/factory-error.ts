/**
 * Base class for all errors raised by the connection factory and its connections.
 * Keeps a proper Error prototype chain so `instanceof` works across subclasses.
 */
export class ConnectionFactoryError extends Error {
  public override readonly name: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = 'ConnectionFactoryError';

    if (options?.cause !== undefined) {
      Object.defineProperty(this, 'cause', {
        value: options.cause,
        enumerable: false,
        writable: true,
        configurable: true,
      });
    }

    Error.captureStackTrace(this, new.target);
  }
}

import { describe, expect, it } from 'vitest';
import { ConnectionFactoryError } from './factory-error.js';
import { ContractViolationError, InvalidInitializerError } from './initializer-errors.js';

describe('InvalidInitializerError', () => {
  it('should create error with the scheme and a descriptive message', () => {
    const error = new InvalidInitializerError('custom');

    expect(error.scheme).toBe('custom');
    expect(error.name).toBe('InvalidInitializerError');
    expect(error.message).toBe(
      'Invalid initializer for scheme "custom": ' +
        'a connection initializer must be a valid connection class or a lazy initializer function',
    );
  });

  it('should be instance of ConnectionFactoryError', () => {
    const error = new InvalidInitializerError('custom');

    expect(error).toBeInstanceOf(InvalidInitializerError);
    expect(error).toBeInstanceOf(ConnectionFactoryError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('ContractViolationError', () => {
  it('should create error with the scheme and a descriptive message', () => {
    const error = new ContractViolationError('broken');

    expect(error.scheme).toBe('broken');
    expect(error.name).toBe('ContractViolationError');
    expect(error.message).toBe(
      'Initializer for scheme "broken" returned an object that does not implement the Connection interface',
    );
  });

  it('should be instance of ConnectionFactoryError', () => {
    expect(new ContractViolationError('broken')).toBeInstanceOf(ConnectionFactoryError);
  });
});

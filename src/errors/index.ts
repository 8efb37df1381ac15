/**
 * Error classes for typed error handling.
 *
 * @example
 * ```typescript
 * import { UnknownSchemeError } from 'kv-connection-factory';
 *
 * try {
 *   factory.create('redis-sentinel://10.0.0.1:26379');
 * } catch (error) {
 *   if (error instanceof UnknownSchemeError) {
 *     factory.define(error.scheme, lazyInitializer(createSentinelConnection));
 *   }
 * }
 * ```
 */

export { ConnectionError } from './connection-errors.js';
export { ConnectionFactoryError } from './factory-error.js';
export { ContractViolationError, InvalidInitializerError } from './initializer-errors.js';
export { ParametersError } from './parameters-errors.js';
export { UnknownSchemeError } from './scheme-errors.js';

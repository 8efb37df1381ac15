import { ConnectionParameters, type ParametersInput } from '../parameters/index.js';

/**
 * Creates normalized parameters, tcp on 127.0.0.1:6379 unless overridden.
 */
export function createParameters(overrides: ParametersInput = {}): ConnectionParameters {
  return ConnectionParameters.create(overrides);
}

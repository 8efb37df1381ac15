/**
 * Connection parameter parsing and normalization.
 */

export {
  ConnectionParameters,
  isConnectionParameters,
  normalizeParameters,
} from './connection-parameters.js';
export { parseUri } from './parse-uri.js';
export {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SCHEME,
  DEFAULT_TIMEOUT,
  type ParametersInput,
  ParametersSchema,
} from './schema.js';

/**
 * Connection factory and scheme initializers.
 */

export {
  ConnectionFactory,
  type ConnectionFactoryConfig,
  createConnectionFactory,
  DEFAULT_SCHEMES,
} from './connection-factory.js';
export {
  checkInitializer,
  classInitializer,
  type Initializer,
  type LazyInitializer,
  lazyInitializer,
} from './initializer.js';
export { prepareConnection } from './prepare-connection.js';
export type { ConnectionFactoryInterface, ParametersLike } from './types.js';

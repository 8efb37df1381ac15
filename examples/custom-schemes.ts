/**
 * Custom Schemes Example
 *
 * Registers two extra schemes:
 * - `traced`: a connection class, so the factory still queues AUTH / SELECT
 * - `replica`: a lazy initializer building its connection through the factory
 *
 * Lazy initializers are never prepared by the factory. `replica` gets its
 * setup only because it delegates to `factory.create()` with the tcp scheme.
 */

import {
  classInitializer,
  ConnectionParameters,
  createConnectionFactory,
  lazyInitializer,
  type RawCommand,
  StreamConnection,
} from '../src/index.js';

class TracedConnection extends StreamConnection {
  constructor(parameters: ConnectionParameters) {
    super(ConnectionParameters.create({ ...parameters.toJSON(), scheme: 'tcp' }));
  }

  override addConnectCommand(command: RawCommand): void {
    console.log(`[traced] queued ${command.id}`);
    super.addConnectCommand(command);
  }
}

const factory = createConnectionFactory({
  schemes: {
    traced: classInitializer(TracedConnection),
    replica: lazyInitializer((parameters, factory) =>
      factory.create({ ...parameters.toJSON(), scheme: 'tcp', port: parameters.port + 1 }),
    ),
  },
  logLevels: ['define', 'create', 'error'],
});

async function main() {
  const traced = factory.create('traced://127.0.0.1:6379?password=test-secret');
  const replica = factory.create('replica://127.0.0.1:6379?database=1');

  console.log(`traced  -> ${traced.getParameters().host}:${traced.getParameters().port}`);
  console.log(`replica -> ${replica.getParameters().host}:${replica.getParameters().port}`);

  factory.undefine('replica');
  console.log(`Schemes: ${factory.getSchemes().join(', ')}`);
}

// Run the example
main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});

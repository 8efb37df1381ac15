/**
 * Error Handling Example
 *
 * Every failure raised here extends ConnectionFactoryError, so callers can
 * branch on the specific class.
 */

import {
  ConnectionError,
  ConnectionFactoryError,
  createConnectionFactory,
  InvalidInitializerError,
  ParametersError,
  UnknownSchemeError,
} from '../src/index.js';

const factory = createConnectionFactory();

function explain(error: unknown): string {
  if (error instanceof UnknownSchemeError) {
    return `no initializer for "${error.scheme}"`;
  }
  if (error instanceof InvalidInitializerError) {
    return `rejected initializer for "${error.scheme}"`;
  }
  if (error instanceof ParametersError) {
    return `bad parameters: ${error.message}`;
  }
  if (error instanceof ConnectionError) {
    return `transport failure on ${error.parameters.host}:${error.parameters.port}`;
  }
  if (error instanceof ConnectionFactoryError) {
    return error.message;
  }
  return String(error);
}

async function main() {
  try {
    factory.create('tls://127.0.0.1:6380');
  } catch (error) {
    console.log(explain(error));
  }

  try {
    factory.create({ database: -1 });
  } catch (error) {
    console.log(explain(error));
  }

  try {
    // Nothing listens on this port
    await factory.create('tcp://127.0.0.1:1').connect();
  } catch (error) {
    console.log(explain(error));
  }
}

// Run the example
main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});

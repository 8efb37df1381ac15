/**
 * Basic Connection Example
 *
 * Builds a single connection from a URI. The password and database index in
 * the URI are turned into AUTH and SELECT commands, sent right after the
 * socket connects.
 */

import { createConnectionFactory, StreamConnection } from '../src/index.js';

const factory = createConnectionFactory({
  logLevels: ['create', 'error'],
});

async function main() {
  const connection = factory.create('tcp://:test-secret@127.0.0.1:6379?database=2');

  if (connection instanceof StreamConnection) {
    console.log('Queued connect commands:');
    connection.connectCommands.forEach((command) => {
      console.log(`  - ${command}`);
    });
  }

  await connection.connect();
  console.log(`Connected: ${connection.isConnected()}`);

  // Clean up
  await connection.disconnect();
  console.log('\nConnection closed.');
}

// Run the example
main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});

/**
 * Aggregate Example
 *
 * Fills a connection group from a mix of ready connections and parameters.
 * Entries are added in order; a failing entry stops the loop and leaves the
 * earlier ones in the group.
 */

import { ConnectionGroup, createConnectionFactory, UnknownSchemeError } from '../src/index.js';

const factory = createConnectionFactory();

async function main() {
  const group = new ConnectionGroup();
  const primary = factory.create({ host: '10.0.0.1', alias: 'primary' });

  factory.aggregate(group, [
    primary,
    'tcp://10.0.0.2:6379',
    { scheme: 'unix', path: '/var/run/kv.sock' },
  ]);

  console.log(`Group holds ${group.count} connections:`);
  for (const connection of group) {
    const { host, port, path } = connection.getParameters();
    console.log(`  - ${path ?? `${host}:${port}`}`);
  }

  try {
    factory.aggregate(group, ['tcp://10.0.0.3:6379', 'tls://10.0.0.4:6379']);
  } catch (error) {
    if (error instanceof UnknownSchemeError) {
      console.log(`\n${error.message}; group now holds ${group.count} connections`);
    } else {
      throw error;
    }
  }

  console.log(`Lookup by alias: ${group.getConnectionById('primary') === primary}`);
}

// Run the example
main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});

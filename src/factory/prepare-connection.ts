import { authCommand, selectCommand } from '../command/index.js';
import type { Connection } from '../connection/index.js';

/**
 * Queues the implicit session setup described by the connection's parameters:
 * AUTH when a password is set, then SELECT when a database index is set.
 * AUTH always comes first since the server refuses other session commands
 * until the client has authenticated.
 */
export function prepareConnection(connection: Connection): void {
  const { password, database } = connection.getParameters();

  if (password !== undefined) {
    connection.addConnectCommand(authCommand(password));
  }

  if (database !== undefined) {
    connection.addConnectCommand(selectCommand(database));
  }
}

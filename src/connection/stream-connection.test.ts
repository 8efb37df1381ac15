import { createServer, type Server, type Socket } from 'node:net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { authCommand, selectCommand } from '../command/index.js';
import { ConnectionError, ParametersError } from '../errors/index.js';
import { createParameters } from '../test-utils/index.js';
import { StreamConnection } from './stream-connection.js';

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('expected a TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('StreamConnection', () => {
  describe('construction', () => {
    it('should accept tcp and unix schemes', () => {
      expect(() => new StreamConnection(createParameters({ scheme: 'tcp' }))).not.toThrow();
      expect(() => new StreamConnection(createParameters({ scheme: 'unix', path: '/tmp/kv.sock' }))).not.toThrow();
    });

    it('should reject other schemes', () => {
      expect(() => new StreamConnection(createParameters({ scheme: 'http' }))).toThrow(
        new ParametersError('Invalid scheme for a stream connection: http'),
      );
    });

    it('should require a socket path for unix connections', () => {
      expect(() => new StreamConnection(createParameters({ scheme: 'unix' }))).toThrow(
        'A unix connection requires a socket path',
      );
    });
  });

  describe('against a local server', () => {
    let server: Server;
    let port: number;
    let received: string;
    let closedSockets: number;
    const sockets: Socket[] = [];

    beforeEach(async () => {
      received = '';
      closedSockets = 0;
      server = createServer((socket) => {
        sockets.push(socket);
        socket.on('close', () => {
          closedSockets += 1;
        });
        socket.on('data', (chunk) => {
          received += chunk.toString('utf8');
        });
      });
      port = await listen(server);
    });

    afterEach(async () => {
      for (const socket of sockets.splice(0)) {
        socket.destroy();
      }
      await close(server);
    });

    it('should connect and send queued connect commands in order', async () => {
      const connection = new StreamConnection(createParameters({ port }));
      connection.addConnectCommand(authCommand('test-secret'));
      connection.addConnectCommand(selectCommand(3));

      await connection.connect();

      expect(connection.isConnected()).toBe(true);
      await vi.waitFor(() => {
        expect(received).toBe(
          '*2\r\n$4\r\nAUTH\r\n$11\r\ntest-secret\r\n' + '*2\r\n$6\r\nSELECT\r\n$1\r\n3\r\n',
        );
      });

      await connection.disconnect();
      expect(connection.isConnected()).toBe(false);
    });

    it('should reopen and replay connect commands after the server drops the socket', async () => {
      const select = '*2\r\n$6\r\nSELECT\r\n$1\r\n2\r\n';
      const connection = new StreamConnection(createParameters({ port }));
      connection.addConnectCommand(selectCommand(2));

      await connection.connect();
      await vi.waitFor(() => {
        expect(received).toBe(select);
      });

      sockets[0]?.destroy();
      await vi.waitFor(() => {
        expect(connection.isConnected()).toBe(false);
      });

      await connection.connect();

      expect(connection.isConnected()).toBe(true);
      await vi.waitFor(() => {
        expect(received).toBe(select + select);
      });
      expect(sockets).toHaveLength(2);

      await connection.disconnect();
    });

    it('should open a single socket for overlapping connect calls', async () => {
      const connection = new StreamConnection(createParameters({ port }));

      await Promise.all([connection.connect(), connection.connect()]);
      await connection.disconnect();

      await vi.waitFor(() => {
        expect(closedSockets).toBe(1);
      });
      expect(sockets).toHaveLength(1);
    });

    it('should send nothing when the queue is empty', async () => {
      const connection = new StreamConnection(createParameters({ port }));

      await connection.connect();
      await vi.waitFor(() => {
        expect(sockets).toHaveLength(1);
      });
      await connection.disconnect();

      expect(received).toBe('');
    });
  });

  it('should wrap connection failures in ConnectionError', async () => {
    const server = createServer();
    const port = await listen(server);
    await close(server);

    const parameters = createParameters({ port });
    const connection = new StreamConnection(parameters);
    const failure = connection.connect();

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toMatchObject({ parameters });
    expect(connection.isConnected()).toBe(false);
  });
});

import { describe, expect, it } from 'vitest';
import { authCommand, selectCommand } from '../command/index.js';
import { createParameters, RecordingConnection } from '../test-utils/index.js';

describe('AbstractConnection', () => {
  it('should return the parameters it was built with', () => {
    const parameters = createParameters({ host: 'node-1' });
    const connection = new RecordingConnection(parameters);

    expect(connection.getParameters()).toBe(parameters);
  });

  it('should not open the transport on construction', () => {
    const connection = new RecordingConnection(createParameters());

    expect(connection.opened).toBe(0);
    expect(connection.isConnected()).toBe(false);
  });

  it('should keep connect commands in insertion order', () => {
    const connection = new RecordingConnection(createParameters());

    connection.addConnectCommand(authCommand('test-secret'));
    connection.addConnectCommand(selectCommand(3));

    expect(connection.connectCommands.map((command) => command.tokens)).toEqual([
      ['AUTH', 'test-secret'],
      ['SELECT', '3'],
    ]);
  });

  it('should write connect commands in order once connected', async () => {
    const connection = new RecordingConnection(createParameters());
    connection.addConnectCommand(authCommand('test-secret'));
    connection.addConnectCommand(selectCommand(3));

    await connection.connect();

    expect(connection.isConnected()).toBe(true);
    expect(connection.opened).toBe(1);
    expect(connection.written).toEqual(['AUTH test-secret', 'SELECT 3']);
  });

  it('should do nothing when connecting twice', async () => {
    const connection = new RecordingConnection(createParameters());
    connection.addConnectCommand(selectCommand(1));

    await connection.connect();
    await connection.connect();

    expect(connection.opened).toBe(1);
    expect(connection.written).toEqual(['SELECT 1']);
  });

  it('should open the transport once for overlapping connect calls', async () => {
    const connection = new RecordingConnection(createParameters());
    connection.addConnectCommand(selectCommand(2));

    await Promise.all([connection.connect(), connection.connect()]);

    expect(connection.opened).toBe(1);
    expect(connection.written).toEqual(['SELECT 2']);
    expect(connection.isConnected()).toBe(true);
  });

  it('should allow a new attempt after a failed connect', async () => {
    const connection = new RecordingConnection(createParameters());
    connection.rejectCommand = 'AUTH';
    connection.addConnectCommand(authCommand('test-secret'));

    await expect(connection.connect()).rejects.toThrow('AUTH rejected');

    connection.rejectCommand = undefined;
    await connection.connect();

    expect(connection.opened).toBe(2);
    expect(connection.written).toEqual(['AUTH test-secret']);
  });

  it('should replay connect commands after a reconnect', async () => {
    const connection = new RecordingConnection(createParameters());
    connection.addConnectCommand(selectCommand(1));

    await connection.connect();
    await connection.disconnect();
    await connection.connect();

    expect(connection.closed).toBe(1);
    expect(connection.written).toEqual(['SELECT 1', 'SELECT 1']);
  });

  it('should disconnect and rethrow when a connect command fails', async () => {
    const connection = new RecordingConnection(createParameters());
    connection.rejectCommand = 'AUTH';
    connection.addConnectCommand(authCommand('test-secret'));

    await expect(connection.connect()).rejects.toThrow('AUTH rejected');

    expect(connection.isConnected()).toBe(false);
    expect(connection.closed).toBe(1);
  });

  it('should not close a transport that was never opened', async () => {
    const connection = new RecordingConnection(createParameters());

    await connection.disconnect();

    expect(connection.closed).toBe(0);
  });

  it('should describe itself by host and port, or by socket path', () => {
    expect(String(new RecordingConnection(createParameters({ host: 'node-1', port: 7000 })))).toBe('node-1:7000');
    expect(String(new RecordingConnection(createParameters({ scheme: 'unix', path: '/tmp/kv.sock' })))).toBe(
      '/tmp/kv.sock',
    );
  });
});

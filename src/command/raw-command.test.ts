import { describe, expect, it } from 'vitest';
import { authCommand, RawCommand, selectCommand } from './raw-command.js';

describe('RawCommand', () => {
  it('should expose tokens, id and arguments', () => {
    const command = new RawCommand(['get', 'user:1']);

    expect(command.tokens).toEqual(['get', 'user:1']);
    expect(command.id).toBe('GET');
    expect(command.arguments).toEqual(['user:1']);
  });

  it('should reject an empty token list', () => {
    expect(() => new RawCommand([])).toThrow('A raw command requires at least one token');
  });

  it('should not be affected by later changes to the source array', () => {
    const tokens = ['AUTH', 'test-secret'];
    const command = new RawCommand(tokens);

    tokens.push('extra');

    expect(command.tokens).toEqual(['AUTH', 'test-secret']);
  });

  describe('serialize', () => {
    it('should render a multi-bulk request', () => {
      expect(new RawCommand(['SELECT', '3']).serialize()).toBe('*2\r\n$6\r\nSELECT\r\n$1\r\n3\r\n');
    });

    it('should count multi-byte characters by byte length', () => {
      expect(new RawCommand(['ECHO', 'é']).serialize()).toBe('*2\r\n$4\r\nECHO\r\n$2\r\né\r\n');
    });
  });

  it('should join tokens with spaces in toString', () => {
    expect(String(new RawCommand(['PING']))).toBe('PING');
    expect(String(new RawCommand(['SET', 'k', 'v']))).toBe('SET k v');
  });
});

describe('command helpers', () => {
  it('should build an AUTH command', () => {
    expect(authCommand('test-secret').tokens).toEqual(['AUTH', 'test-secret']);
  });

  it('should build a SELECT command with the index as a string token', () => {
    expect(selectCommand(3).tokens).toEqual(['SELECT', '3']);
  });
});

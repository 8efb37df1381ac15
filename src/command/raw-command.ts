/**
 * A protocol command as an ordered sequence of string tokens.
 *
 * The first token is the command identifier (`AUTH`, `SELECT`, ...), the
 * remaining tokens are its arguments.
 */
export class RawCommand {
  readonly tokens: readonly string[];

  constructor(tokens: readonly string[]) {
    if (tokens.length === 0) {
      throw new RangeError('A raw command requires at least one token');
    }

    this.tokens = Object.freeze([...tokens]);
  }

  /**
   * Upper-cased command identifier.
   */
  get id(): string {
    return (this.tokens[0] ?? '').toUpperCase();
  }

  get arguments(): readonly string[] {
    return this.tokens.slice(1);
  }

  /**
   * Renders the command as a multi-bulk request.
   *
   * @example
   * ```typescript
   * new RawCommand(['SELECT', '3']).serialize();
   * // '*2\r\n$6\r\nSELECT\r\n$1\r\n3\r\n'
   * ```
   */
  serialize(): string {
    let request = `*${this.tokens.length}\r\n`;

    for (const token of this.tokens) {
      request += `$${Buffer.byteLength(token)}\r\n${token}\r\n`;
    }

    return request;
  }

  toString(): string {
    return this.tokens.join(' ');
  }
}

export function authCommand(password: string): RawCommand {
  return new RawCommand(['AUTH', password]);
}

export function selectCommand(database: number): RawCommand {
  return new RawCommand(['SELECT', String(database)]);
}

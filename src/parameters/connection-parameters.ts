import { ParametersError } from '../errors/index.js';
import { parseUri } from './parse-uri.js';
import { type ParametersInput, ParametersSchema, type ParsedParameters } from './schema.js';

/**
 * Normalized description of a single endpoint.
 *
 * Instances are immutable. Connections keep a reference to the instance they
 * were built from and hand it back from `getParameters()`.
 */
export class ConnectionParameters {
  readonly scheme: string;
  readonly host: string;
  readonly port: number;
  readonly path?: string;
  readonly password?: string;
  readonly database?: number;
  /** Connect timeout in seconds. */
  readonly timeout: number;
  /** Extra options, forwarded verbatim to the connection. */
  readonly options: Readonly<Record<string, unknown>>;

  private constructor(parsed: ParsedParameters) {
    const { scheme, host, port, path, password, database, timeout, ...options } = parsed;

    this.scheme = scheme;
    this.host = host;
    this.port = port;
    this.path = path;
    this.password = password;
    this.database = database;
    this.timeout = timeout;
    this.options = Object.freeze(options);

    Object.freeze(this);
  }

  /**
   * Builds parameters from a URI string or a plain object. Already normalized
   * parameters are returned as they are.
   *
   * @throws {ParametersError} When the input cannot be parsed or fails validation
   *
   * @example
   * ```typescript
   * ConnectionParameters.create('tcp://10.0.0.5:6380?database=2');
   * ConnectionParameters.create({ scheme: 'unix', path: '/var/run/kv.sock' });
   * ```
   */
  static create(input: string | ParametersInput | ConnectionParameters): ConnectionParameters {
    if (input instanceof ConnectionParameters) {
      return input;
    }

    const raw = typeof input === 'string' ? parseUri(input) : input;
    const result = ParametersSchema.safeParse(raw);

    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ParametersError(`Invalid connection parameters: ${issues}`, result.error);
    }

    return new ConnectionParameters(result.data);
  }

  /**
   * Reads a parameter by name, looking at extra options when it is not one of
   * the known fields.
   */
  get(name: string): unknown {
    switch (name) {
      case 'scheme':
        return this.scheme;
      case 'host':
        return this.host;
      case 'port':
        return this.port;
      case 'path':
        return this.path;
      case 'password':
        return this.password;
      case 'database':
        return this.database;
      case 'timeout':
        return this.timeout;
      default:
        return this.options[name];
    }
  }

  toJSON(): ParametersInput {
    return {
      ...this.options,
      scheme: this.scheme,
      host: this.host,
      port: this.port,
      path: this.path,
      password: this.password,
      database: this.database,
      timeout: this.timeout,
    };
  }
}

export function isConnectionParameters(value: unknown): value is ConnectionParameters {
  return value instanceof ConnectionParameters;
}

export function normalizeParameters(
  input: string | ParametersInput | ConnectionParameters,
): ConnectionParameters {
  return ConnectionParameters.create(input);
}

import { ParametersError } from '../errors/index.js';

/**
 * Splits a connection URI into raw parameter values.
 *
 * Query-string entries are applied last, so `tcp://h:1?port=2` ends up on port 2.
 * A string without a scheme is read as `tcp://<string>`.
 *
 * @example
 * ```typescript
 * parseUri('tcp://:secret@10.0.0.5:6380?database=2');
 * // { scheme: 'tcp', host: '10.0.0.5', port: '6380', password: 'secret', database: '2' }
 *
 * parseUri('unix:/var/run/kv.sock');
 * // { scheme: 'unix', path: '/var/run/kv.sock' }
 * ```
 */
export function parseUri(uri: string): Record<string, unknown> {
  const normalized = uri.includes(':/') ? uri : `tcp://${uri}`;

  let url: URL;
  try {
    url = new URL(normalized);
  } catch (error) {
    throw new ParametersError(`Invalid connection URI: ${uri}`, error);
  }

  const scheme = url.protocol.slice(0, -1);
  const parsed: Record<string, unknown> = { scheme };

  if (scheme === 'unix') {
    parsed.path = decodeURIComponent(url.pathname);
  } else {
    if (url.hostname) {
      // IPv6 literals come back bracketed, sockets want the bare address
      parsed.host = url.hostname.replace(/^\[(.*)\]$/, '$1');
    }
    if (url.port) {
      parsed.port = url.port;
    }
  }

  if (url.password) {
    parsed.password = decodeURIComponent(url.password);
  }

  for (const [key, value] of url.searchParams) {
    parsed[key] = value;
  }

  return parsed;
}

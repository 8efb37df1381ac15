import { type Connection, connectionId } from '../connection/index.js';

/**
 * Log levels supported by the logger.
 */
export type LogLevel = 'define' | 'create' | 'error';

/**
 * Events emitted by a connection factory.
 */
export type FactoryLogEvent =
  | {
      level: 'define';
      scheme: string;
      action: 'define' | 'undefine';
      /** Initializer kind; absent for `undefine`. */
      kind?: 'class' | 'lazy';
    }
  | {
      level: 'create';
      scheme: string;
      kind: 'class' | 'lazy';
      connection: Connection;
    }
  | {
      level: 'error';
      scheme: string;
      error: unknown;
    };

export type FactoryLogger = (event: FactoryLogEvent) => void;

/**
 * Creates a factory log function that logs to console.
 *
 * This is a simple console-based logger. For production use, you may want
 * to integrate with your application's logging framework through
 * `customLogger`.
 *
 * @param levels - Array of log levels to enable. Default: ['error']
 *
 * @example
 * ```typescript
 * // Log only errors (default)
 * const logger = createLogger(['error']);
 *
 * // Log every definition and every connection built (development)
 * const logger = createLogger(['define', 'create', 'error']);
 * ```
 */
export function createLogger(levels: LogLevel[] = ['error']): FactoryLogger {
  return (event: FactoryLogEvent): void => {
    if (!levels.includes(event.level)) {
      return;
    }

    switch (event.level) {
      case 'define':
        console.debug('[Connection Factory]', {
          action: event.action,
          scheme: event.scheme,
          kind: event.kind,
        });
        break;
      case 'create':
        console.debug('[Connection Factory]', {
          action: 'create',
          scheme: event.scheme,
          kind: event.kind,
          connection: connectionId(event.connection),
        });
        break;
      case 'error':
        console.error('[Connection Factory Error]', {
          scheme: event.scheme,
          error: event.error,
        });
        break;
    }
  };
}

import { z } from 'zod';

export const DEFAULT_SCHEME = 'tcp';
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 6379;
export const DEFAULT_TIMEOUT = 5;

// Unknown keys pass through untouched and end up as connection options.
export const ParametersSchema = z
  .object({
    scheme: z.string().trim().min(1).default(DEFAULT_SCHEME),
    host: z.string().trim().min(1).default(DEFAULT_HOST),
    port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
    path: z.string().min(1).optional(),
    password: z.string().optional(),
    database: z.coerce.number().int().nonnegative().optional(),
    timeout: z.coerce.number().positive().default(DEFAULT_TIMEOUT),
  })
  .passthrough();

export type ParsedParameters = z.infer<typeof ParametersSchema>;

/**
 * Plain-object form of connection parameters. Every field is optional and
 * falls back to its default; any other key is kept as an extra option.
 */
export interface ParametersInput {
  scheme?: string;
  host?: string;
  port?: number;
  path?: string;
  password?: string;
  database?: number;
  /** Connect timeout in seconds. */
  timeout?: number;
  [option: string]: unknown;
}

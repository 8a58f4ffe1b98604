/**
 * Application Configuration: Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, log level, access log format and exclusions) is read
 * here and nowhere else. dotenv loads .env into process.env; a Zod schema
 * validates and coerces it at startup. Anything invalid stops the process
 * before it binds a port.
 *
 * The access log format itself is only checked for syntax when the DI
 * container compiles it (core/container.ts), which also happens at startup.
 */
import 'dotenv/config';

import { DEFAULT_ACCESS_LOG_FORMAT } from '@shared/constants';
import { z } from 'zod/v4';

/** Comma-separated list → trimmed, non-empty entries. */
const commaList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  /** Directive template for the access line (see application/format/DirectiveParser.ts). */
  ACCESS_LOG_FORMAT: z.string().min(1).default(DEFAULT_ACCESS_LOG_FORMAT),
  /** Exact request paths that are never access-logged, e.g. "/api/v1/health". */
  ACCESS_LOG_EXCLUDE: commaList,
  /** Regular expressions; a path matching any of them is not access-logged. */
  ACCESS_LOG_EXCLUDE_PATTERN: commaList.pipe(
    z.array(
      z.string().refine((source) => {
        try {
          new RegExp(source);
          return true;
        } catch {
          return false;
        }
      }, 'must be a valid regular expression'),
    ),
  ),
  /** Tag every request with a request id (honouring X-Request-Id) and log it with the line. */
  ACCESS_LOG_REQUEST_ID: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((flag) => flag === 'true' || flag === '1'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  accessLog: {
    format: env.ACCESS_LOG_FORMAT,
    exclude: env.ACCESS_LOG_EXCLUDE,
    excludePatterns: env.ACCESS_LOG_EXCLUDE_PATTERN.map((source) => new RegExp(source)),
    requestId: env.ACCESS_LOG_REQUEST_ID,
  },
} as const;

export type AppConfig = typeof config;

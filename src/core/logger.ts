/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * Pino is the sink for access lines as well as for everything else the app
 * logs: one JSON object per line in production, piped through pino-pretty
 * in development. The access logger writes each rendered line as the `msg`
 * of an info record, through a per-request child logger when a span factory
 * is configured.
 *
 * The exported `Logger` type lets modules depend on "a logger" without
 * importing pino's factory, so tests can hand in their own instance.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
